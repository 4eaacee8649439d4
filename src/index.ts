// Decode
export { lzwDecompress, lzwDecodedSize } from './decode/decode'
export type { LzwDecodeOptions } from './decode/decode'
export { unpackCodewords } from './decode/codeword-reader'
export { IndexedDictionary } from './decode/table'

// Encode
export { lzwCompress } from './encode/encode'
export { packCodewords } from './encode/codeword-writer'
export { DictionaryTrie } from './encode/trie'
export type { NodeId } from './encode/trie'

// Adapters
export { compressString, decompressString } from './text'
export { readFileBytes, compressFile, decompressFile } from './io/file'

export {
  LzwError,
  CorruptStreamError,
  AllocationError,
  LimitExceededError,
  FileNotFoundError,
  ShortReadError,
  FileReadError,
  InvalidTextError,
} from './errors'
export type { LzwErrorKind } from './errors'
export {
  LITERAL_CODEWORDS,
  RESERVED_CODEWORD,
  FIRST_DYNAMIC_CODEWORD,
  CODEWORD_BYTES,
  MAX_CODEWORD,
} from './constants'
