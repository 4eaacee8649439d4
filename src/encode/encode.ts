// LZW encoder
//
// Output: [input length, ...content codewords]. Codewords 0-255 are the
// literal bytes, 256 is never emitted, dynamic entries start at 257.

import {
  LITERAL_CODEWORDS,
  FIRST_DYNAMIC_CODEWORD,
  MAX_CODEWORD,
} from '../constants'
import { LimitExceededError } from '../errors'
import { CodewordWriter } from './codeword-writer'
import { DictionaryTrie } from './trie'

export function seedDictionary(trie: DictionaryTrie): void {
  const single = new Uint8Array(1)
  for (let byte = 0; byte < LITERAL_CODEWORDS; byte++) {
    single[0] = byte
    trie.insert(single, byte)
  }
}

// Compress data using LZW
export function lzwCompress(input: Uint8Array): Uint32Array {
  const trie = new DictionaryTrie()
  try {
    return encodeWithDictionary(input, trie)
  } finally {
    trie.destroy()
  }
}

// Runs the encoder over a caller-owned, empty trie
export function encodeWithDictionary(input: Uint8Array, trie: DictionaryTrie): Uint32Array {
  if (input.length > MAX_CODEWORD) {
    throw new LimitExceededError(
      `Input size ${input.length} exceeds limit ${MAX_CODEWORD}`
    )
  }

  seedDictionary(trie)

  // No repeats at all is the worst case: one codeword per byte plus the header
  const writer = new CodewordWriter(input.length + 1)
  writer.write(input.length)

  let nextCodeword = FIRST_DYNAMIC_CODEWORD
  // Trie node of the current candidate; root is the empty candidate
  let candidate = trie.root

  for (let i = 0; i < input.length; i++) {
    const byte = input[i]
    const extended = trie.child(candidate, byte)
    if (extended !== undefined && trie.codewordAt(extended) !== undefined) {
      candidate = extended
      continue
    }

    writer.write(codewordOf(trie, candidate))
    trie.insertChild(candidate, byte, nextCodeword++)
    candidate = literalNode(trie, byte)
  }

  if (candidate !== trie.root) {
    writer.write(codewordOf(trie, candidate))
  }

  return writer.finish()
}

function codewordOf(trie: DictionaryTrie, node: number): number {
  const codeword = trie.codewordAt(node)
  if (codeword === undefined) {
    throw new Error('Candidate string is missing from the dictionary')
  }
  return codeword
}

function literalNode(trie: DictionaryTrie, byte: number): number {
  const node = trie.child(trie.root, byte)
  if (node === undefined) {
    throw new Error(`Dictionary is missing literal ${byte}`)
  }
  return node
}
