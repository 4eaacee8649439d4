// LZW decoding

import {
  LITERAL_CODEWORDS,
  RESERVED_CODEWORD,
} from '../constants'
import { allocateBytes } from '../alloc'
import { CorruptStreamError, LimitExceededError } from '../errors'
import { readCodeword } from './codeword-reader'
import { LzwOutput } from './streams'
import { IndexedDictionary } from './table'

export interface LzwDecodeOptions {
  maxOutputSize?: number
}

export function seedTable(table: IndexedDictionary): void {
  const single = new Uint8Array(1)
  for (let byte = 0; byte < LITERAL_CODEWORDS; byte++) {
    single[0] = byte
    table.append(single)
  }
  table.reserve()
}

// Reads the declared original length (first codeword) without decoding
export function lzwDecodedSize(codewords: ArrayLike<number>): number {
  if (codewords.length === 0) {
    throw new CorruptStreamError('Missing length codeword')
  }
  return readCodeword(codewords, 0)
}

// The first content codeword decodes to one byte and the i-th one after it
// to at most i + 1, so k content codewords give between k and k(k+1)/2 bytes
function checkDeclaredSize(declared: number, contentCount: number): void {
  const max = contentCount * (contentCount + 1) / 2
  if (declared < contentCount || declared > max) {
    throw new CorruptStreamError(
      `Declared length ${declared} is impossible for ${contentCount} codewords`
    )
  }
}

export function lzwDecompress(
  codewords: ArrayLike<number>,
  options: LzwDecodeOptions = {}
): Uint8Array {
  const declared = lzwDecodedSize(codewords)
  const { maxOutputSize } = options

  if (maxOutputSize !== undefined && declared > maxOutputSize) {
    throw new LimitExceededError(
      `Decompressed size ${declared} exceeds limit ${maxOutputSize}`
    )
  }

  checkDeclaredSize(declared, codewords.length - 1)
  if (codewords.length === 1) {
    return new Uint8Array(0)
  }

  const output = new LzwOutput(allocateBytes(declared))
  const table = new IndexedDictionary()
  try {
    seedTable(table)

    let prev = readCodeword(codewords, 1)
    if (prev >= LITERAL_CODEWORDS) {
      throw new CorruptStreamError(
        `Codeword ${prev} at position 1 references an entry that does not exist yet`
      )
    }
    output.write(table.get(prev))

    for (let i = 2; i < codewords.length; i++) {
      const cw = readCodeword(codewords, i)
      const next = table.nextCodeword

      if (cw === RESERVED_CODEWORD) {
        throw new CorruptStreamError(`Reserved codeword ${cw} at position ${i}`)
      }

      if (cw < next) {
        const current = table.get(cw)
        output.write(current)
        table.appendExtended(prev, current[0])
      } else if (cw === next) {
        // Entry referenced while being defined: prev + first byte of prev
        const added = table.appendExtended(prev, table.get(prev)[0])
        output.write(table.get(added))
      } else {
        throw new CorruptStreamError(
          `Codeword ${cw} at position ${i} references an entry that does not exist yet (next is ${next})`
        )
      }

      prev = cw
    }
  } finally {
    table.destroy()
  }

  if (output.pos !== declared) {
    throw new CorruptStreamError(
      `Decoded ${output.pos} bytes but the stream declares ${declared}`
    )
  }

  return output.buffer
}
