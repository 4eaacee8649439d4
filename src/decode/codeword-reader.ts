// Reading codewords from a stream or from the packed byte form

import { CODEWORD_BYTES, MAX_CODEWORD } from '../constants'
import { allocateCodewords } from '../alloc'
import { CorruptStreamError } from '../errors'

// Reads and validates the codeword at `index`
export function readCodeword(codewords: ArrayLike<number>, index: number): number {
  const codeword = codewords[index]
  if (!Number.isInteger(codeword) || codeword < 0 || codeword > MAX_CODEWORD) {
    throw new CorruptStreamError(`Invalid codeword ${codeword} at position ${index}`)
  }
  return codeword
}

export function unpackCodewords(bytes: Uint8Array): Uint32Array {
  if (bytes.length % CODEWORD_BYTES !== 0) {
    throw new CorruptStreamError(
      `Truncated codeword stream: ${bytes.length} bytes is not a multiple of ${CODEWORD_BYTES}`
    )
  }
  const count = bytes.length / CODEWORD_BYTES
  const out = allocateCodewords(count)
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  for (let i = 0; i < count; i++) {
    out[i] = view.getUint32(i * CODEWORD_BYTES, true)
  }
  return out
}
