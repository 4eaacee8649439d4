// Codeword output buffer and the packed byte form
//
// Packed form: every codeword as CODEWORD_BYTES consecutive bytes,
// little-endian, no header or padding.

import { CODEWORD_BYTES, MAX_CODEWORD } from '../constants'
import { allocateBytes, allocateCodewords, grownSize } from '../alloc'

export class CodewordWriter {
  buffer: Uint32Array
  count: number

  constructor(initialSize: number = 1024) {
    this.buffer = allocateCodewords(initialSize)
    this.count = 0
  }

  private ensureCapacity(extra: number): void {
    const needed = this.count + extra
    if (needed <= this.buffer.length) return
    const newBuffer = allocateCodewords(grownSize(this.buffer.length, needed))
    newBuffer.set(this.buffer.subarray(0, this.count))
    this.buffer = newBuffer
  }

  write(codeword: number): void {
    this.ensureCapacity(1)
    this.buffer[this.count++] = codeword
  }

  // Exactly-sized copy of what was written
  finish(): Uint32Array {
    return this.buffer.slice(0, this.count)
  }
}

export function packCodewords(codewords: ArrayLike<number>): Uint8Array {
  const out = allocateBytes(codewords.length * CODEWORD_BYTES)
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength)
  for (let i = 0; i < codewords.length; i++) {
    const codeword = codewords[i]
    if (!Number.isInteger(codeword) || codeword < 0 || codeword > MAX_CODEWORD) {
      throw new RangeError(`Codeword ${codeword} at position ${i} is not an unsigned 32-bit integer`)
    }
    view.setUint32(i * CODEWORD_BYTES, codeword, true)
  }
  return out
}
