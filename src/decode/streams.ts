// Presized output buffer for LZW decompression

import { CorruptStreamError } from '../errors'

export class LzwOutput {
  buffer: Uint8Array
  pos: number

  constructor(buf: Uint8Array) {
    this.buffer = buf
    this.pos = 0
  }

  write(bytes: Uint8Array): number {
    if (this.pos + bytes.length > this.buffer.length) {
      throw new CorruptStreamError(
        `Decoded data exceeds declared length ${this.buffer.length}`
      )
    }
    this.buffer.set(bytes, this.pos)
    this.pos += bytes.length
    return bytes.length
  }
}
