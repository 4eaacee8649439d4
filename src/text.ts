// UTF-8 string adapters over the byte codec

import { lzwCompress } from './encode/encode'
import { lzwDecompress, type LzwDecodeOptions } from './decode/decode'
import { InvalidTextError } from './errors'

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

export function compressString(text: string): Uint32Array {
  return lzwCompress(encoder.encode(text))
}

export function decompressString(
  codewords: ArrayLike<number>,
  options?: LzwDecodeOptions
): string {
  const bytes = lzwDecompress(codewords, options)
  try {
    return decoder.decode(bytes)
  } catch (err) {
    if (err instanceof TypeError) {
      throw new InvalidTextError(err)
    }
    throw err
  }
}
