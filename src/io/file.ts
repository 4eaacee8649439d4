// File adapters: whole-file read, then one codec call

import { openSync, fstatSync, readSync, closeSync } from 'node:fs'
import { allocateBytes } from '../alloc'
import { FileNotFoundError, FileReadError, ShortReadError } from '../errors'
import { lzwCompress } from '../encode/encode'
import { packCodewords } from '../encode/codeword-writer'
import { lzwDecompress, type LzwDecodeOptions } from '../decode/decode'
import { unpackCodewords } from '../decode/codeword-reader'

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

function openForReading(path: string): number {
  try {
    return openSync(path, 'r')
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FileNotFoundError(path, err)
    }
    throw new FileReadError(path, err)
  }
}

function readAll(path: string, fd: number): Uint8Array {
  let size: number
  try {
    size = fstatSync(fd).size
  } catch (err) {
    throw new FileReadError(path, err)
  }

  const buffer = allocateBytes(size)
  let offset = 0
  while (offset < size) {
    let bytesRead: number
    try {
      bytesRead = readSync(fd, buffer, offset, size - offset, offset)
    } catch (err) {
      throw new FileReadError(path, err)
    }
    if (bytesRead === 0) break
    offset += bytesRead
  }

  if (offset < size) {
    throw new ShortReadError(path, size, offset)
  }
  return buffer
}

// Reads exactly as many bytes as the file's size at open time
export function readFileBytes(path: string): Uint8Array {
  const fd = openForReading(path)
  try {
    return readAll(path, fd)
  } finally {
    closeSync(fd)
  }
}

// Returns the packed codeword form of the file's contents
export function compressFile(path: string): Uint8Array {
  return packCodewords(lzwCompress(readFileBytes(path)))
}

// Reads a packed codeword file and returns the original bytes
export function decompressFile(path: string, options?: LzwDecodeOptions): Uint8Array {
  return lzwDecompress(unpackCodewords(readFileBytes(path)), options)
}
