// Typed array allocation; the runtime reports exhaustion as a RangeError

import { AllocationError } from './errors'

export function allocateBytes(size: number): Uint8Array {
  try {
    return new Uint8Array(size)
  } catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationError(size, err)
    }
    throw err
  }
}

export function allocateCodewords(size: number): Uint32Array {
  try {
    return new Uint32Array(size)
  } catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationError(size, err)
    }
    throw err
  }
}

// Doubles `current` until it reaches `needed`
export function grownSize(current: number, needed: number): number {
  let size = Math.max(current, 1)
  while (size < needed) size *= 2
  return size
}
