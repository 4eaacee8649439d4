export type LzwErrorKind =
  | 'CorruptStream'
  | 'AllocationFailure'
  | 'LimitExceeded'
  | 'FileNotFound'
  | 'ShortRead'
  | 'Io'
  | 'InvalidText'

export class LzwError extends Error {
  readonly kind: LzwErrorKind

  constructor(kind: LzwErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LzwError'
    this.kind = kind
  }
}

// Codeword stream cannot have been produced by the encoder
export class CorruptStreamError extends LzwError {
  constructor(message: string) {
    super('CorruptStream', message)
    this.name = 'CorruptStreamError'
  }
}

export class AllocationError extends LzwError {
  constructor(size: number, cause: unknown) {
    super('AllocationFailure', `Unable to allocate ${size} elements`, { cause })
    this.name = 'AllocationError'
  }
}

export class LimitExceededError extends LzwError {
  constructor(message: string) {
    super('LimitExceeded', message)
    this.name = 'LimitExceededError'
  }
}

export class FileNotFoundError extends LzwError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super('FileNotFound', `File not found: ${path}`, { cause })
    this.name = 'FileNotFoundError'
    this.path = path
  }
}

export class ShortReadError extends LzwError {
  readonly path: string
  readonly expected: number
  readonly actual: number

  constructor(path: string, expected: number, actual: number) {
    super('ShortRead', `Short read from ${path}: expected ${expected} bytes, got ${actual}`)
    this.name = 'ShortReadError'
    this.path = path
    this.expected = expected
    this.actual = actual
  }
}

export class FileReadError extends LzwError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super('Io', `Unable to read ${path}`, { cause })
    this.name = 'FileReadError'
    this.path = path
  }
}

// Decoded bytes are not valid UTF-8
export class InvalidTextError extends LzwError {
  constructor(cause: unknown) {
    super('InvalidText', 'Decompressed data is not valid UTF-8', { cause })
    this.name = 'InvalidTextError'
  }
}
