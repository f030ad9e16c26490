/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

export type ChunkErrorKind = 'InvalidChunkLength' | 'InvalidCrc'

/**
 * Raised when a byte buffer cannot be decoded into a chunk.
 * Switch on `kind` to tell the failures apart.
 */
export abstract class ChunkError extends Error {
  abstract readonly kind: ChunkErrorKind
}

/**
 * The buffer is shorter than the chunk metadata, or shorter than the metadata
 * plus the payload length it declares.
 */
export class InvalidChunkLengthError extends ChunkError {
  readonly kind = 'InvalidChunkLength'

  constructor (readonly actual: number, readonly required: number) {
    super(`Invalid chunk length: need ${required} bytes, got ${actual}`)
    this.name = 'InvalidChunkLengthError'
  }
}

/**
 * The checksum stored in the buffer does not match the one computed over the
 * decoded type and data.
 */
export class InvalidCrcError extends ChunkError {
  readonly kind = 'InvalidCrc'

  constructor (readonly stored: number, readonly expected: number) {
    super(`Invalid crc: stored ${stored}, expected ${expected}`)
    this.name = 'InvalidCrcError'
  }
}

export class ChunkTypeError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'ChunkTypeError'
  }
}

/** Chunk data is not valid UTF-8. The chunk itself is still valid. */
export class ChunkDataEncodingError extends Error {
  constructor (options?: { cause?: unknown }) {
    super('Chunk data is not valid UTF-8', options)
    this.name = 'ChunkDataEncodingError'
  }
}
