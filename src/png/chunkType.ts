/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

import { CHUNK_TYPE_BYTES, PROPERTY_BIT } from '../constants'
import { type ChunkTag } from '../types'
import { bytesEqual } from '../utils'
import { ChunkTypeError } from './errors'

function isAsciiLetter (byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5A) || (byte >= 0x61 && byte <= 0x7A)
}

/**
 * A PNG chunk type: four ASCII letters whose case encodes the chunk's properties.
 *
 * - byte 0 uppercase: critical, lowercase: ancillary
 * - byte 1 uppercase: public, lowercase: private
 * - byte 2 must be uppercase (reserved)
 * - byte 3 uppercase: unsafe to copy, lowercase: safe to copy
 */
export class ChunkType implements ChunkTag {
  readonly #bytes: Uint8Array

  private constructor (bytes: Uint8Array) {
    this.#bytes = bytes
  }

  /**
   * @throws {ChunkTypeError} Unless `bytes` holds exactly four ASCII letters.
   */
  static fromBytes (bytes: Uint8Array): ChunkType {
    if (bytes.length !== CHUNK_TYPE_BYTES) {
      throw new ChunkTypeError(`Chunk type must be ${CHUNK_TYPE_BYTES} bytes, got ${bytes.length}`)
    }
    const invalid = bytes.findIndex((byte) => !isAsciiLetter(byte))
    if (invalid !== -1) {
      throw new ChunkTypeError(`Chunk type byte ${invalid} is not an ASCII letter: 0x${bytes[invalid].toString(16).padStart(2, '0')}`)
    }
    return new ChunkType(bytes.slice())
  }

  static fromString (text: string): ChunkType {
    if (text.length !== CHUNK_TYPE_BYTES) {
      throw new ChunkTypeError(`Chunk type must be ${CHUNK_TYPE_BYTES} characters, got ${text.length}`)
    }
    const bytes = new Uint8Array(CHUNK_TYPE_BYTES)
    for (let i = 0; i < CHUNK_TYPE_BYTES; i++) {
      const code = text.charCodeAt(i)
      // anything past 0xFF would be truncated by the Uint8Array
      if (code > 0x7F) {
        throw new ChunkTypeError(`Chunk type character ${i} is not ASCII`)
      }
      bytes[i] = code
    }
    return ChunkType.fromBytes(bytes)
  }

  bytes (): Uint8Array {
    return this.#bytes.slice()
  }

  isCritical (): boolean {
    return !this.isLowercase(0)
  }

  isPublic (): boolean {
    return !this.isLowercase(1)
  }

  isReservedBitValid (): boolean {
    return !this.isLowercase(2)
  }

  isSafeToCopy (): boolean {
    return this.isLowercase(3)
  }

  isValid (): boolean {
    return this.#bytes.every(isAsciiLetter) && this.isReservedBitValid()
  }

  equals (other: ChunkTag): boolean {
    return bytesEqual(this.#bytes, other.bytes())
  }

  toString (): string {
    return String.fromCharCode(...this.#bytes)
  }

  private isLowercase (index: number): boolean {
    return (this.#bytes[index] & PROPERTY_BIT) !== 0
  }
}
