/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

import { CHUNK_TYPE_BYTES, CHUNK_TYPE_OFFSET, DATA_OFFSET, METADATA_BYTES } from '../constants'
import { type ChunkDecodeResult, type ChunkTag, type ChunkTagParser } from '../types'
import { DEBUG, bytesEqual, bytesToHex } from '../utils'
import { ByteReader } from './byteReader'
import { ChunkType } from './chunkType'
import { crc32 } from './crc32'
import { ChunkDataEncodingError, ChunkError, ChunkTypeError, InvalidChunkLengthError, InvalidCrcError } from './errors'

const utf8DecoderFatal = new TextDecoder('utf-8', { fatal: true })

/**
 * A single PNG-style chunk.
 *
 * ```
 * offset      size    field
 * 0           4       length   u32 big-endian, byte count of data
 * 4           4       type
 * 8           length  data
 * 8 + length  4       crc      u32 big-endian, CRC-32 over type and data
 * ```
 *
 * `length` and `crc` are always derived from the type and data, so a live
 * chunk never disagrees with its own checksum.
 */
export class Chunk {
  readonly #length: number
  readonly #chunkType: ChunkTag
  readonly #data: Uint8Array
  readonly #crc: number

  /**
   * @param data Copied; later changes to the caller's buffer do not affect the chunk.
   * @throws {ChunkTypeError} When the chunk type does not give exactly four bytes.
   */
  constructor (chunkType: ChunkTag, data: Uint8Array) {
    const typeBytes = chunkType.bytes()
    if (typeBytes.length !== CHUNK_TYPE_BYTES) {
      throw new ChunkTypeError(`Chunk type must be ${CHUNK_TYPE_BYTES} bytes, got ${typeBytes.length}`)
    }
    this.#chunkType = chunkType
    this.#data = data.slice()
    this.#length = this.#data.length
    this.#crc = crc32(typeBytes, this.#data)
  }

  static crcChecksum (chunkType: ChunkTag, data: Uint8Array): number {
    return crc32(chunkType.bytes(), data)
  }

  /**
   * Decodes the chunk at the start of `buffer`. Bytes after the chunk's end are ignored.
   *
   * @param parseType Builds the chunk type from its four bytes; whatever it throws is rethrown unchanged.
   * @throws {InvalidChunkLengthError} When the buffer is shorter than the metadata or than the declared length.
   * @throws {InvalidCrcError} When the stored checksum does not match the type and data.
   */
  static fromBytes (buffer: Uint8Array, parseType: ChunkTagParser = ChunkType.fromBytes): Chunk {
    try {
      return decode(buffer, parseType)
    } catch (error) {
      if (DEBUG && error instanceof ChunkError) {
        console.debug('Chunk rejected:', error.kind, error.message)
      }
      throw error
    }
  }

  get length (): number {
    return this.#length
  }

  get chunkType (): ChunkTag {
    return this.#chunkType
  }

  /**
   * The chunk's own buffer, not a copy. Do not modify it.
   */
  get data (): Uint8Array {
    return this.#data
  }

  get crc (): number {
    return this.#crc
  }

  /**
   * @throws {ChunkDataEncodingError} When the data is not valid UTF-8.
   */
  dataAsString (): string {
    try {
      return utf8DecoderFatal.decode(this.#data)
    } catch (error) {
      throw new ChunkDataEncodingError({ cause: error })
    }
  }

  toBytes (): Uint8Array {
    const bytes = new Uint8Array(METADATA_BYTES + this.#length)
    const view = new DataView(bytes.buffer)
    view.setUint32(0, this.#length, false)
    bytes.set(this.#chunkType.bytes(), CHUNK_TYPE_OFFSET)
    bytes.set(this.#data, DATA_OFFSET)
    view.setUint32(DATA_OFFSET + this.#length, this.#crc, false)
    return bytes
  }

  equals (other: Chunk): boolean {
    return this.#length === other.length &&
      this.#crc === other.crc &&
      this.#chunkType.equals(other.chunkType) &&
      bytesEqual(this.#data, other.data)
  }

  toString (): string {
    let data: string
    try {
      data = this.dataAsString()
    } catch (error) {
      if (!(error instanceof ChunkDataEncodingError)) {
        throw error
      }
      data = `0x${bytesToHex(this.#data)}`
    }
    return `Chunk { length: ${this.#length}, chunkType: ${this.#chunkType.toString()}, data: ${data}, crc: ${this.#crc} }`
  }
}

/**
 * Like `Chunk.fromBytes`, but returns chunk and type errors instead of throwing them.
 * Anything else thrown by `parseType` still propagates.
 */
export function safeDecodeChunk (buffer: Uint8Array, parseType: ChunkTagParser = ChunkType.fromBytes): ChunkDecodeResult {
  try {
    return { success: true, chunk: decode(buffer, parseType) }
  } catch (error) {
    if (error instanceof ChunkError || error instanceof ChunkTypeError) {
      return { success: false, error }
    }
    throw error
  }
}

function decode (buffer: Uint8Array, parseType: ChunkTagParser): Chunk {
  if (buffer.length < METADATA_BYTES) {
    throw new InvalidChunkLengthError(buffer.length, METADATA_BYTES)
  }

  const reader = new ByteReader(buffer)
  const length = reader.uint32()
  const required = METADATA_BYTES + length
  if (buffer.length < required) {
    throw new InvalidChunkLengthError(buffer.length, required)
  }

  const chunkType = parseType(reader.bytes(CHUNK_TYPE_BYTES).slice())
  // the constructor takes the only copy of the data
  const data = reader.bytes(length)
  const stored = reader.uint32()

  const chunk = new Chunk(chunkType, data)
  if (chunk.crc !== stored) {
    throw new InvalidCrcError(stored, chunk.crc)
  }
  return chunk
}
