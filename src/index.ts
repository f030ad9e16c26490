/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

export { Chunk, safeDecodeChunk } from './png/chunk'
export { ChunkType } from './png/chunkType'
export { crc32 } from './png/crc32'
export {
  ChunkError,
  InvalidChunkLengthError,
  InvalidCrcError,
  ChunkTypeError,
  ChunkDataEncodingError,
  type ChunkErrorKind
} from './png/errors'
export { CHUNK_TYPE_BYTES, CRC_BYTES, LENGTH_BYTES, METADATA_BYTES } from './constants'
export type { ChunkTag, ChunkTagParser, ChunkDecodeResult } from './types'
