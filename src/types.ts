/*
*  Copyright (c) Microsoft Corporation.
*  Licensed under the MIT license.
*/

import { type Chunk } from './png/chunk'
import { type ChunkError, type ChunkTypeError } from './png/errors'

/**
 * The four-byte identifier carried by every chunk.
 * The codec only relies on these operations; naming rules belong to the implementation.
 */
export interface ChunkTag {
  bytes: () => Uint8Array
  equals: (other: ChunkTag) => boolean
  toString: () => string
}

export type ChunkTagParser = (bytes: Uint8Array) => ChunkTag

export type ChunkDecodeResult =
  | { success: true, chunk: Chunk }
  | { success: false, error: ChunkError | ChunkTypeError }
