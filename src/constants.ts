/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

export const LENGTH_BYTES = 4
export const CHUNK_TYPE_BYTES = 4
export const CRC_BYTES = 4

/* length + type + crc, present in every chunk regardless of payload size */
export const METADATA_BYTES = LENGTH_BYTES + CHUNK_TYPE_BYTES + CRC_BYTES

export const CHUNK_TYPE_OFFSET = LENGTH_BYTES
export const DATA_OFFSET = LENGTH_BYTES + CHUNK_TYPE_BYTES

/* Bit 5 of each type byte; set means lowercase */
export const PROPERTY_BIT = 0x20
