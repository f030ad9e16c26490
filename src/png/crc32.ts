/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

/* CRC-32/ISO-HDLC, the variant used by PNG and gzip (reflected polynomial 0xEDB88320) */
const CRC32_TABLE = new Uint32Array(256)
for (let i = 0; i < 256; i++) {
  let c = i
  for (let j = 0; j < 8; j++) {
    c = (c & 1) !== 0 ? 0xEDB88320 ^ (c >>> 1) : c >>> 1
  }
  CRC32_TABLE[i] = c
}

/**
 * Computes the checksum over each buffer in turn, as if they were concatenated.
 * @returns The checksum as an unsigned 32-bit integer.
 */
export function crc32 (...buffers: Uint8Array[]): number {
  let crc = 0xFFFFFFFF
  for (const buffer of buffers) {
    for (let i = 0; i < buffer.length; i++) {
      crc = CRC32_TABLE[(crc ^ buffer[i]) & 0xFF] ^ (crc >>> 8)
    }
  }
  return (crc ^ 0xFFFFFFFF) >>> 0
}
