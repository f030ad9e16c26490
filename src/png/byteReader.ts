/*
 *  Copyright (c) Microsoft Corporation.
 *  Licensed under the MIT license.
 */

/**
 * `ByteReader` reads big-endian fields from a buffer, advancing its position after each read.
 * @class ByteReader
 */
export class ByteReader {
  readonly #view: DataView
  readonly #bytes: Uint8Array

  /**
     * The current position within the buffer.
     * @private
     */
  #index: number

  constructor (buffer: Uint8Array) {
    this.#bytes = buffer
    this.#view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    this.#index = 0
  }

  /**
     * Reads a 32-bit unsigned big-endian integer.
     */
  uint32 = (): number => {
    return this.#view.getUint32(this.advance(4), false)
  }

  /**
     * Returns a view of the next `length` bytes. The view shares memory with the source.
     */
  bytes = (length: number): Uint8Array => {
    const start = this.advance(length)
    return this.#bytes.subarray(start, start + length)
  }

  /**
     * @throws {RangeError} When the read would go past the end of the buffer.
     */
  private advance (length: number): number {
    if (length < 0 || this.#index + length > this.#bytes.length) {
      throw new RangeError('Buffer too small')
    }
    const index = this.#index
    this.#index += length
    return index
  }
}
