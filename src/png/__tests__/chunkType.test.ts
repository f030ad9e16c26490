import { describe, it, expect } from 'vitest'
import { ChunkType } from '../chunkType'
import { ChunkTypeError } from '../errors'

describe('ChunkType', () => {
  it('builds from bytes and renders as text', () => {
    const chunkType = ChunkType.fromBytes(new Uint8Array([82, 117, 83, 116]))
    expect(chunkType.toString()).toBe('RuSt')
    expect(Array.from(chunkType.bytes())).toEqual([82, 117, 83, 116])
  })

  it('builds from a string', () => {
    expect(ChunkType.fromString('RuSt').equals(ChunkType.fromBytes(new Uint8Array([82, 117, 83, 116])))).toBe(true)
    expect(ChunkType.fromString('RuSt').equals(ChunkType.fromString('Rust'))).toBe(false)
  })

  it('reads the property bits from letter case', () => {
    const chunkType = ChunkType.fromString('RuSt')
    expect(chunkType.isCritical()).toBe(true)
    expect(chunkType.isPublic()).toBe(false)
    expect(chunkType.isReservedBitValid()).toBe(true)
    expect(chunkType.isSafeToCopy()).toBe(true)
    expect(chunkType.isValid()).toBe(true)

    const ancillary = ChunkType.fromString('ruSt')
    expect(ancillary.isCritical()).toBe(false)

    const publicType = ChunkType.fromString('RUST')
    expect(publicType.isPublic()).toBe(true)
    expect(publicType.isSafeToCopy()).toBe(false)
  })

  it('is invalid when the reserved bit is set', () => {
    const chunkType = ChunkType.fromString('Rust')
    expect(chunkType.isReservedBitValid()).toBe(false)
    expect(chunkType.isValid()).toBe(false)
  })

  it('rejects non-letter bytes', () => {
    expect(() => ChunkType.fromString('Ru1t')).toThrow(ChunkTypeError)
    expect(() => ChunkType.fromBytes(new Uint8Array([82, 117, 0, 116]))).toThrow('Chunk type byte 2 is not an ASCII letter: 0x00')
  })

  it('rejects the wrong number of bytes', () => {
    expect(() => ChunkType.fromBytes(new Uint8Array([82, 117, 83]))).toThrow('Chunk type must be 4 bytes, got 3')
    expect(() => ChunkType.fromString('RuStX')).toThrow('Chunk type must be 4 characters, got 5')
  })

  it('rejects characters outside ASCII', () => {
    expect(() => ChunkType.fromString('RuSé')).toThrow('Chunk type character 3 is not ASCII')
  })

  it('does not share its bytes with callers', () => {
    const source = new Uint8Array([82, 117, 83, 116])
    const chunkType = ChunkType.fromBytes(source)
    source[0] = 0x41
    chunkType.bytes()[1] = 0x41
    expect(chunkType.toString()).toBe('RuSt')
  })
})
