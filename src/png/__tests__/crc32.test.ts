import { describe, it, expect } from 'vitest'
import { crc32 } from '../crc32'

const encoder = new TextEncoder()

describe('crc32', () => {
  it('matches the CRC-32 check value', () => {
    expect(crc32(encoder.encode('123456789'))).toBe(3421780262)
  })

  it('matches the well-known IEND chunk checksum', () => {
    expect(crc32(encoder.encode('IEND'))).toBe(0xAE426082)
  })

  it('returns 0 for no input', () => {
    expect(crc32()).toBe(0)
    expect(crc32(new Uint8Array(0))).toBe(0)
  })

  it('treats several buffers as one concatenated buffer', () => {
    expect(crc32(encoder.encode('RuSt'), encoder.encode('abc'))).toBe(crc32(encoder.encode('RuStabc')))
    expect(crc32(encoder.encode('RuStabc'))).toBe(591569298)
  })

  it('always returns an unsigned value', () => {
    const value = crc32(encoder.encode('RuSt'))
    expect(value).toBe(3565422908)
    expect(value).toBeGreaterThan(0x7FFFFFFF)
  })
})
