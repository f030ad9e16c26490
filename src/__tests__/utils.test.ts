import { describe, it, expect } from 'vitest'
import { bytesEqual, bytesToHex } from '../utils'

describe('bytesToHex', () => {
  it('pads each byte to two digits', () => {
    expect(bytesToHex(new Uint8Array([0x00, 0x0A, 0xFF]))).toBe('000aff')
  })
})

describe('bytesEqual', () => {
  it('compares length and content', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true)
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false)
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(false)
  })
})
