import { describe, it, expect } from 'vitest'
import { crc32, computeChecksum } from '../src/crc32.js'
import { asciiBytes } from '../src/encoding.js'

describe('crc32', () => {
  it('should match the standard check value', () => {
    expect(crc32(asciiBytes('123456789'))).toBe(0xcbf43926)
  })

  it('should return 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0)
  })

  it('should return an unsigned value', () => {
    const value = crc32(asciiBytes('0'.repeat(27)))
    expect(value).toBe(0x816710bc)
    expect(value).toBeGreaterThan(0x7fffffff)
  })

  it('should checksum 27 z characters', () => {
    expect(crc32(asciiBytes('z'.repeat(27)))).toBe(0x39df34dc)
  })

  it('should depend on byte order', () => {
    expect(crc32(new Uint8Array([1, 2]))).not.toBe(crc32(new Uint8Array([2, 1])))
  })

  describe('computeChecksum', () => {
    it('should encode the CRC of the entropy characters at width 6', () => {
      expect(computeChecksum('0'.repeat(27))).toBe('2MvMGi')
      expect(computeChecksum('z'.repeat(27))).toBe('13hv5A')
      expect(computeChecksum('abcdefghijklmnopqrstuvwxyz0')).toBe('1C7HyC')
    })

    it('should keep the zero padding for small values', () => {
      expect(computeChecksum('')).toBe('000000')
    })
  })
})
