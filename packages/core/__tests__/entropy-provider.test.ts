import { describe, it, expect } from 'vitest'
import { WebCryptoEntropyProvider } from '../src/web-crypto-entropy-provider.js'

describe('WebCryptoEntropyProvider', () => {
  const provider = new WebCryptoEntropyProvider()

  it('should return the requested number of bytes', () => {
    expect(provider.randomBytes(0)).toHaveLength(0)
    expect(provider.randomBytes(32)).toHaveLength(32)
  })

  it('should fill requests above the getRandomValues limit', () => {
    const bytes = provider.randomBytes(70_000)
    expect(bytes).toHaveLength(70_000)
    // the second chunk is filled too
    expect(bytes.subarray(65_536).some((b) => b !== 0)).toBe(true)
  })

  it('should not repeat itself', () => {
    expect(provider.randomBytes(32)).not.toEqual(provider.randomBytes(32))
  })
})
