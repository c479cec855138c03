import { describe, it, expect } from 'vitest'
import { createStaticRegistry, queryRegistry } from '../src/registry.js'

describe('registry', () => {
  describe('createStaticRegistry', () => {
    it('should answer membership synchronously', () => {
      const registry = createStaticRegistry(['sample', 'abc'])
      expect(registry.isAllocated('sample')).toBe(true)
      expect(registry.isAllocated('abc')).toBe(true)
      expect(registry.isAllocated('other')).toBe(false)
    })

    it('should accept any iterable', () => {
      const registry = createStaticRegistry(new Set(['sample']))
      expect(registry.isAllocated('sample')).toBe(true)
    })

    it('should reject syntactically invalid entries', () => {
      expect(() => createStaticRegistry(['sample', 'ab'])).toThrow(TypeError)
      expect(() => createStaticRegistry(['Sample'])).toThrow(
        'Invalid component "Sample": expected 3-6 lowercase ASCII letters',
      )
    })
  })

  describe('queryRegistry', () => {
    it('should wrap synchronous answers', async () => {
      const registry = createStaticRegistry(['sample'])
      expect(await queryRegistry(registry, 'sample')).toEqual({ ok: true, allocated: true })
      expect(await queryRegistry(registry, 'other')).toEqual({ ok: true, allocated: false })
    })

    it('should capture thrown errors', async () => {
      const error = new Error('boom')
      const answer = await queryRegistry(
        {
          isAllocated: () => {
            throw error
          },
        },
        'sample',
      )
      expect(answer).toEqual({ ok: false, error })
    })

    it('should capture rejected promises', async () => {
      const error = new Error('timeout')
      const answer = await queryRegistry({ isAllocated: () => Promise.reject(error) }, 'sample')
      expect(answer).toEqual({ ok: false, error })
    })
  })
})
