import { describe, it, expect, vi, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { LinkCache } from '../linkCache.js'

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'link-cache-'))
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('LinkCache', () => {
  it('should read back what it stores', () => {
    const cache = new LinkCache(':memory:', { now: () => new Date('2024-03-01T12:00:00Z') })

    expect(cache.get('acmestreaming')).toBeNull()
    expect(cache.set('acmestreaming', 'https://acme.test/cancel')).toEqual({
      url: 'https://acme.test/cancel',
      resolvedAt: '2024-03-01T12:00:00.000Z',
    })
    expect(cache.get('acmestreaming')).toEqual({
      url: 'https://acme.test/cancel',
      resolvedAt: '2024-03-01T12:00:00.000Z',
    })
    expect(cache.size).toBe(1)
    cache.close()
  })

  it('should let the last write win', () => {
    const cache = new LinkCache(':memory:')
    cache.set('acme', 'https://one.test/cancel')
    cache.set('acme', 'https://two.test/cancel')

    expect(cache.get('acme')?.url).toBe('https://two.test/cancel')
    expect(cache.size).toBe(1)
    cache.close()
  })

  it('should invalidate entries', () => {
    const cache = new LinkCache(':memory:')
    cache.set('acme', 'https://acme.test/cancel')

    expect(cache.invalidate('acme')).toBe(true)
    expect(cache.invalidate('acme')).toBe(false)
    expect(cache.get('acme')).toBeNull()
    cache.close()
  })

  it('should list entries by key', () => {
    const cache = new LinkCache(':memory:', { now: () => new Date('2024-03-01T00:00:00Z') })
    cache.set('zeta', 'https://zeta.test/cancel')
    cache.set('alpha', 'https://alpha.test/cancel')

    expect(cache.entries()).toEqual([
      ['alpha', { url: 'https://alpha.test/cancel', resolvedAt: '2024-03-01T00:00:00.000Z' }],
      ['zeta', { url: 'https://zeta.test/cancel', resolvedAt: '2024-03-01T00:00:00.000Z' }],
    ])
    cache.close()
  })

  it('should expire entries older than the TTL', () => {
    let now = new Date('2024-03-01T00:00:00Z')
    const cache = new LinkCache(':memory:', { ttlMs: 60 * 60 * 1000, now: () => now })
    cache.set('acme', 'https://acme.test/cancel')

    now = new Date('2024-03-01T00:59:00Z')
    expect(cache.get('acme')?.url).toBe('https://acme.test/cancel')

    now = new Date('2024-03-01T02:00:00Z')
    expect(cache.get('acme')).toBeNull()
    cache.close()
  })

  it('should persist across instances', () => {
    const file = path.join(tempDir(), 'nested', 'cache.db')

    const first = new LinkCache(file)
    first.set('acme', 'https://acme.test/cancel')
    first.close()

    const second = new LinkCache(file)
    expect(second.get('acme')?.url).toBe('https://acme.test/cancel')
    second.close()
  })

  it('should treat an empty file as an empty cache', () => {
    const file = path.join(tempDir(), 'cache.db')
    fs.writeFileSync(file, '')

    const cache = new LinkCache(file)
    expect(cache.size).toBe(0)
    cache.close()
  })

  it('should fall back to an empty in-memory cache when the file is corrupt', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = path.join(tempDir(), 'cache.db')
    const garbage = 'this is not a database\n'.repeat(200)
    fs.writeFileSync(file, garbage)

    const cache = new LinkCache(file)

    expect(cache.size).toBe(0)
    cache.set('acme', 'https://acme.test/cancel')
    expect(cache.get('acme')?.url).toBe('https://acme.test/cancel')
    expect(fs.readFileSync(file, 'utf-8')).toBe(garbage)
    expect(warn).toHaveBeenCalledTimes(1)
    cache.close()
  })
})
