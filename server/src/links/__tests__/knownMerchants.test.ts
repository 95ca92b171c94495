import { describe, it, expect, vi, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { KnownMerchantTable } from '../knownMerchants.js'
import { loadConfig } from '../../config.js'

const NETFLIX = 'https://www.netflix.com/cancelplan'
const AMAZON = 'https://www.amazon.com/gp/primecentral'
const SPOTIFY = 'https://www.spotify.com/us/account/subscription/'
const CHATGPT = 'https://chat.openai.com/payments'

function table() {
  return new KnownMerchantTable({
    'Netflix': NETFLIX,
    'Amazon Prime': AMAZON,
    'Spotify': SPOTIFY,
    'ChatGPT Plus': CHATGPT,
  })
}

function tempFile(name: string): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'known-merchants-')), name)
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('KnownMerchantTable.match', () => {
  it('should match exact names', () => {
    expect(table().match('Netflix')).toEqual({ name: 'Netflix', url: NETFLIX, score: 100 })
  })

  it('should match statement variants of known merchants', () => {
    const cases: [string, string][] = [
      ['NETFLIX SUBSCRIPTION', NETFLIX],
      ['Amazon Prime*123', AMAZON],
      ['AMZN Prime', AMAZON],
      ['SPOTIFY USA', SPOTIFY],
      ['ChatGPT Plus Subscription', CHATGPT],
      ['AplPay NETFLIX INC.', NETFLIX],
      ['Netflix Corp. in NEW YORK', NETFLIX],
      ['NETFLIX #123 NY', NETFLIX],
    ]
    for (const [merchant, url] of cases) {
      expect(table().match(merchant)?.url).toBe(url)
    }
  })

  it('should not match unrelated merchants', () => {
    expect(table().match('Zorblax Widgets')).toBeNull()
    expect(table().match('')).toBeNull()
  })

  it('should require a score strictly above the threshold', () => {
    const t = new KnownMerchantTable({ Netflix: NETFLIX })

    expect(t.match('netflixcom', 80)?.url).toBe(NETFLIX)
    expect(t.match('netflixcom', 85)).toBeNull()
  })

  it('should match nothing when empty', () => {
    expect(new KnownMerchantTable().match('Netflix')).toBeNull()
  })
})

describe('KnownMerchantTable.add', () => {
  it('should add and replace merchants', () => {
    const t = table()
    t.add('Acme Streaming', 'https://acme.test/cancel')
    t.add('Netflix', 'https://www.netflix.com/account')

    expect(t.size).toBe(5)
    expect(t.match('ACME STREAMING LLC')?.url).toBe('https://acme.test/cancel')
    expect(t.match('Netflix')?.url).toBe('https://www.netflix.com/account')
  })

  it('should ignore names without letters or digits', () => {
    const t = new KnownMerchantTable()
    t.add('***', 'https://nowhere.test')
    expect(t.size).toBe(0)
  })
})

describe('KnownMerchantTable.load', () => {
  it('should start empty when the file is missing', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const t = KnownMerchantTable.load(tempFile('missing.json'))
    expect(t.size).toBe(0)
  })

  it('should start empty and warn when the file is not valid JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = tempFile('broken.json')
    fs.writeFileSync(file, '{ "Netflix": ')

    expect(KnownMerchantTable.load(file).size).toBe(0)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should skip entries that are not URL strings', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const file = tempFile('mixed.json')
    fs.writeFileSync(file, JSON.stringify({ Netflix: NETFLIX, Broken: 5, Empty: '' }))

    const t = KnownMerchantTable.load(file)
    expect(t.size).toBe(1)
    expect(t.toJSON()).toEqual({ Netflix: NETFLIX })
  })

  it('should save and load back added merchants', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const file = tempFile('merchants.json')
    const t = new KnownMerchantTable({ Netflix: NETFLIX }, file)
    t.add('Acme Streaming', 'https://acme.test/cancel')
    t.save()

    expect(KnownMerchantTable.load(file).toJSON()).toEqual({
      'Netflix': NETFLIX,
      'Acme Streaming': 'https://acme.test/cancel',
    })
  })

  it('should refuse to save without a file', () => {
    expect(() => new KnownMerchantTable().save()).toThrow('no file to save to')
  })

  it('should ship a curated table of at least 100 merchants', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const t = KnownMerchantTable.load(loadConfig({}).knownMerchantsPath)

    expect(t.size).toBeGreaterThanOrEqual(100)
    expect(t.match('NETFLIX.COM')?.url).toBe(NETFLIX)
    expect(t.match('Amazon Prime Mem')?.url).toBe(AMAZON)
  })
})
