import fs from 'fs'
import path from 'path'
import { cleanMerchantName, normalizeMerchant } from '../normalize.js'
import { DEFAULT_SIMILARITY_THRESHOLD, similarity } from '../similarity.js'
import { log, logDebug, logWarn } from '../log.js'

export interface KnownMerchantMatch {
  name: string
  url: string
  score: number
}

interface TableEntry {
  name: string
  key: string
  url: string
}

function toEntries(data: unknown): Record<string, string> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return {}
  const entries: Record<string, string> = {}
  for (const [name, url] of Object.entries(data)) {
    if (typeof url === 'string' && url.trim() !== '') entries[name] = url
  }
  return entries
}

/**
 * Curated merchant name -> cancellation URL table, matched fuzzily.
 */
export class KnownMerchantTable {
  private readonly entries: TableEntry[] = []

  constructor(entries: Record<string, string> = {}, readonly filePath: string | null = null) {
    for (const [name, url] of Object.entries(entries)) this.add(name, url)
  }

  static load(filePath: string): KnownMerchantTable {
    if (!fs.existsSync(filePath)) {
      log('known-merchants', { message: 'no merchants file, starting empty', path: filePath })
      return new KnownMerchantTable({}, filePath)
    }

    try {
      const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
      const table = new KnownMerchantTable(toEntries(data), filePath)
      log('known-merchants', { message: 'loaded', path: filePath, count: table.size })
      return table
    } catch (err) {
      logWarn('known-merchants', {
        message: 'failed to read merchants file, starting empty',
        path: filePath,
        error: err instanceof Error ? err.message : String(err),
      })
      return new KnownMerchantTable({}, filePath)
    }
  }

  get size(): number {
    return this.entries.length
  }

  match(merchant: string, threshold = DEFAULT_SIMILARITY_THRESHOLD): KnownMerchantMatch | null {
    const candidates = [...new Set([normalizeMerchant(merchant), normalizeMerchant(cleanMerchantName(merchant))])]

    let best: KnownMerchantMatch | null = null
    for (const entry of this.entries) {
      for (const candidate of candidates) {
        const score = similarity(candidate, entry.key)
        if (best === null || score > best.score) {
          best = { name: entry.name, url: entry.url, score }
        }
      }
    }

    logDebug('known-merchants', { merchant, best })
    return best !== null && best.score > threshold ? best : null
  }

  /**
   * Adds or replaces a merchant. Names that normalize to nothing are ignored.
   */
  add(name: string, url: string): void {
    const key = normalizeMerchant(name)
    if (!key) return
    const existing = this.entries.find(e => e.name === name)
    if (existing) {
      existing.key = key
      existing.url = url
    } else {
      this.entries.push({ name, key, url })
    }
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.entries.map(e => [e.name, e.url]))
  }

  save(filePath: string | null = this.filePath): void {
    if (!filePath) throw new Error('Known merchants table has no file to save to')
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, JSON.stringify(this.toJSON(), null, 4) + '\n')
    log('known-merchants', { message: 'saved', path: filePath, count: this.size })
  }
}
