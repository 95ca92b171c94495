import type { LinkCacheEntry } from '../../../shared/types.js'
import { openCacheDatabase, type CacheDatabase } from '../db.js'

interface LinkCacheRow {
  key: string
  url: string
  resolved_at: string
}

function isRow(value: unknown): value is LinkCacheRow {
  return (
    typeof value === 'object' && value !== null &&
    'key' in value && typeof value.key === 'string' &&
    'url' in value && typeof value.url === 'string' &&
    'resolved_at' in value && typeof value.resolved_at === 'string'
  )
}

export interface LinkCacheOptions {
  ttlMs?: number | null
  now?: () => Date
}

/**
 * Persistent merchant key -> cancellation URL cache. Every write goes straight
 * to SQLite, so there is nothing to flush beyond closing the handle.
 */
export class LinkCache {
  private readonly db: CacheDatabase
  private readonly ttlMs: number | null
  private readonly now: () => Date

  constructor(filePath: string, options: LinkCacheOptions = {}) {
    this.db = openCacheDatabase(filePath)
    this.ttlMs = options.ttlMs ?? null
    this.now = options.now ?? (() => new Date())
  }

  get(key: string): LinkCacheEntry | null {
    const row: unknown = this.db.prepare('SELECT key, url, resolved_at FROM link_cache WHERE key = ?').get(key)
    if (!isRow(row)) return null

    if (this.ttlMs !== null) {
      const age = this.now().getTime() - new Date(row.resolved_at).getTime()
      if (age > this.ttlMs) return null
    }

    return { url: row.url, resolvedAt: row.resolved_at }
  }

  set(key: string, url: string): LinkCacheEntry {
    const entry: LinkCacheEntry = { url, resolvedAt: this.now().toISOString() }
    this.db
      .prepare('INSERT OR REPLACE INTO link_cache (key, url, resolved_at) VALUES (?, ?, ?)')
      .run(key, entry.url, entry.resolvedAt)
    return entry
  }

  invalidate(key: string): boolean {
    return this.db.prepare('DELETE FROM link_cache WHERE key = ?').run(key).changes > 0
  }

  entries(): [string, LinkCacheEntry][] {
    const rows: unknown[] = this.db.prepare('SELECT key, url, resolved_at FROM link_cache ORDER BY key').all()
    return rows.filter(isRow).map(r => [r.key, { url: r.url, resolvedAt: r.resolved_at }])
  }

  get size(): number {
    const row: unknown = this.db.prepare('SELECT COUNT(*) AS count FROM link_cache').get()
    if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
      return row.count
    }
    return 0
  }

  close(): void {
    if (this.db.open) this.db.close()
  }
}
