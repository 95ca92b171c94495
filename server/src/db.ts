import Database from 'better-sqlite3'
import fs from 'fs'
import path from 'path'
import { logWarn } from './log.js'

export type CacheDatabase = Database.Database

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS link_cache (
    key TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    resolved_at TEXT NOT NULL
  )
`

function prepare(db: CacheDatabase): CacheDatabase {
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA)
  // Touch the table so an unreadable file fails here rather than on first lookup
  db.prepare('SELECT COUNT(*) AS count FROM link_cache').get()
  return db
}

/**
 * Opens the link cache database. A missing file is created; a file SQLite
 * cannot read is left alone and an empty in-memory cache is used instead.
 */
export function openCacheDatabase(filePath: string): CacheDatabase {
  if (filePath === ':memory:') return prepare(new Database(':memory:'))

  let db: CacheDatabase | null = null
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    db = new Database(filePath)
    return prepare(db)
  } catch (err) {
    db?.close()
    logWarn('link-cache', {
      message: 'cache file unreadable, starting with an empty in-memory cache',
      path: filePath,
      error: err instanceof Error ? err.message : String(err),
    })
    return prepare(new Database(':memory:'))
  }
}
