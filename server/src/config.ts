import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { ConfigError } from './errors.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export interface AppConfig {
  port: number
  linkCachePath: string
  knownMerchantsPath: string
  groupSimilarityThreshold: number
  linkMatchThreshold: number
  webLookup: boolean
  searchUrl: string
  minRequestIntervalMs: number
  acquireTimeoutMs: number
  lookupTimeoutMs: number
  linkCacheTtlMs: number | null
  linkMissTtlMs: number
}

type Env = Record<string, string | undefined>

// server/data sits beside src when run from source, and three levels up from dist/server/src
function resolveDataDir(): string {
  const candidates = [
    path.join(__dirname, '..', 'data'),
    path.join(__dirname, '..', '..', '..', 'server', 'data'),
  ]
  return candidates.find(dir => fs.existsSync(dir)) ?? candidates[0]
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`)
  }
  return value
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = raw.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(value)) return true
  if (['0', 'false', 'no', 'off'].includes(value)) return false
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`)
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = resolveDataDir()
  const ttl = readNumber(env, 'LINK_CACHE_TTL_MS', 0)

  return {
    port: readNumber(env, 'PORT', 3001),
    linkCachePath: env.LINK_CACHE_PATH || path.join(dataDir, 'link-cache.db'),
    knownMerchantsPath: env.KNOWN_MERCHANTS_PATH || path.join(dataDir, 'known_merchants.json'),
    groupSimilarityThreshold: readNumber(env, 'GROUP_SIMILARITY_THRESHOLD', 80),
    linkMatchThreshold: readNumber(env, 'LINK_MATCH_THRESHOLD', 80),
    webLookup: readBoolean(env, 'WEB_LOOKUP', true),
    searchUrl: env.SEARCH_URL || 'https://html.duckduckgo.com/html/',
    minRequestIntervalMs: readNumber(env, 'MIN_REQUEST_INTERVAL_MS', 2000),
    acquireTimeoutMs: readNumber(env, 'ACQUIRE_TIMEOUT_MS', 3000),
    lookupTimeoutMs: readNumber(env, 'LOOKUP_TIMEOUT_MS', 5000),
    linkCacheTtlMs: ttl > 0 ? ttl : null,
    linkMissTtlMs: readNumber(env, 'LINK_MISS_TTL_MS', 60 * 60 * 1000),
  }
}
