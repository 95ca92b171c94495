import type { ResolvedLink } from '../../../shared/types.js'
import { normalizeMerchant } from '../normalize.js'
import { DEFAULT_SIMILARITY_THRESHOLD } from '../similarity.js'
import { errorMessage } from '../errors.js'
import { log, logWarn } from '../log.js'
import { KnownMerchantTable } from './knownMerchants.js'
import { LinkCache } from './linkCache.js'
import { RateLimiter } from './rateLimiter.js'
import { findCancellationLink, genericSearchUrl, type FetchLike } from './webLookup.js'

export interface LinkResolverOptions {
  knownMerchants: KnownMerchantTable
  cache: LinkCache
  limiter: RateLimiter
  matchThreshold?: number
  webLookup?: boolean
  searchUrl?: string
  acquireTimeoutMs?: number
  lookupTimeoutMs?: number
  fetchImpl?: FetchLike
  missTtlMs?: number // how long a merchant without a web link is skipped
  maxMisses?: number
  now?: () => number
}

/**
 * Anything that can turn a merchant into a cancellation link.
 */
export interface LinkSourceResolver {
  resolve(merchant: string): Promise<string>
}

/**
 * Resolves cancellation links: known table first, then the persistent cache,
 * then a rate-limited web lookup, and finally a generic search URL.
 * Never rejects.
 */
export class LinkResolver implements LinkSourceResolver {
  readonly knownMerchants: KnownMerchantTable
  readonly cache: LinkCache
  private readonly limiter: RateLimiter
  private readonly matchThreshold: number
  private readonly webLookup: boolean
  private readonly searchUrl: string
  private readonly acquireTimeoutMs: number
  private readonly lookupTimeoutMs: number
  private readonly fetchImpl: FetchLike | undefined
  private readonly missTtlMs: number
  private readonly maxMisses: number
  private readonly now: () => number
  // key -> time of the miss, oldest first
  private readonly misses = new Map<string, number>()
  private readonly inFlight = new Map<string, Promise<ResolvedLink>>()

  constructor(options: LinkResolverOptions) {
    this.knownMerchants = options.knownMerchants
    this.cache = options.cache
    this.limiter = options.limiter
    this.matchThreshold = options.matchThreshold ?? DEFAULT_SIMILARITY_THRESHOLD
    this.webLookup = options.webLookup ?? true
    this.searchUrl = options.searchUrl ?? 'https://html.duckduckgo.com/html/'
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 3000
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? 5000
    this.fetchImpl = options.fetchImpl
    this.missTtlMs = options.missTtlMs ?? 60 * 60 * 1000
    this.maxMisses = options.maxMisses ?? 1000
    this.now = options.now ?? Date.now
  }

  async resolve(merchant: string): Promise<string> {
    return (await this.resolveDetailed(merchant)).url
  }

  async resolveDetailed(merchant: string): Promise<ResolvedLink> {
    const known = this.knownMerchants.match(merchant, this.matchThreshold)
    if (known) return { merchant, url: known.url, source: 'known' }

    const key = normalizeMerchant(merchant)
    const cached = this.readCache(key)
    if (cached) return { merchant, url: cached, source: 'cache' }

    if (!this.webLookup || this.isKnownMiss(key)) return this.fallback(merchant)

    // Same merchant resolving twice at once shares one lookup
    const pending = this.inFlight.get(key)
    if (pending) return { ...(await pending), merchant }

    const lookup = this.lookup(merchant, key).finally(() => this.inFlight.delete(key))
    this.inFlight.set(key, lookup)
    return lookup
  }

  invalidate(merchantOrKey: string): boolean {
    const key = normalizeMerchant(merchantOrKey)
    this.misses.delete(key)
    return this.cache.invalidate(key)
  }

  close(): void {
    this.cache.close()
  }

  private isKnownMiss(key: string): boolean {
    const at = this.misses.get(key)
    if (at === undefined) return false
    if (this.now() - at < this.missTtlMs) return true
    this.misses.delete(key)
    return false
  }

  private recordMiss(key: string): void {
    this.misses.delete(key)
    this.misses.set(key, this.now())
    for (const oldest of this.misses.keys()) {
      if (this.misses.size <= this.maxMisses) break
      this.misses.delete(oldest)
    }
  }

  private fallback(merchant: string): ResolvedLink {
    return { merchant, url: genericSearchUrl(merchant), source: 'search' }
  }

  private readCache(key: string): string | null {
    try {
      return this.cache.get(key)?.url ?? null
    } catch (err) {
      logWarn('link-resolver', { message: 'cache read failed', key, error: errorMessage(err) })
      return null
    }
  }

  private async lookup(merchant: string, key: string): Promise<ResolvedLink> {
    const acquired = await this.limiter.acquire(this.acquireTimeoutMs)
    if (!acquired) {
      log('link-resolver', { message: 'rate limited, using search fallback', merchant })
      return this.fallback(merchant)
    }

    let url: string | null
    try {
      url = await findCancellationLink(merchant, {
        searchUrl: this.searchUrl,
        timeoutMs: this.lookupTimeoutMs,
        fetchImpl: this.fetchImpl,
      })
    } catch (err) {
      logWarn('link-resolver', { message: 'web lookup failed', merchant, error: errorMessage(err) })
      return this.fallback(merchant)
    }

    if (!url) {
      this.recordMiss(key)
      return this.fallback(merchant)
    }

    try {
      this.cache.set(key, url)
    } catch (err) {
      logWarn('link-resolver', { message: 'cache write failed', key, error: errorMessage(err) })
    }
    return { merchant, url, source: 'web' }
  }
}
