import type { AppConfig } from '../config.js'
import { KnownMerchantTable } from './knownMerchants.js'
import { LinkCache } from './linkCache.js'
import { RateLimiter } from './rateLimiter.js'
import { LinkResolver } from './resolver.js'
import type { FetchLike } from './webLookup.js'

export { KnownMerchantTable } from './knownMerchants.js'
export { LinkCache } from './linkCache.js'
export { RateLimiter, systemClock, type Clock } from './rateLimiter.js'
export { LinkResolver, type LinkSourceResolver } from './resolver.js'
export { extractCancellationLink, findCancellationLink, genericSearchUrl, type FetchLike } from './webLookup.js'

export function createLinkResolver(config: AppConfig, fetchImpl?: FetchLike): LinkResolver {
  return new LinkResolver({
    knownMerchants: KnownMerchantTable.load(config.knownMerchantsPath),
    cache: new LinkCache(config.linkCachePath, { ttlMs: config.linkCacheTtlMs }),
    limiter: new RateLimiter(config.minRequestIntervalMs),
    matchThreshold: config.linkMatchThreshold,
    webLookup: config.webLookup,
    searchUrl: config.searchUrl,
    acquireTimeoutMs: config.acquireTimeoutMs,
    lookupTimeoutMs: config.lookupTimeoutMs,
    missTtlMs: config.linkMissTtlMs,
    fetchImpl,
  })
}
