import { AppError } from '../errors.js'
import { logDebug } from '../log.js'

export interface FetchResponse {
  ok: boolean
  status: number
  text(): Promise<string>
}

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> }
) => Promise<FetchResponse>

export interface WebLookupOptions {
  searchUrl: string
  timeoutMs: number
  fetchImpl?: FetchLike
}

const ANCHOR = /<a\b[^>]*?\bhref\s*=\s*(["'])(.*?)\1[^>]*>([\s\S]*?)<\/a>/gi
const SEARCH_HOST = /(?:^|\.)(?:google|duckduckgo|bing|yahoo)\.[a-z.]+$/i
const CANCEL_HINT = /cancel|unsubscribe/i
const REDIRECT_PARAMS = ['uddg', 'q', 'url', 'u']

export function genericSearchUrl(merchant: string): string {
  const params = new URLSearchParams({ q: `how to cancel ${merchant.trim()}` })
  return `https://www.google.com/search?${params}`
}

function decodeEntities(value: string): string {
  return value
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&')
}

// Search engines wrap result links in their own redirect URLs
function unwrapRedirect(url: URL): URL {
  for (const param of REDIRECT_PARAMS) {
    const target = url.searchParams.get(param)
    if (target && /^https?:\/\//i.test(target) && URL.canParse(target)) return new URL(target)
  }
  return url
}

/**
 * First result link on a search results page that points off the search
 * engine and mentions cancelling, in the URL or the link text.
 */
export function extractCancellationLink(html: string, baseUrl: string): string | null {
  for (const match of html.matchAll(ANCHOR)) {
    const href = decodeEntities(match[2]).trim()
    if (!href || !URL.canParse(href, baseUrl)) continue

    let url = new URL(href, baseUrl)
    if (SEARCH_HOST.test(url.hostname)) url = unwrapRedirect(url)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') continue
    if (SEARCH_HOST.test(url.hostname)) continue

    const text = decodeEntities(match[3].replace(/<[^>]*>/g, ' '))
    if (CANCEL_HINT.test(url.href) || CANCEL_HINT.test(text)) return url.href
  }
  return null
}

/**
 * Queries the search page for a merchant. Network failures, timeouts and
 * non-2xx responses reject; a page without a usable link gives null.
 */
export async function findCancellationLink(merchant: string, options: WebLookupOptions): Promise<string | null> {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch
  const url = new URL(options.searchUrl)
  url.searchParams.set('q', `cancel ${merchant.trim()} subscription`)

  const res = await fetchImpl(url.href, {
    signal: AbortSignal.timeout(options.timeoutMs),
    headers: { 'User-Agent': 'Mozilla/5.0 (compatible; recurring-charge-finder)' },
  })
  if (!res.ok) {
    throw new AppError(`Search request failed with status ${res.status}`, 'WEB_LOOKUP_FAILED', 502)
  }

  const link = extractCancellationLink(await res.text(), options.searchUrl)
  logDebug('web-lookup', { merchant, link })
  return link
}
