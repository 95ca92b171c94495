/**
 * Merchant name normalization.
 *
 * `normalizeMerchant` produces the grouping/lookup key: lowercase, letters and
 * digits only. `cleanMerchantName` strips statement noise (wallet prefixes,
 * corporate suffixes, store numbers, locations) from the raw text and is used
 * as a second candidate when looking merchants up in the known table.
 */

export function normalizeMerchant(raw: string): string {
  return raw.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '')
}

const WALLET_PREFIX = /^(?:aplpay|apple\s*pay|gglpay|google\s*pay|sq\s*\*|tst\s*\*|pp\s*\*|paypal\s*\*)\s*/i

// " in NEW YORK", " at Main St"
const LOCATION_TAIL = /\s+(?:in|at)\s+.*$/i

// Everything from the first suffix or reference marker onwards
const NOISE_TAIL =
  /\s*(?:\b(?:inc|ltd|corp)\b\.?|\b(?:llc|corporation|limited|subscription|membership|mem)\b|#\s*\d+|\*\S*\d\S*).*$/i

const COUNTRY_TAIL = /\s+(?:usa|us)$/i

const STATE_CODES = new Set([
  'AL', 'AK', 'AZ', 'AR', 'CA', 'CO', 'CT', 'DE', 'FL', 'GA', 'HI', 'ID', 'IL', 'IN', 'IA', 'KS', 'KY',
  'LA', 'ME', 'MD', 'MA', 'MI', 'MN', 'MS', 'MO', 'MT', 'NE', 'NV', 'NH', 'NJ', 'NM', 'NY', 'NC', 'ND',
  'OH', 'OK', 'OR', 'PA', 'RI', 'SC', 'SD', 'TN', 'TX', 'UT', 'VT', 'VA', 'WA', 'WV', 'WI', 'WY', 'DC',
])

function stripTrailingStateCodes(name: string): string {
  const words = name.split(' ')
  while (words.length > 1 && STATE_CODES.has(words[words.length - 1])) {
    words.pop()
  }
  return words.join(' ')
}

export function cleanMerchantName(raw: string): string {
  const collapsed = raw.replace(/\s+/g, ' ').trim()

  let name = collapsed.replace(WALLET_PREFIX, '')
  name = name.replace(LOCATION_TAIL, '')
  name = name.replace(NOISE_TAIL, '')
  name = name.replace(/\.com\b/gi, '')
  name = name.replace(/\s+/g, ' ').trim()
  name = stripTrailingStateCodes(name)
  name = name.replace(COUNTRY_TAIL, '')
  name = name.replace(/\bamzn\b/gi, 'Amazon')
  name = name.trim()

  return name || collapsed
}
