import type { TransactionRecord } from '../../shared/types.js'
import { normalizeMerchant } from './normalize.js'
import { DEFAULT_SIMILARITY_THRESHOLD, similarity } from './similarity.js'
import { logDebug } from './log.js'

export interface RecurringGroup {
  key: string
  displayMerchant: string
  members: TransactionRecord[]
}

export type GroupingStrategy = 'first-match' | 'best-match'

export interface GroupingOptions {
  threshold?: number
  strategy?: GroupingStrategy
  keyOf?: (merchant: string) => string
}

export interface GroupingResult {
  groups: RecurringGroup[] // two or more members, creation order
  singletons: RecurringGroup[]
}

function findGroup(
  groups: RecurringGroup[],
  key: string,
  threshold: number,
  strategy: GroupingStrategy
): RecurringGroup | null {
  let best: RecurringGroup | null = null
  let bestScore = -1

  for (const group of groups) {
    // An identical key always joins, whatever the threshold
    const score = group.key === key ? 100 : similarity(key, group.key)
    const matches = group.key === key || score > threshold
    logDebug('grouping', { key, against: group.key, score })
    if (!matches) continue

    if (strategy === 'first-match') return group
    if (score > bestScore) {
      best = group
      bestScore = score
    }
  }

  return best
}

export function groupTransactions(
  records: readonly TransactionRecord[],
  options: GroupingOptions = {}
): GroupingResult {
  const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD
  const strategy = options.strategy ?? 'first-match'
  const keyOf = options.keyOf ?? normalizeMerchant

  const all: RecurringGroup[] = []

  for (const record of records) {
    const key = keyOf(record.merchant)
    const existing = findGroup(all, key, threshold, strategy)
    if (existing) {
      existing.members.push(record)
    } else {
      all.push({ key, displayMerchant: record.merchant, members: [record] })
    }
  }

  return {
    groups: all.filter(g => g.members.length >= 2),
    singletons: all.filter(g => g.members.length < 2),
  }
}

export function groupRecurring(
  records: readonly TransactionRecord[],
  options: GroupingOptions = {}
): RecurringGroup[] {
  return groupTransactions(records, options).groups
}
