import type { Frequency, TransactionRecord } from '../../shared/types.js'
import type { RecurringGroup } from './grouping.js'

export interface EstimateOptions {
  intervalAnalysis?: boolean
}

export interface GroupEstimate {
  frequency: Frequency
  monthlyCost: number
  projectedMonthlyCost: number
  annualCost: number
  firstDate: string
  lastDate: string
  medianIntervalDays: number | null
  nextExpectedDate: string | null
  subscriptionLike: boolean
}

// Inclusive day ranges for the median gap between consecutive charges
const FREQUENCY_RANGES: [Frequency, number, number][] = [
  ['weekly', 6, 8],
  ['biweekly', 12, 16],
  ['monthly', 27, 32],
]

const chargesPerYear: Partial<Record<Frequency, number>> = { weekly: 52, biweekly: 26 }

export function classifyFrequency(medianDays: number): Frequency {
  for (const [frequency, min, max] of FREQUENCY_RANGES) {
    if (medianDays >= min && medianDays <= max) return frequency
  }
  return 'irregular'
}

export function daysBetween(a: string, b: string): number {
  const da = new Date(a + 'T00:00:00Z')
  const db = new Date(b + 'T00:00:00Z')
  return Math.round(Math.abs((db.getTime() - da.getTime()) / (1000 * 60 * 60 * 24)))
}

export function addDays(dateStr: string, days: number): string {
  const d = new Date(dateStr + 'T00:00:00Z')
  d.setUTCDate(d.getUTCDate() + Math.round(days))
  return d.toISOString().split('T')[0]
}

export function median(values: number[]): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 !== 0
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2
}

function sortByDate(records: readonly TransactionRecord[]): TransactionRecord[] {
  return [...records].sort((a, b) => a.date.localeCompare(b.date))
}

function gaps(sorted: TransactionRecord[]): number[] {
  const intervals: number[] = []
  for (let i = 1; i < sorted.length; i++) {
    intervals.push(daysBetween(sorted[i - 1].date, sorted[i].date))
  }
  return intervals
}

/**
 * Mean of the members' amounts. This is the documented monthly cost, not a
 * time-normalized projection.
 */
export function averageAmount(records: readonly TransactionRecord[]): number {
  if (records.length === 0) return 0
  return records.reduce((s, r) => s + r.amount, 0) / records.length
}

export interface SubscriptionPatternOptions {
  minOccurrences?: number
  maxDaysBetween?: number
  amountVarianceThreshold?: number // fraction of the cluster's first amount
}

/**
 * Stricter subscription test: cluster non-zero charges by amount, then require
 * a cluster with enough members and enough short gaps between them.
 */
export function isSubscriptionLike(
  records: readonly TransactionRecord[],
  options: SubscriptionPatternOptions = {}
): boolean {
  const minOccurrences = options.minOccurrences ?? 2
  const maxDaysBetween = options.maxDaysBetween ?? 35
  const variance = options.amountVarianceThreshold ?? 0.1

  const clusters: { base: number; members: TransactionRecord[] }[] = []
  for (const record of sortByDate(records)) {
    if (record.amount === 0) continue
    const cluster = clusters.find(
      c => Math.abs(record.amount - c.base) / Math.abs(c.base) <= variance
    )
    if (cluster) cluster.members.push(record)
    else clusters.push({ base: record.amount, members: [record] })
  }

  return clusters.some(c => {
    if (c.members.length < minOccurrences) return false
    const shortGaps = gaps(c.members).filter(d => d <= maxDaysBetween)
    return shortGaps.length > 0 && shortGaps.length >= minOccurrences - 1
  })
}

export function estimateGroup(group: RecurringGroup, options: EstimateOptions = {}): GroupEstimate {
  const sorted = sortByDate(group.members)
  const intervals = gaps(sorted)
  const monthlyCost = averageAmount(group.members)

  const medianIntervalDays = intervals.length > 0 ? median(intervals) : null
  let frequency: Frequency = 'unknown'
  if (options.intervalAnalysis !== false && medianIntervalDays !== null) {
    frequency = classifyFrequency(medianIntervalDays)
  }

  const perYear = chargesPerYear[frequency]
  const projectedMonthlyCost = perYear === undefined ? monthlyCost : (monthlyCost * perYear) / 12

  const lastDate = sorted[sorted.length - 1].date
  const periodic = frequency === 'weekly' || frequency === 'biweekly' || frequency === 'monthly'

  return {
    frequency,
    monthlyCost,
    projectedMonthlyCost,
    annualCost: projectedMonthlyCost * 12,
    firstDate: sorted[0].date,
    lastDate,
    medianIntervalDays,
    nextExpectedDate: periodic && medianIntervalDays !== null ? addDays(lastDate, medianIntervalDays) : null,
    subscriptionLike: isSubscriptionLike(group.members),
  }
}
