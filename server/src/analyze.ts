import type { AnalysisResult, AnnotatedGroup, TransactionRecord } from '../../shared/types.js'
import { groupTransactions, type GroupingOptions, type RecurringGroup } from './grouping.js'
import { estimateGroup, type EstimateOptions } from './recurring.js'
import { normalizeMerchant } from './normalize.js'
import type { LinkSourceResolver } from './links/resolver.js'
import { log } from './log.js'

export interface AnalyzeOptions {
  grouping?: GroupingOptions
  estimate?: EstimateOptions
  exclude?: Iterable<string> // merchant names or group ids
}

export interface Costed {
  id: string
  monthlyCost: number
}

export interface SavingsSummary<G extends Costed = AnnotatedGroup> {
  groups: G[]
  excluded: G[]
  totalMonthlySavings: number
}

export function totalMonthlySavings(groups: readonly Costed[]): number {
  return groups.reduce((s, g) => s + g.monthlyCost, 0)
}

/**
 * Splits already-annotated groups into kept and excluded and re-sums the
 * savings over what is kept. Grouping is not re-run.
 */
export function applyExclusions<G extends Costed>(
  groups: readonly G[],
  exclude: Iterable<string> = []
): SavingsSummary<G> {
  const excludedIds = new Set<string>()
  for (const entry of exclude) excludedIds.add(normalizeMerchant(entry))

  const kept = groups.filter(g => !excludedIds.has(g.id))
  const excluded = groups.filter(g => excludedIds.has(g.id))

  return { groups: kept, excluded, totalMonthlySavings: totalMonthlySavings(kept) }
}

function annotate(group: RecurringGroup, cancellationLink: string, options: EstimateOptions): AnnotatedGroup {
  const estimate = estimateGroup(group, options)
  return {
    id: group.key,
    displayMerchant: group.displayMerchant,
    memberCount: group.members.length,
    cancellationLink,
    ...estimate,
    transactions: [...group.members],
  }
}

export async function analyzeRecords(
  records: readonly TransactionRecord[],
  links: LinkSourceResolver,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const { groups, singletons } = groupTransactions(records, options.grouping)

  const cancellationLinks = await Promise.all(groups.map(g => links.resolve(g.displayMerchant)))
  const annotated = groups.map((g, i) => annotate(g, cancellationLinks[i], options.estimate ?? {}))

  const summary = applyExclusions(annotated, options.exclude)

  log('analyze', {
    records: records.length,
    groups: annotated.length,
    singletons: singletons.length,
    excluded: summary.excluded.length,
  })

  return {
    ...summary,
    diagnostics: {
      recordCount: records.length,
      groupCount: annotated.length,
      singletonCount: singletons.length,
    },
  }
}
