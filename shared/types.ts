export interface TransactionRecord {
  date: string // ISO date
  merchant: string
  amount: number // signed; charges are usually positive on card statements
}

export type Frequency = 'weekly' | 'biweekly' | 'monthly' | 'irregular' | 'unknown'

export type LinkSource = 'known' | 'cache' | 'web' | 'search'

export interface AnnotatedGroup {
  id: string
  displayMerchant: string
  memberCount: number
  monthlyCost: number
  frequency: Frequency
  cancellationLink: string
  firstDate: string
  lastDate: string
  medianIntervalDays: number | null
  nextExpectedDate: string | null
  projectedMonthlyCost: number
  annualCost: number
  subscriptionLike: boolean
  transactions: TransactionRecord[]
}

export interface AnalysisResult {
  groups: AnnotatedGroup[]
  excluded: AnnotatedGroup[]
  totalMonthlySavings: number
  diagnostics: {
    recordCount: number
    groupCount: number
    singletonCount: number
  }
}

export interface LinkCacheEntry {
  url: string
  resolvedAt: string // ISO timestamp
}

export interface ResolvedLink {
  merchant: string
  url: string
  source: LinkSource
}
