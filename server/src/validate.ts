import type { TransactionRecord } from '../../shared/types.js'
import { ValidationError } from './errors.js'
import { normalizeMerchant } from './normalize.js'

export interface AnalyzeRequest {
  records: TransactionRecord[]
  exclude: string[]
}

export type SavingsGroup = { [field: string]: unknown; id: string; monthlyCost: number }

export interface SavingsRequest {
  groups: SavingsGroup[]
  exclude: string[]
}

export interface MerchantRequest {
  merchant: string
  url: string
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function field(value: object, name: string): unknown {
  return Object.prototype.hasOwnProperty.call(value, name)
    ? Object.getOwnPropertyDescriptor(value, name)?.value
    : undefined
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false
  const d = new Date(value + 'T00:00:00Z')
  return !isNaN(d.getTime()) && d.toISOString().startsWith(value)
}

function parseRecord(value: unknown, index: number): TransactionRecord {
  if (!isObject(value)) throw new ValidationError(`records[${index}]: expected an object`)

  const date = field(value, 'date')
  const merchant = field(value, 'merchant')
  const amount = field(value, 'amount')

  if (typeof date !== 'string' || !isIsoDate(date)) {
    throw new ValidationError(`records[${index}]: date must be YYYY-MM-DD`)
  }
  if (typeof merchant !== 'string') {
    throw new ValidationError(`records[${index}]: merchant must be a string`)
  }
  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    throw new ValidationError(`records[${index}]: amount must be a finite number`)
  }

  return { date, merchant, amount }
}

function parseExclude(value: unknown): string[] {
  if (value === undefined) return []
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ValidationError('exclude must be an array of strings')
  }
  return value
}

export function parseAnalyzeRequest(body: unknown): AnalyzeRequest {
  if (!isObject(body)) throw new ValidationError('Request body must be a JSON object')
  const records = field(body, 'records')
  if (!Array.isArray(records)) throw new ValidationError('records must be an array')

  return {
    records: records.map((r: unknown, i) => parseRecord(r, i)),
    exclude: parseExclude(field(body, 'exclude')),
  }
}

export function parseSavingsRequest(body: unknown): SavingsRequest {
  if (!isObject(body)) throw new ValidationError('Request body must be a JSON object')
  const groups = field(body, 'groups')
  if (!Array.isArray(groups)) throw new ValidationError('groups must be an array')

  return {
    groups: groups.map((g: unknown, i): SavingsGroup => {
      if (!isObject(g)) throw new ValidationError(`groups[${i}]: expected an object`)
      const id = field(g, 'id')
      const monthlyCost = field(g, 'monthlyCost')
      if (typeof id !== 'string') throw new ValidationError(`groups[${i}]: id must be a string`)
      if (typeof monthlyCost !== 'number' || !Number.isFinite(monthlyCost)) {
        throw new ValidationError(`groups[${i}]: monthlyCost must be a finite number`)
      }
      return { ...Object.fromEntries(Object.entries(g)), id, monthlyCost }
    }),
    exclude: parseExclude(field(body, 'exclude')),
  }
}

export function parseMerchantRequest(body: unknown): MerchantRequest {
  if (!isObject(body)) throw new ValidationError('Request body must be a JSON object')
  const merchant = field(body, 'merchant')
  const url = field(body, 'url')

  if (typeof merchant !== 'string' || merchant.trim() === '') {
    throw new ValidationError('merchant must be a non-empty string')
  }
  if (normalizeMerchant(merchant) === '') {
    throw new ValidationError('merchant must contain a letter or digit')
  }
  if (typeof url !== 'string' || !/^https?:\/\//i.test(url) || !URL.canParse(url)) {
    throw new ValidationError('url must be an absolute http(s) URL')
  }
  return { merchant: merchant.trim(), url }
}
