import { describe, it, expect } from 'vitest'
import { groupRecurring, groupTransactions } from '../grouping.js'
import { cleanMerchantName, normalizeMerchant } from '../normalize.js'
import { similarity } from '../similarity.js'
import type { TransactionRecord } from '../../../shared/types.js'

function record(merchant: string, date = '2024-01-05', amount = 10): TransactionRecord {
  return { date, merchant, amount }
}

describe('groupTransactions', () => {
  it('should group merchant drift and drop singletons', () => {
    const records = [
      record('Netflix', '2024-01-05', 15.49),
      record('NETFLIX.COM', '2024-02-05', 15.49),
      record('Spotify', '2024-01-10', 9.99),
    ]

    const { groups, singletons } = groupTransactions(records)

    expect(groups).toHaveLength(1)
    expect(groups[0].key).toBe('netflix')
    expect(groups[0].displayMerchant).toBe('Netflix')
    expect(groups[0].members).toEqual([records[0], records[1]])
    expect(singletons.map(g => g.displayMerchant)).toEqual(['Spotify'])
  })

  it('should keep dissimilar merchants apart in creation order', () => {
    const records = [
      record('Netflix'), record('Spotify'), record('Hulu'),
      record('Hulu'), record('Spotify'), record('Netflix'),
    ]

    const groups = groupRecurring(records)

    expect(groups.map(g => g.key)).toEqual(['netflix', 'spotify', 'hulu'])
    expect(groups.every(g => g.members.length === 2)).toBe(true)
  })

  describe('matching strategy', () => {
    // A and B score 75 against each other; the probe scores 85 against A and 90 against B
    const probe = 'abcdefghijklmnopqrst'
    const a = 'xyzdefghijklmnopqrst'
    const b = 'abcdefghijklmnopqruv'

    it('should use fixtures that straddle the threshold', () => {
      expect(similarity(a, b)).toBe(75)
      expect(similarity(probe, a)).toBe(85)
      expect(similarity(probe, b)).toBe(90)
    })

    it('should attach to the first group that clears the threshold by default', () => {
      const { groups, singletons } = groupTransactions([record(a), record(b), record(probe)])

      expect(groups.map(g => g.key)).toEqual([a])
      expect(groups[0].members.map(r => r.merchant)).toEqual([a, probe])
      expect(singletons.map(g => g.key)).toEqual([b])
    })

    it('should attach to the closest group with the best-match strategy', () => {
      const { groups } = groupTransactions([record(a), record(b), record(probe)], { strategy: 'best-match' })

      expect(groups.map(g => g.key)).toEqual([b])
      expect(groups[0].members.map(r => r.merchant)).toEqual([b, probe])
    })
  })

  it('should never split identical keys, even at a threshold of 100', () => {
    const groups = groupRecurring([record('Acme'), record('ACME!!')], { threshold: 100 })

    expect(groups).toHaveLength(1)
    expect(groups[0].members).toHaveLength(2)
  })

  it('should treat empty keys as a normal group', () => {
    const groups = groupRecurring([record(''), record('***'), record('Hulu')])

    expect(groups).toHaveLength(1)
    expect(groups[0].key).toBe('')
    expect(groups[0].displayMerchant).toBe('')
  })

  it('should accept a custom key function', () => {
    const records = [record('Netflix'), record('AplPay NETFLIX INC.')]

    expect(groupRecurring(records)).toHaveLength(0)

    const groups = groupRecurring(records, { keyOf: m => normalizeMerchant(cleanMerchantName(m)) })
    expect(groups).toHaveLength(1)
    expect(groups[0].displayMerchant).toBe('Netflix')
  })

  it('should return nothing for no records', () => {
    expect(groupTransactions([])).toEqual({ groups: [], singletons: [] })
  })
})
