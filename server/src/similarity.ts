/**
 * Length of the longest common subsequence, two rolling rows.
 */
function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0

  let previous = new Array<number>(b.length + 1).fill(0)
  let current = new Array<number>(b.length + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1])
    }
    const swap = previous
    previous = current
    current = swap
  }

  return previous[b.length]
}

/**
 * Insertions plus deletions needed to turn `a` into `b`.
 */
export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b)
}

/**
 * Indel similarity ratio in [0, 100]. Two empty strings are identical (100);
 * an empty string against anything else scores 0.
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 100
  const total = a.length + b.length
  return (100 * (total - indelDistance(a, b))) / total
}

export const DEFAULT_SIMILARITY_THRESHOLD = 80

export function isSimilar(a: string, b: string, threshold = DEFAULT_SIMILARITY_THRESHOLD): boolean {
  return similarity(a, b) > threshold
}
