/**
 * Text Similarity Module
 *
 * Character-level similarity measures for comparing country names.
 *
 * Design notes:
 * - Gestalt (Ratcliff/Obershelp) ratio is the primary measure: 2·M / T where M
 *   is the number of characters in matching blocks and T the total length
 * - Token sort applies the gestalt ratio after ordering words alphabetically,
 *   so "Korea, South" and "South Korea" compare as identical
 * - Levenshtein similarity is kept as an alternative strategy for typo-heavy
 *   sources
 */

/**
 * Tokenize a name for order-insensitive comparison
 *
 * Normalizations:
 * - Lowercase
 * - Punctuation becomes whitespace ("Korea, South" → ["korea", "south"])
 * - Split on whitespace
 * - Filter empty tokens
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0)
}

/**
 * Tokens sorted alphabetically and joined by single spaces
 */
export function sortedTokenString(text: string): string {
  return tokenize(text).sort().join(' ')
}

interface MatchingBlock {
  a: number
  b: number
  size: number
}

/**
 * Longest common block of a[aLo:aHi] and b[bLo:bHi].
 *
 * Among maximal blocks, returns the one starting earliest in `a`, then
 * earliest in `b`, which keeps the ratio deterministic.
 */
function longestMatch(
  a: string,
  aLo: number,
  aHi: number,
  positions: Map<string, number[]>,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { a: aLo, b: bLo, size: 0 }
  // Length of the block ending at b[j] for the previous row of `a`
  let previous = new Map<number, number>()

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>()
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue
      if (j >= bHi) break
      const size = (previous.get(j - 1) ?? 0) + 1
      current.set(j, size)
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size }
      }
    }
    previous = current
  }

  return best
}

/**
 * Total size of the matching blocks found by recursively taking the longest
 * common block and repeating on the pieces to its left and right.
 */
export function matchingCharacters(a: string, b: string): number {
  const positions = new Map<string, number[]>()
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j])
    if (list) {
      list.push(j)
    } else {
      positions.set(b[j], [j])
    }
  }

  let matched = 0
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]]

  while (queue.length > 0) {
    const next = queue.pop()
    if (!next) break
    const [aLo, aHi, bLo, bHi] = next
    const block = longestMatch(a, aLo, aHi, positions, bLo, bHi)
    if (block.size === 0) continue

    matched += block.size
    if (aLo < block.a && bLo < block.b) {
      queue.push([aLo, block.a, bLo, block.b])
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      queue.push([block.a + block.size, aHi, block.b + block.size, bHi])
    }
  }

  return matched
}

/**
 * Gestalt pattern-matching ratio between two texts, case-insensitive
 *
 * Returns 1 for two empty strings and 0 when exactly one is empty.
 */
export function gestaltRatio(text1: string, text2: string): number {
  const s1 = text1.toLowerCase()
  const s2 = text2.toLowerCase()
  const total = s1.length + s2.length

  if (total === 0) return 1
  if (s1.length === 0 || s2.length === 0) return 0
  if (s1 === s2) return 1

  return (2 * matchingCharacters(s1, s2)) / total
}

/**
 * Gestalt ratio of the alphabetically sorted tokens of both texts
 */
export function tokenSortRatio(text1: string, text2: string): number {
  const sorted1 = sortedTokenString(text1)
  const sorted2 = sortedTokenString(text2)

  if (sorted1.length === 0 || sorted2.length === 0) return 0

  return gestaltRatio(sorted1, sorted2)
}

/**
 * Compute normalized Levenshtein similarity between two texts
 *
 * Returns 1 - (editDistance / maxLength), clamped to [0, 1]
 */
export function levenshteinSimilarity(text1: string, text2: string): number {
  if (!text1 || !text2) return 0

  const s1 = text1.toLowerCase()
  const s2 = text2.toLowerCase()

  if (s1 === s2) return 1

  const m = s1.length
  const n = s2.length

  // Dynamic programming matrix
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0))

  // Base cases
  for (let i = 0; i <= m; i++) dp[i][0] = i
  for (let j = 0; j <= n; j++) dp[0][j] = j

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1
      dp[i][j] = Math.min(
        dp[i - 1][j] + 1, // deletion
        dp[i][j - 1] + 1, // insertion
        dp[i - 1][j - 1] + cost // substitution
      )
    }
  }

  const distance = dp[m][n]
  const maxLength = Math.max(m, n)

  return Math.max(0, 1 - distance / maxLength)
}
