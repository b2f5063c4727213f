/**
 * Country Name Normalization
 *
 * Canonical-form transform applied to every raw country name before it is
 * compared against the reference registry. All datasets flow through this
 * module so that equality checks downstream are exact-string comparisons.
 *
 * Rules, in order:
 *   1. "_" becomes a single space
 *   2. parenthesized groups are removed with the whitespace around them
 *      ("Congo (Kinshasa)" -> "Congo"); a group between two words leaves one space
 *   3. NFKD decomposition, then every non-ASCII code point is dropped
 *
 * Casing and any other spacing are left as they are.
 */

/** Bump when normalization rules change (for audit of stored names) */
export const NAME_NORMALIZATION_VERSION = '1.0.0'

// Innermost group plus the whitespace around it
const PARENTHETICAL = /\s*\([^()]*\)\s*/
const NON_ASCII = /[^\x00-\x7F]/g

/**
 * Normalize a single country name.
 *
 * @returns The normalized name. May be "" when the input was only a
 *          parenthetical; callers treat that as an unresolved mismatch.
 */
export function normalizeCountryName(name: string): string {
  if (name.length === 0) return name

  let normalized = name.replace(/_/g, ' ')

  // One group per pass, innermost first, so nested and adjacent groups
  // are judged against the string as it stands
  let match = PARENTHETICAL.exec(normalized)
  while (match) {
    const start = match.index
    const end = start + match[0].length
    const between = start > 0 && end < normalized.length
    normalized = normalized.slice(0, start) + (between ? ' ' : '') + normalized.slice(end)
    match = PARENTHETICAL.exec(normalized)
  }

  normalized = normalized.normalize('NFKD').replace(NON_ASCII, '')

  return normalized
}

/**
 * Normalize a column of names. Returns a new array of the same length and
 * order; the input is never modified.
 */
export function normalizeCountryNames(names: readonly string[]): string[] {
  return names.map(normalizeCountryName)
}

/**
 * True when a name is empty or whitespace-only after normalization.
 */
export function isMalformedName(name: string): boolean {
  return normalizeCountryName(name).trim().length === 0
}
