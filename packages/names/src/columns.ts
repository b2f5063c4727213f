/**
 * Column header normalization.
 *
 * Source CSV headers arrive as "Gold Medal", " Total " or "Rank By Total".
 * Headers are trimmed and inner spaces become underscores so column lookups
 * are stable across files.
 */

export function normalizeColumnName(header: string): string {
  return header.trim().replace(/ /g, '_')
}

export function normalizeColumnNames(headers: readonly string[]): string[] {
  return headers.map(normalizeColumnName)
}
