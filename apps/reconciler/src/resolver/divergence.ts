/**
 * Divergence detection
 *
 * Full outer join of registry names and dataset names on exact string
 * equality, keeping only rows where one side is missing. The output is the
 * mismatch surface the fuzzy matcher has to resolve.
 *
 * Ordering: registry-only records in registry order, then dataset-only
 * records in dataset order. Every dataset row without an exact counterpart
 * appears exactly once.
 */

import type { NamedRow } from '../dataset'
import type { ReferenceRegistry } from './registry'
import { isMismatch, type DivergenceRecord, type MismatchRecord } from './types'

export function detectDivergence(
  registry: ReferenceRegistry,
  ancillary: readonly NamedRow[]
): DivergenceRecord[] {
  const claimed = new Set<string>()
  const datasetOnly: DivergenceRecord[] = []

  for (const row of ancillary) {
    if (registry.has(row.name)) {
      claimed.add(row.name)
    } else {
      datasetOnly.push({ ancillaryIndex: row.index, rawName: row.name })
    }
  }

  const registryOnly: DivergenceRecord[] = registry.entries
    .filter((entry) => !claimed.has(entry.name))
    .map((entry) => ({ primaryIndex: entry.index, referenceName: entry.name }))

  return [...registryOnly, ...datasetOnly]
}

export function mismatchedRows(records: readonly DivergenceRecord[]): MismatchRecord[] {
  return records.filter(isMismatch)
}

/**
 * Registry names no dataset row matched exactly
 */
export function unclaimedReferenceNames(records: readonly DivergenceRecord[]): string[] {
  const names: string[] = []
  for (const record of records) {
    if (record.referenceName !== undefined && record.rawName === undefined) {
      names.push(record.referenceName)
    }
  }
  return names
}
