/**
 * Distinct-name resolution for long series
 *
 * Series such as daily case counts repeat each country name on thousands of
 * rows. Their names are resolved once per distinct value, in first-appearance
 * order, and the results are mapped back onto every row. Override indices in
 * the ledger refer to positions in that distinct list.
 */

import { Dataset } from '../dataset'
import { resolveDataset, type ResolveOptions } from './pipeline'
import type { ReferenceRegistry } from './registry'
import type { ResolutionReport } from './types'

export interface DistinctResolutionReport extends ResolutionReport {
  /** Distinct stored names; report indices point into this list */
  distinctNames: string[]
  /** Series row indices whose name changed */
  seriesChanged: number[]
}

const DISTINCT_NAME_COLUMN = 'name'

export function distinctNames(dataset: Dataset): string[] {
  return [...new Set(dataset.names().map((row) => row.name))]
}

/**
 * Rename rows whose current name is a key of `mapping`.
 *
 * @returns Row indices that changed, in dataset order
 */
export function applyNameMapping(dataset: Dataset, mapping: ReadonlyMap<string, string>): number[] {
  const changed: number[] = []
  for (const { index, name } of dataset.names()) {
    const next = mapping.get(name)
    if (next !== undefined && next !== name) {
      dataset.setName(index, next)
      changed.push(index)
    }
  }
  return changed
}

export function resolveDistinctNames(
  dataset: Dataset,
  registry: ReferenceRegistry,
  options: ResolveOptions = {}
): DistinctResolutionReport {
  const names = distinctNames(dataset)
  const distinct = Dataset.fromRecords(
    dataset.id,
    DISTINCT_NAME_COLUMN,
    names.map((name) => ({ [DISTINCT_NAME_COLUMN]: name }))
  )

  const report = resolveDataset(distinct, registry, options)

  const mapping = new Map<string, string>()
  for (const index of report.changed) {
    mapping.set(names[index], distinct.getName(index))
  }

  return {
    ...report,
    distinctNames: names,
    seriesChanged: applyNameMapping(dataset, mapping),
  }
}
