/**
 * Reference registry: the canonical country names every dataset aligns to.
 *
 * Loaded once per run from the trusted dataset (population) and frozen.
 * Names are stored in normalized form, the same form every dataset name takes
 * before comparison. Empty names are skipped and duplicates keep their first
 * occurrence.
 */

import { normalizeCountryName } from '@concordance/names'
import type { Dataset, NamedRow } from '../dataset'

export class ReferenceRegistry {
  readonly entries: readonly Readonly<NamedRow>[]
  readonly names: readonly string[]
  private readonly lookup: ReadonlyMap<string, number>

  private constructor(entries: NamedRow[]) {
    const lookup = new Map<string, number>()
    const kept: NamedRow[] = []

    for (const { index, name: raw } of entries) {
      const name = normalizeCountryName(raw)
      if (name.trim().length === 0 || lookup.has(name)) continue
      lookup.set(name, index)
      kept.push(Object.freeze({ index, name }))
    }

    this.entries = Object.freeze(kept)
    this.names = Object.freeze(kept.map((entry) => entry.name))
    this.lookup = lookup
  }

  static fromNames(names: Iterable<string>): ReferenceRegistry {
    return new ReferenceRegistry([...names].map((name, index) => ({ index, name })))
  }

  /** Entry indices are the dataset's row indices */
  static fromDataset(dataset: Dataset): ReferenceRegistry {
    return new ReferenceRegistry(dataset.names())
  }

  get size(): number {
    return this.names.length
  }

  has(name: string): boolean {
    return this.lookup.has(name)
  }

  /** Source row index of a canonical name, or undefined */
  indexOf(name: string): number | undefined {
    return this.lookup.get(name)
  }
}
