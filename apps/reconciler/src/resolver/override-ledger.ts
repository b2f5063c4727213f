/**
 * Override ledger
 *
 * Curated, per-dataset corrections keyed by row index. An override always
 * beats the fuzzy matcher for the same row. Ledgers are static input to a
 * run: the engine never adds or persists entries.
 *
 * Ledger files are JSON documents keyed by dataset id:
 *
 * ```json
 * {
 *   "tokyo-2020": [{ "index": 14, "correctedName": "DR Congo" }]
 * }
 * ```
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigurationError, ConflictingOverrideError, ERROR_CODES, zodIssues } from '../errors'
import type { Override } from './types'

export const overrideSchema = z.object({
  index: z.number().int().nonnegative(),
  correctedName: z.string().trim().min(1),
})

export const overrideLedgerFileSchema = z.record(z.string().min(1), z.array(overrideSchema))

export class OverrideLedger {
  readonly datasetId: string
  private readonly overrides: ReadonlyMap<number, string>

  private constructor(datasetId: string, overrides: Map<number, string>) {
    this.datasetId = datasetId
    this.overrides = overrides
  }

  /**
   * Build a ledger. Identical duplicates collapse; two different values for
   * one index raise ConflictingOverrideError.
   */
  static fromEntries(datasetId: string, entries: Iterable<Override>): OverrideLedger {
    const overrides = new Map<number, string>()

    for (const entry of entries) {
      const parsed = overrideSchema.safeParse(entry)
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid override for dataset "${datasetId}"`,
          ERROR_CODES.INVALID_OVERRIDE_LEDGER,
          { datasetId, details: { issues: zodIssues(parsed.error) } }
        )
      }

      const { index, correctedName } = parsed.data
      const existing = overrides.get(index)
      if (existing !== undefined && existing !== correctedName) {
        throw new ConflictingOverrideError(datasetId, index, [existing, correctedName])
      }
      overrides.set(index, correctedName)
    }

    return new OverrideLedger(datasetId, overrides)
  }

  static empty(datasetId: string): OverrideLedger {
    return new OverrideLedger(datasetId, new Map())
  }

  get size(): number {
    return this.overrides.size
  }

  has(index: number): boolean {
    return this.overrides.has(index)
  }

  get(index: number): string | undefined {
    return this.overrides.get(index)
  }

  /** Entries in ascending index order */
  entries(): Override[] {
    return [...this.overrides]
      .sort(([a], [b]) => a - b)
      .map(([index, correctedName]) => ({ index, correctedName }))
  }
}

/**
 * Validate a parsed ledger document and build one ledger per dataset.
 * Conflicts inside any dataset's list are reported before anything resolves.
 */
export function loadOverrideLedgers(document: unknown): Map<string, OverrideLedger> {
  const parsed = overrideLedgerFileSchema.safeParse(document)
  if (!parsed.success) {
    throw new ConfigurationError('Override ledger document is invalid', ERROR_CODES.INVALID_OVERRIDE_LEDGER, {
      details: { issues: zodIssues(parsed.error) },
    })
  }

  const ledgers = new Map<string, OverrideLedger>()
  for (const [datasetId, entries] of Object.entries(parsed.data)) {
    ledgers.set(datasetId, OverrideLedger.fromEntries(datasetId, entries))
  }
  return ledgers
}

export function readOverrideLedgerFile(filePath: string): Map<string, OverrideLedger> {
  let document: unknown
  try {
    document = JSON.parse(readFileSync(filePath, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(`Cannot read override ledger ${filePath}`, ERROR_CODES.INVALID_OVERRIDE_LEDGER, {
      details: { filePath },
      cause: error,
    })
  }
  return loadOverrideLedgers(document)
}
