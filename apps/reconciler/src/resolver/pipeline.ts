/**
 * Resolution pipeline
 *
 * Per dataset, strictly in sequence:
 *   normalize → detect divergence → fuzzy match (padded) → overlay overrides → apply
 *
 * Writes happen only after every stage succeeded, so a structural error
 * (ledger for another dataset, override index missing from the dataset)
 * leaves the dataset untouched. Only the name column is written, and only at
 * the indices listed in the report's `changed`.
 *
 * Re-running on a resolved dataset changes nothing: resolved names are
 * registry names (exact matches), and every other row resolves to the value
 * it already holds.
 */

import { silentLogger, type ILogger } from '@concordance/logger'
import { isMalformedName, NAME_NORMALIZATION_VERSION, normalizeCountryNames } from '@concordance/names'
import { createWorkflowLogger, type WorkflowLogger } from '../config/structured-log'
import type { Dataset, NamedRow } from '../dataset'
import { ConcordanceError, ConfigurationError, ERROR_CODES, IndexOutOfRangeError } from '../errors'
import { detectDivergence, mismatchedRows, unclaimedReferenceNames } from './divergence'
import { createFuzzyMatcher, type FuzzyMatcher } from './fuzzy-matcher'
import { recordDataset, recordFailure, recordLatency, recordOutcome } from './metrics'
import { OverrideLedger } from './override-ledger'
import type { ReferenceRegistry } from './registry'
import type {
  Override,
  Resolution,
  ResolutionCounts,
  ResolutionReport,
  ResolutionSource,
  VocabularyMode,
} from './types'

export interface ResolveOptions {
  matcher?: FuzzyMatcher
  ledger?: OverrideLedger
  vocabulary?: VocabularyMode
  logger?: ILogger
}

export function resolveDataset(
  dataset: Dataset,
  registry: ReferenceRegistry,
  options: ResolveOptions = {}
): ResolutionReport {
  const startedAt = Date.now()
  const log = createWorkflowLogger(options.logger ?? silentLogger, {
    workflow: 'resolve',
    stage: 'validate',
    datasetId: dataset.id,
  })

  try {
    const report = runPipeline(dataset, registry, options, log)
    recordDataset()
    recordLatency(Date.now() - startedAt)
    return report
  } catch (error) {
    if (error instanceof ConcordanceError) {
      recordFailure(error.code)
    }
    log.error('Dataset resolution aborted', { durationMs: Date.now() - startedAt }, error)
    throw error
  }
}

function runPipeline(
  dataset: Dataset,
  registry: ReferenceRegistry,
  options: ResolveOptions,
  log: WorkflowLogger
): ResolutionReport {
  const matcher = options.matcher ?? createFuzzyMatcher({ logger: options.logger })
  const ledger = options.ledger ?? OverrideLedger.empty(dataset.id)
  const vocabularyMode = options.vocabulary ?? 'unclaimed'

  // ── validate ────────────────────────────────────────────────────────────────
  if (ledger.datasetId !== dataset.id) {
    throw new ConfigurationError(
      `Override ledger for "${ledger.datasetId}" passed to dataset "${dataset.id}"`,
      ERROR_CODES.LEDGER_DATASET_MISMATCH,
      { datasetId: dataset.id, details: { ledgerDatasetId: ledger.datasetId } }
    )
  }
  for (const override of ledger.entries()) {
    if (!dataset.has(override.index)) {
      throw new IndexOutOfRangeError(dataset.id, override.index, 'override')
    }
  }

  // ── normalize ───────────────────────────────────────────────────────────────
  const stored = dataset.names()
  const normalized = normalizeCountryNames(stored.map((row) => row.name))
  const normalizedRows: NamedRow[] = stored.map((row, i) => ({ index: row.index, name: normalized[i] }))
  const storedByIndex = new Map(stored.map((row) => [row.index, row.name]))

  // ── detect ──────────────────────────────────────────────────────────────────
  const divergence = detectDivergence(registry, normalizedRows)
  const mismatches = mismatchedRows(divergence)
  log.child({ stage: 'detect' }).debug('Divergence detected', {
    records: divergence.length,
    mismatches: mismatches.length,
  })

  // ── match ───────────────────────────────────────────────────────────────────
  const vocabulary = vocabularyMode === 'registry' ? registry.names : unclaimedReferenceNames(divergence)
  const firstPass = mismatches.map((record) => {
    const candidate = matcher.match(record.rawName, vocabulary)
    return { record, candidate, fuzzyName: matcher.padded(candidate) }
  })

  // ── override ────────────────────────────────────────────────────────────────
  const mismatchedIndices = new Set(mismatches.map((record) => record.ancillaryIndex))
  const resolutions: Resolution[] = firstPass.map(({ record, candidate, fuzzyName }) => {
    const override = ledger.get(record.ancillaryIndex)
    const originalName = storedByIndex.get(record.ancillaryIndex) ?? record.rawName
    const malformed = isMalformedName(record.rawName)
    const source: ResolutionSource =
      override !== undefined ? 'override' : candidate.matchedName !== undefined ? 'fuzzy' : 'unresolved'
    // A blank normalized name is never written over the stored value
    const fallback = malformed ? originalName : fuzzyName
    return {
      index: record.ancillaryIndex,
      originalName,
      normalizedName: record.rawName,
      resolvedName: override ?? fallback,
      source,
      candidate,
      malformed,
    }
  })

  const inactiveOverrides = ledger.entries().filter((entry) => !mismatchedIndices.has(entry.index))
  const overridesOutsideRegistry: Override[] = resolutions
    .filter((resolution) => resolution.source === 'override' && !registry.has(resolution.resolvedName))
    .map((resolution) => ({ index: resolution.index, correctedName: resolution.resolvedName }))

  // ── apply ───────────────────────────────────────────────────────────────────
  const writes = new Map<number, string>()
  for (const row of normalizedRows) {
    if (!mismatchedIndices.has(row.index) && row.name !== storedByIndex.get(row.index)) {
      writes.set(row.index, row.name)
    }
  }
  for (const resolution of resolutions) {
    if (resolution.resolvedName !== resolution.originalName) {
      writes.set(resolution.index, resolution.resolvedName)
    }
  }
  for (const index of writes.keys()) {
    if (!dataset.has(index)) {
      throw new IndexOutOfRangeError(dataset.id, index, 'match')
    }
  }
  for (const [index, name] of writes) {
    dataset.setName(index, name)
  }

  const changed = stored.map((row) => row.index).filter((index) => writes.has(index))
  const unresolved = resolutions.filter((resolution) => resolution.source === 'unresolved')
  const counts = countOutcomes(stored.length, resolutions)

  recordOutcome('exact', counts.exact)
  recordOutcome('fuzzy', counts.fuzzy)
  recordOutcome('override', counts.override)
  recordOutcome('unresolved', counts.unresolved)

  const applyLog = log.child({ stage: 'apply' })
  if (unresolved.length > 0) {
    applyLog.warn('Unresolved names need curator review', {
      count: unresolved.length,
      names: unresolved.map((resolution) => resolution.normalizedName),
      malformed: unresolved.filter((resolution) => resolution.malformed).map((resolution) => resolution.index),
    })
  }
  if (inactiveOverrides.length > 0) {
    applyLog.warn('Overrides target rows without divergence and were not applied', {
      indices: inactiveOverrides.map((entry) => entry.index),
    })
  }
  if (overridesOutsideRegistry.length > 0) {
    applyLog.warn('Overrides point at names outside the registry', {
      indices: overridesOutsideRegistry.map((entry) => entry.index),
    })
  }
  applyLog.info('Dataset resolved', { ...counts, changed: changed.length, scorer: matcher.strategy.name })

  return {
    datasetId: dataset.id,
    normalizationVersion: NAME_NORMALIZATION_VERSION,
    divergence,
    resolutions,
    changed,
    unresolved,
    inactiveOverrides,
    overridesOutsideRegistry,
    counts,
  }
}

function countOutcomes(rows: number, resolutions: readonly Resolution[]): ResolutionCounts {
  const counts: ResolutionCounts = { rows, exact: rows - resolutions.length, fuzzy: 0, override: 0, unresolved: 0 }
  for (const resolution of resolutions) {
    counts[resolution.source]++
  }
  return counts
}

// ═══════════════════════════════════════════════════════════════════════════════
// Multi-dataset runs
// ═══════════════════════════════════════════════════════════════════════════════

export interface ResolveAllOptions extends Omit<ResolveOptions, 'ledger'> {
  ledgers?: ReadonlyMap<string, OverrideLedger>
}

/**
 * Resolve each dataset end-to-end, one after another. Datasets share nothing
 * but the read-only registry, so the order does not affect any result.
 * Stops at the first structural error.
 */
export function resolveAll(
  datasets: readonly Dataset[],
  registry: ReferenceRegistry,
  options: ResolveAllOptions = {}
): Map<string, ResolutionReport> {
  const { ledgers, ...shared } = options
  const ids = new Set(datasets.map((dataset) => dataset.id))
  if (ids.size !== datasets.length) {
    throw new ConfigurationError('Dataset ids must be unique within a run', ERROR_CODES.CONFIGURATION_ERROR, {
      details: { ids: datasets.map((dataset) => dataset.id) },
    })
  }

  const unused = [...(ledgers?.keys() ?? [])].filter((id) => !ids.has(id))
  if (unused.length > 0) {
    const logger = options.logger ?? silentLogger
    logger.warn('Override ledgers supplied for unknown datasets', { datasetIds: unused })
  }

  const reports = new Map<string, ResolutionReport>()
  for (const dataset of datasets) {
    reports.set(dataset.id, resolveDataset(dataset, registry, { ...shared, ledger: ledgers?.get(dataset.id) }))
  }
  return reports
}
