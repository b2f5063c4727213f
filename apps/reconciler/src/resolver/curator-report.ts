/**
 * Curator report
 *
 * Read-only view of the mismatch surface for the person maintaining the
 * override ledger: every divergence record with the padded and unpadded
 * fuzzy results side by side. Nothing in the dataset is modified.
 */

import { NAME_NORMALIZATION_VERSION, normalizeCountryNames } from '@concordance/names'
import type { Dataset } from '../dataset'
import { detectDivergence, unclaimedReferenceNames } from './divergence'
import { createFuzzyMatcher, type FuzzyMatcher } from './fuzzy-matcher'
import type { ReferenceRegistry } from './registry'
import { isMismatch, type DivergenceRecord, type VocabularyMode } from './types'

export interface CuratorReportRow extends DivergenceRecord {
  /** Stored value before normalization (dataset-side records only) */
  originalName?: string
  padded?: string
  unpadded?: string
  bestName?: string
  confidence?: number
}

export interface CuratorReport {
  datasetId: string
  normalizationVersion: string
  scorer: string
  cutoff: number
  rows: CuratorReportRow[]
}

export interface CuratorReportOptions {
  matcher?: FuzzyMatcher
  vocabulary?: VocabularyMode
}

export function buildCuratorReport(
  dataset: Dataset,
  registry: ReferenceRegistry,
  options: CuratorReportOptions = {}
): CuratorReport {
  const matcher = options.matcher ?? createFuzzyMatcher()
  const stored = dataset.names()
  const normalized = normalizeCountryNames(stored.map((row) => row.name))
  const divergence = detectDivergence(
    registry,
    stored.map((row, i) => ({ index: row.index, name: normalized[i] }))
  )
  const storedByIndex = new Map(stored.map((row) => [row.index, row.name]))
  const vocabulary =
    options.vocabulary === 'registry' ? registry.names : unclaimedReferenceNames(divergence)

  const rows = divergence.map((record): CuratorReportRow => {
    if (!isMismatch(record)) return { ...record }

    const candidate = matcher.match(record.rawName, vocabulary)
    return {
      ...record,
      originalName: storedByIndex.get(record.ancillaryIndex),
      padded: matcher.padded(candidate),
      unpadded: matcher.unpadded(candidate),
      bestName: candidate.bestName,
      confidence: candidate.confidence,
    }
  })

  return {
    datasetId: dataset.id,
    normalizationVersion: NAME_NORMALIZATION_VERSION,
    scorer: matcher.strategy.name,
    cutoff: matcher.cutoff,
    rows,
  }
}

/**
 * Dataset-side rows only: what still needs an automated match or an override
 */
export function pendingRows(report: CuratorReport): CuratorReportRow[] {
  return report.rows.filter((row) => row.rawName !== undefined)
}
