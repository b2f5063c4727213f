/**
 * Name Resolver
 *
 * Aligns every dataset's country-name column to the reference registry:
 * normalize, detect divergence, fuzzy match, overlay curated overrides, and
 * write the result back by row index.
 */

export { ReferenceRegistry } from './registry'
export { detectDivergence, mismatchedRows, unclaimedReferenceNames } from './divergence'
export { createFuzzyMatcher, DEFAULT_MATCH_CUTOFF } from './fuzzy-matcher'
export type { FuzzyMatcher, FuzzyMatcherOptions } from './fuzzy-matcher'
export {
  OverrideLedger,
  loadOverrideLedgers,
  readOverrideLedgerFile,
  overrideSchema,
  overrideLedgerFileSchema,
} from './override-ledger'
export { resolveDataset, resolveAll } from './pipeline'
export type { ResolveOptions, ResolveAllOptions } from './pipeline'
export { resolveDistinctNames, applyNameMapping, distinctNames } from './distinct'
export type { DistinctResolutionReport } from './distinct'
export { buildCuratorReport, pendingRows } from './curator-report'
export type { CuratorReport, CuratorReportRow, CuratorReportOptions } from './curator-report'
export { isMismatch } from './types'
export type {
  DivergenceRecord,
  MismatchRecord,
  MatchCandidate,
  Override,
  Resolution,
  ResolutionCounts,
  ResolutionReport,
  ResolutionSource,
  ScorerName,
  ScoringStrategy,
  VocabularyMode,
} from './types'

// Scoring strategies
export {
  DEFAULT_SCORING_STRATEGY,
  TokenSortStrategy,
  GestaltStrategy,
  LevenshteinStrategy,
  SCORER_NAMES,
  getScoringStrategy,
} from './scoring'

// Metrics exports
export {
  getMetricsSnapshot,
  getResolutionRate,
  resetMetrics,
} from './metrics'
export type { OutcomeLabel, ResolverMetricsSnapshot } from './metrics'
