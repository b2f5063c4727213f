/**
 * Name Resolver Types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Divergence
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One row of the full outer join between registry and dataset names where
 * equality failed on either side.
 *
 * - referenceName without rawName: registry name with no dataset counterpart
 * - rawName without referenceName: dataset row that needs resolution
 */
export interface DivergenceRecord {
  primaryIndex?: number
  referenceName?: string
  ancillaryIndex?: number
  rawName?: string
}

export interface MismatchRecord extends DivergenceRecord {
  ancillaryIndex: number
  rawName: string
  primaryIndex?: undefined
  referenceName?: undefined
}

export function isMismatch(record: DivergenceRecord): record is MismatchRecord {
  return (
    record.referenceName === undefined &&
    record.rawName !== undefined &&
    record.ancillaryIndex !== undefined
  )
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scoring
// ═══════════════════════════════════════════════════════════════════════════════

export type ScorerName = 'token-sort' | 'gestalt' | 'levenshtein'

/**
 * Pluggable string-similarity function. Must be deterministic and return a
 * value in [0, 1], where 1 means identical.
 */
export interface ScoringStrategy {
  name: string
  version: string
  score(query: string, candidate: string): number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Matching
// ═══════════════════════════════════════════════════════════════════════════════

export interface MatchCandidate {
  rawName: string
  /** Set only when confidence clears the cutoff */
  matchedName?: string
  /** Best-scoring vocabulary entry, accepted or not (for curator review) */
  bestName?: string
  confidence: number
}

/**
 * Which reference names the fuzzy matcher may choose from.
 *
 * - unclaimed (default): only registry names no dataset row already matches
 *   exactly, so two rows never end up on one canonical name
 * - registry: every canonical name
 */
export type VocabularyMode = 'registry' | 'unclaimed'

// ═══════════════════════════════════════════════════════════════════════════════
// Overrides & Resolution
// ═══════════════════════════════════════════════════════════════════════════════

export interface Override {
  index: number
  correctedName: string
}

export type ResolutionSource = 'override' | 'fuzzy' | 'unresolved'

export interface Resolution {
  index: number
  /** Value stored in the dataset before this run */
  originalName: string
  /** Value after NameNormalizer; what divergence detection compared */
  normalizedName: string
  resolvedName: string
  source: ResolutionSource
  candidate: MatchCandidate
  /** Normalized name is empty or whitespace-only */
  malformed: boolean
}

export interface ResolutionCounts {
  rows: number
  exact: number
  fuzzy: number
  override: number
  unresolved: number
}

export interface ResolutionReport {
  datasetId: string
  /** Normalization rules the written names were produced with */
  normalizationVersion: string
  divergence: DivergenceRecord[]
  resolutions: Resolution[]
  /** Row indices whose stored name changed, ascending by dataset order */
  changed: number[]
  unresolved: Resolution[]
  /** Overrides targeting rows that had no divergence; not applied */
  inactiveOverrides: Override[]
  /** Applied overrides whose value is not a registry name */
  overridesOutsideRegistry: Override[]
  counts: ResolutionCounts
}
