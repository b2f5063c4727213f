/**
 * Scoring Strategy Registry
 *
 * Export all scoring strategies and provide a default.
 * New strategies can be added here and selected via configuration.
 */

export {
  TokenSortStrategy,
  GestaltStrategy,
  LevenshteinStrategy,
  SCORING_STRATEGIES,
  SCORER_NAMES,
  getScoringStrategy,
} from './strategies'
export {
  gestaltRatio,
  tokenSortRatio,
  levenshteinSimilarity,
  matchingCharacters,
  tokenize,
  sortedTokenString,
} from './text-similarity'

// Re-export types for convenience
export type { ScoringStrategy, ScorerName } from '../types'

// ═══════════════════════════════════════════════════════════════════════════════
// Default Strategy
// ═══════════════════════════════════════════════════════════════════════════════

import { TokenSortStrategy } from './strategies'

/**
 * Default scoring strategy used by the fuzzy matcher
 * Currently: gestalt ratio over sorted tokens (word order insensitive)
 */
export const DEFAULT_SCORING_STRATEGY = TokenSortStrategy
