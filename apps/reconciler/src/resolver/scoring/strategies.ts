/**
 * Scoring strategies built on the text-similarity measures.
 *
 * Each strategy carries a name and version so curator reports can record
 * which scorer produced a confidence value.
 */

import type { ScorerName, ScoringStrategy } from '../types'
import { gestaltRatio, levenshteinSimilarity, tokenSortRatio } from './text-similarity'

export const TokenSortStrategy: ScoringStrategy = {
  name: 'token-sort',
  version: '1.0.0',
  score: tokenSortRatio,
}

export const GestaltStrategy: ScoringStrategy = {
  name: 'gestalt',
  version: '1.0.0',
  score: gestaltRatio,
}

export const LevenshteinStrategy: ScoringStrategy = {
  name: 'levenshtein',
  version: '1.0.0',
  score: levenshteinSimilarity,
}

export const SCORING_STRATEGIES: Readonly<Record<ScorerName, ScoringStrategy>> = {
  'token-sort': TokenSortStrategy,
  gestalt: GestaltStrategy,
  levenshtein: LevenshteinStrategy,
}

export const SCORER_NAMES = ['token-sort', 'gestalt', 'levenshtein'] as const satisfies readonly ScorerName[]

export function getScoringStrategy(name: ScorerName): ScoringStrategy {
  return SCORING_STRATEGIES[name]
}
