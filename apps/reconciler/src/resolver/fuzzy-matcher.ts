/**
 * Fuzzy matcher
 *
 * Finds the single best reference name for a mismatched raw name. A match is
 * accepted when its score is at or above the cutoff. One computation backs
 * both presentation modes:
 *
 * - padded: the accepted name, else the raw name itself (never absent)
 * - unpadded: the accepted name, else undefined
 *
 * Ties at the top score keep the earliest vocabulary entry. Matching never
 * throws; a scorer failure degrades to the no-match outcome.
 */

import { silentLogger, type ILogger } from '@concordance/logger'
import { ConfigurationError, ERROR_CODES } from '../errors'
import { recordScorerError } from './metrics'
import { DEFAULT_SCORING_STRATEGY } from './scoring'
import type { MatchCandidate, ScoringStrategy } from './types'

export const DEFAULT_MATCH_CUTOFF = 0.5

export interface FuzzyMatcherOptions {
  strategy?: ScoringStrategy
  cutoff?: number
  logger?: ILogger
}

export interface FuzzyMatcher {
  readonly strategy: ScoringStrategy
  readonly cutoff: number
  match(rawName: string, vocabulary: readonly string[]): MatchCandidate
  padded(candidate: MatchCandidate): string
  unpadded(candidate: MatchCandidate): string | undefined
}

export function createFuzzyMatcher(options: FuzzyMatcherOptions = {}): FuzzyMatcher {
  const strategy = options.strategy ?? DEFAULT_SCORING_STRATEGY
  const cutoff = options.cutoff ?? DEFAULT_MATCH_CUTOFF
  const log = (options.logger ?? silentLogger).child('fuzzy', { scorer: strategy.name })

  if (!Number.isFinite(cutoff) || cutoff < 0 || cutoff > 1) {
    throw new ConfigurationError(`Match cutoff must be within [0, 1], got ${cutoff}`, ERROR_CODES.CONFIGURATION_ERROR, {
      details: { cutoff },
    })
  }

  function match(rawName: string, vocabulary: readonly string[]): MatchCandidate {
    const noMatch: MatchCandidate = { rawName, confidence: 0 }
    if (rawName.trim().length === 0 || vocabulary.length === 0) {
      return noMatch
    }

    let bestName: string | undefined
    let bestScore = -1

    try {
      for (const name of vocabulary) {
        const score = clampScore(strategy.score(rawName, name))
        if (score > bestScore) {
          bestScore = score
          bestName = name
        }
      }
    } catch (error) {
      recordScorerError()
      log.warn('Scorer failed, treating as no match', { rawName }, error)
      return noMatch
    }

    if (bestName === undefined) {
      return noMatch
    }

    const candidate: MatchCandidate = { rawName, bestName, confidence: bestScore }
    if (bestScore >= cutoff) {
      candidate.matchedName = bestName
    }
    return candidate
  }

  return {
    strategy,
    cutoff,
    match,
    padded: (candidate) => candidate.matchedName ?? candidate.rawName,
    unpadded: (candidate) => candidate.matchedName,
  }
}

function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0
  return Math.min(1, Math.max(0, score))
}
