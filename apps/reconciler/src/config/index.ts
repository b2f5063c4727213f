/**
 * Reconciler configuration
 *
 * Read from environment variables and validated once per process.
 *
 * - CONCORDANCE_MATCH_CUTOFF: minimum fuzzy score to accept (0-1). Default: 0.5
 * - CONCORDANCE_SCORER: token-sort | gestalt | levenshtein. Default: token-sort
 * - CONCORDANCE_VOCABULARY: unclaimed | registry. Default: unclaimed
 */

import type { ILogger } from '@concordance/logger'
import { z } from 'zod'
import { ConfigurationError, ERROR_CODES, zodIssues } from '../errors'
import { createFuzzyMatcher, DEFAULT_MATCH_CUTOFF, type FuzzyMatcher } from '../resolver/fuzzy-matcher'
import { getScoringStrategy, SCORER_NAMES } from '../resolver/scoring'

const configSchema = z.object({
  CONCORDANCE_MATCH_CUTOFF: z.coerce.number().min(0).max(1).default(DEFAULT_MATCH_CUTOFF),
  CONCORDANCE_SCORER: z.enum(SCORER_NAMES).default('token-sort'),
  CONCORDANCE_VOCABULARY: z.enum(['unclaimed', 'registry']).default('unclaimed'),
})

export interface ReconcilerConfig {
  matchCutoff: number
  scorer: (typeof SCORER_NAMES)[number]
  vocabulary: 'registry' | 'unclaimed'
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ReconcilerConfig {
  const parsed = configSchema.safeParse({
    CONCORDANCE_MATCH_CUTOFF: blankToUndefined(env.CONCORDANCE_MATCH_CUTOFF),
    CONCORDANCE_SCORER: blankToUndefined(env.CONCORDANCE_SCORER),
    CONCORDANCE_VOCABULARY: blankToUndefined(env.CONCORDANCE_VOCABULARY),
  })

  if (!parsed.success) {
    throw new ConfigurationError('Invalid reconciler configuration', ERROR_CODES.CONFIGURATION_ERROR, {
      details: { issues: zodIssues(parsed.error) },
    })
  }

  return {
    matchCutoff: parsed.data.CONCORDANCE_MATCH_CUTOFF,
    scorer: parsed.data.CONCORDANCE_SCORER,
    vocabulary: parsed.data.CONCORDANCE_VOCABULARY,
  }
}

export function createMatcherFromConfig(config: ReconcilerConfig, logger?: ILogger): FuzzyMatcher {
  return createFuzzyMatcher({
    strategy: getScoringStrategy(config.scorer),
    cutoff: config.matchCutoff,
    logger,
  })
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}
