/**
 * Name Resolver Metrics
 *
 * In-memory metrics collection for the resolution pipeline.
 * Designed for export to Prometheus, StatsD, or other backends.
 *
 * Metrics:
 * - resolver_datasets_total: Counter of datasets resolved
 * - resolver_rows_total: Counter by outcome (exact, fuzzy, override, unresolved)
 * - resolver_failures_total: Counter by error code
 * - resolver_scorer_errors_total: Counter of scoring calls that threw
 * - resolver_latency_ms: Histogram of per-dataset resolution time
 *
 * No high-cardinality labels (no dataset ids, names or row indices).
 */

import type { ErrorCode } from '../errors'

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type OutcomeLabel = 'exact' | 'fuzzy' | 'override' | 'unresolved'

export interface ResolverMetricsSnapshot {
  datasets: number
  rows: Record<OutcomeLabel, number>
  failures: Partial<Record<ErrorCode, number>>
  scorerErrors: number
  latency: {
    count: number
    sum: number
    buckets: Record<number, number> // bucket threshold -> count
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Histogram buckets (milliseconds)
// ═══════════════════════════════════════════════════════════════════════════════

const LATENCY_BUCKETS = [1, 5, 10, 50, 100, 250, 500, 1000, 5000]

// ═══════════════════════════════════════════════════════════════════════════════
// In-memory storage
// ═══════════════════════════════════════════════════════════════════════════════

let datasets = 0
let scorerErrors = 0
const rows = new Map<OutcomeLabel, number>()
const failures = new Map<ErrorCode, number>()
const latency = {
  count: 0,
  sum: 0,
  buckets: new Map<number, number>(),
}

// ═══════════════════════════════════════════════════════════════════════════════
// Metric recording functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Increment resolver_datasets_total
 * Call once per dataset after resolution completes
 */
export function recordDataset(): void {
  datasets++
}

export function recordOutcome(outcome: OutcomeLabel, count = 1): void {
  rows.set(outcome, (rows.get(outcome) ?? 0) + count)
}

/**
 * Increment resolver_failures_total
 * Call only for structural errors that abort a dataset
 */
export function recordFailure(code: ErrorCode): void {
  failures.set(code, (failures.get(code) ?? 0) + 1)
}

export function recordScorerError(): void {
  scorerErrors++
}

/**
 * Record resolver_latency_ms (cumulative buckets)
 */
export function recordLatency(durationMs: number): void {
  latency.count++
  latency.sum += durationMs

  for (const bucket of LATENCY_BUCKETS) {
    if (durationMs <= bucket) {
      latency.buckets.set(bucket, (latency.buckets.get(bucket) ?? 0) + 1)
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Snapshot & derived values
// ═══════════════════════════════════════════════════════════════════════════════

export function getMetricsSnapshot(): ResolverMetricsSnapshot {
  const buckets: Record<number, number> = {}
  for (const bucket of LATENCY_BUCKETS) {
    buckets[bucket] = latency.buckets.get(bucket) ?? 0
  }
  const failureCounts: Partial<Record<ErrorCode, number>> = {}
  for (const [code, count] of failures) {
    failureCounts[code] = count
  }

  return {
    datasets,
    rows: {
      exact: rows.get('exact') ?? 0,
      fuzzy: rows.get('fuzzy') ?? 0,
      override: rows.get('override') ?? 0,
      unresolved: rows.get('unresolved') ?? 0,
    },
    failures: failureCounts,
    scorerErrors,
    latency: { count: latency.count, sum: latency.sum, buckets },
  }
}

/**
 * Share of divergent rows that were resolved (fuzzy or override).
 * Returns 1 when nothing diverged.
 */
export function getResolutionRate(): number {
  const fuzzy = rows.get('fuzzy') ?? 0
  const override = rows.get('override') ?? 0
  const unresolved = rows.get('unresolved') ?? 0
  const divergent = fuzzy + override + unresolved
  return divergent === 0 ? 1 : (fuzzy + override) / divergent
}

/**
 * Reset all metrics (for testing)
 */
export function resetMetrics(): void {
  datasets = 0
  scorerErrors = 0
  rows.clear()
  failures.clear()
  latency.count = 0
  latency.sum = 0
  latency.buckets.clear()
}
