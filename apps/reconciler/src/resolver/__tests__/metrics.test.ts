import { describe, it, expect, beforeEach } from 'vitest'
import { ERROR_CODES } from '../../errors'
import {
  getMetricsSnapshot,
  getResolutionRate,
  recordDataset,
  recordFailure,
  recordLatency,
  recordOutcome,
  resetMetrics,
} from '../metrics'

describe('resolver metrics', () => {
  beforeEach(() => {
    resetMetrics()
  })

  it('starts empty with a full resolution rate', () => {
    const snapshot = getMetricsSnapshot()
    expect(snapshot.datasets).toBe(0)
    expect(snapshot.rows).toEqual({ exact: 0, fuzzy: 0, override: 0, unresolved: 0 })
    expect(snapshot.failures).toEqual({})
    expect(getResolutionRate()).toBe(1)
  })

  it('counts outcomes and failures', () => {
    recordDataset()
    recordOutcome('exact', 5)
    recordOutcome('fuzzy', 2)
    recordOutcome('override')
    recordOutcome('unresolved')
    recordFailure(ERROR_CODES.CONFLICTING_OVERRIDE)
    recordFailure(ERROR_CODES.CONFLICTING_OVERRIDE)

    const snapshot = getMetricsSnapshot()
    expect(snapshot.datasets).toBe(1)
    expect(snapshot.rows).toEqual({ exact: 5, fuzzy: 2, override: 1, unresolved: 1 })
    expect(snapshot.failures).toEqual({ CONFLICTING_OVERRIDE: 2 })
    expect(getResolutionRate()).toBe(0.75)
  })

  it('fills cumulative latency buckets', () => {
    recordLatency(3)
    recordLatency(80)

    const { latency } = getMetricsSnapshot()
    expect(latency.count).toBe(2)
    expect(latency.sum).toBe(83)
    expect(latency.buckets[1]).toBe(0)
    expect(latency.buckets[5]).toBe(1)
    expect(latency.buckets[100]).toBe(2)
    expect(latency.buckets[5000]).toBe(2)
  })
})
