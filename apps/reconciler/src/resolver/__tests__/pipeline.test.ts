import { describe, it, expect, beforeEach } from 'vitest'
import { createLogger, type LogEntry } from '@concordance/logger'
import { NAME_NORMALIZATION_VERSION } from '@concordance/names'
import { Dataset } from '../../dataset'
import { ConcordanceError, ConfigurationError, ERROR_CODES, IndexOutOfRangeError } from '../../errors'
import { createFuzzyMatcher } from '../fuzzy-matcher'
import { getMetricsSnapshot, getResolutionRate, resetMetrics } from '../metrics'
import { OverrideLedger } from '../override-ledger'
import { resolveAll, resolveDataset } from '../pipeline'
import { ReferenceRegistry } from '../registry'

const registry = ReferenceRegistry.fromNames(['DR Congo', 'South Korea', 'United Kingdom'])

function olympics(): Dataset {
  return new Dataset('olympics', 'Team', [
    { index: 3, values: { Team: 'South Korea', Gold: 6 } },
    { index: 7, values: { Team: 'United_Kingdom', Gold: 22 } },
    { index: 14, values: { Team: 'Congo_(Kinshasa)', Gold: 0 } },
  ])
}

function captureLogger() {
  const entries: LogEntry[] = []
  const logger = createLogger('reconciler', { level: 'debug', format: 'json', sink: (entry) => entries.push(entry) })
  return { entries, logger }
}

describe('resolveDataset', () => {
  beforeEach(() => {
    resetMetrics()
  })

  it('resolves reordered names through the fuzzy matcher', () => {
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: 'Korea, South' } }])

    const report = resolveDataset(dataset, registry)

    expect(dataset.getName(0)).toBe('South Korea')
    expect(report.changed).toEqual([0])
    expect(report.normalizationVersion).toBe(NAME_NORMALIZATION_VERSION)
    expect(report.resolutions).toHaveLength(1)
    expect(report.resolutions[0]).toMatchObject({
      index: 0,
      originalName: 'Korea, South',
      normalizedName: 'Korea, South',
      resolvedName: 'South Korea',
      source: 'fuzzy',
      malformed: false,
    })
  })

  it('leaves unmatched names as they are and reports them', () => {
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: 'Quuxland' } }])

    const report = resolveDataset(dataset, registry)

    expect(dataset.getName(0)).toBe('Quuxland')
    expect(report.changed).toEqual([])
    expect(report.unresolved.map((resolution) => resolution.resolvedName)).toEqual(['Quuxland'])
    expect(report.divergence).toContainEqual({ ancillaryIndex: 0, rawName: 'Quuxland' })
  })

  it('writes normalized names that now match exactly', () => {
    const dataset = olympics()

    const report = resolveDataset(dataset, registry, { matcher: createFuzzyMatcher({ cutoff: 0.8 }) })

    expect(dataset.getName(7)).toBe('United Kingdom')
    expect(report.changed).toContain(7)
    expect(report.counts.exact).toBe(2)
  })

  it('keeps the padded name when the automated match is rejected', () => {
    const dataset = olympics()

    const report = resolveDataset(dataset, registry, { matcher: createFuzzyMatcher({ cutoff: 0.8 }) })

    expect(dataset.getName(14)).toBe('Congo')
    expect(report.unresolved).toHaveLength(1)
    expect(report.unresolved[0].candidate.bestName).toBe('DR Congo')
    expect(report.unresolved[0].candidate.matchedName).toBeUndefined()
  })

  it('lets a curated override replace a rejected automated match', () => {
    const dataset = olympics()
    const ledger = OverrideLedger.fromEntries('olympics', [{ index: 14, correctedName: 'DR Congo' }])

    const report = resolveDataset(dataset, registry, {
      matcher: createFuzzyMatcher({ cutoff: 0.8 }),
      ledger,
    })

    expect(dataset.getName(14)).toBe('DR Congo')
    expect(report.changed).toEqual([7, 14])
    expect(report.counts).toEqual({ rows: 3, exact: 2, fuzzy: 0, override: 1, unresolved: 0 })
    expect(report.resolutions[0]).toMatchObject({
      index: 14,
      originalName: 'Congo_(Kinshasa)',
      normalizedName: 'Congo',
      resolvedName: 'DR Congo',
      source: 'override',
    })
  })

  it('prefers an override over an accepted fuzzy match', () => {
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: 'Korea, South' } }])
    const ledger = OverrideLedger.fromEntries('gdp', [{ index: 0, correctedName: 'United Kingdom' }])

    const report = resolveDataset(dataset, registry, { ledger })

    expect(dataset.getName(0)).toBe('United Kingdom')
    expect(report.resolutions[0].source).toBe('override')
    expect(report.resolutions[0].candidate.matchedName).toBe('South Korea')
  })

  it('does not apply overrides to rows without divergence', () => {
    const dataset = olympics()
    const ledger = OverrideLedger.fromEntries('olympics', [{ index: 3, correctedName: 'United Kingdom' }])

    const report = resolveDataset(dataset, registry, { ledger })

    expect(dataset.getName(3)).toBe('South Korea')
    expect(report.inactiveOverrides).toEqual([{ index: 3, correctedName: 'United Kingdom' }])
  })

  it('applies overrides outside the registry and reports them', () => {
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: 'Quuxland' } }])
    const ledger = OverrideLedger.fromEntries('gdp', [{ index: 0, correctedName: 'Kosovo' }])

    const report = resolveDataset(dataset, registry, { ledger })

    expect(dataset.getName(0)).toBe('Kosovo')
    expect(report.overridesOutsideRegistry).toEqual([{ index: 0, correctedName: 'Kosovo' }])
  })

  it('treats names that normalize to nothing as unresolved and keeps them', () => {
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: '(Kinshasa)' } }])

    const report = resolveDataset(dataset, registry)

    expect(dataset.getName(0)).toBe('(Kinshasa)')
    expect(report.changed).toEqual([])
    expect(report.unresolved[0]).toMatchObject({ normalizedName: '', malformed: true, source: 'unresolved' })
  })

  it('changes nothing on a second run', () => {
    const dataset = new Dataset('gdp', 'Country', [
      { index: 0, values: { Country: 'Korea, South' } },
      { index: 1, values: { Country: 'United_Kingdom' } },
      { index: 2, values: { Country: 'Quuxland (Outer)' } },
      { index: 5, values: { Country: 'Congo_(Kinshasa)' } },
    ])
    const ledger = OverrideLedger.fromEntries('gdp', [{ index: 5, correctedName: 'DR Congo' }])

    resolveDataset(dataset, registry, { ledger })
    const after = dataset.toRows()
    const second = resolveDataset(dataset, registry, { ledger })

    expect(second.changed).toEqual([])
    expect(dataset.toRows()).toEqual(after)
    expect(dataset.names().map((row) => row.name)).toEqual(['South Korea', 'United Kingdom', 'Quuxland', 'DR Congo'])
  })

  it('aborts on an override index missing from the dataset without writing', () => {
    const dataset = olympics()
    const before = dataset.toRows()
    const ledger = OverrideLedger.fromEntries('olympics', [{ index: 99, correctedName: 'DR Congo' }])

    expect(() => resolveDataset(dataset, registry, { ledger })).toThrow(IndexOutOfRangeError)
    expect(dataset.toRows()).toEqual(before)
    expect(getMetricsSnapshot().failures).toEqual({ [ERROR_CODES.INDEX_OUT_OF_RANGE]: 1 })
  })

  it('rejects a ledger built for another dataset', () => {
    const dataset = olympics()
    const ledger = OverrideLedger.fromEntries('gdp', [])

    try {
      resolveDataset(dataset, registry, { ledger })
      expect.unreachable('expected a configuration error')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConcordanceError) {
        expect(error.code).toBe(ERROR_CODES.LEDGER_DATASET_MISMATCH)
        expect(error.datasetId).toBe('olympics')
      }
    }
  })

  it('does not reuse a registry name another row already matched', () => {
    const sahel = ReferenceRegistry.fromNames(['Niger', 'Nigeria'])
    const dataset = new Dataset('gdp', 'Country', [
      { index: 0, values: { Country: 'Nigeria' } },
      { index: 1, values: { Country: 'Niger Republic' } },
    ])

    const report = resolveDataset(dataset, sahel)

    expect(dataset.names()).toEqual([
      { index: 0, name: 'Nigeria' },
      { index: 1, name: 'Niger' },
    ])
    expect(report.resolutions[0].candidate.confidence).toBeCloseTo(10 / 19, 10)
  })

  it('matches against every registry name when asked', () => {
    const sahel = ReferenceRegistry.fromNames(['Niger', 'Nigeria'])
    const dataset = new Dataset('gdp', 'Country', [
      { index: 0, values: { Country: 'Nigeria' } },
      { index: 1, values: { Country: 'Niger Republic' } },
    ])

    resolveDataset(dataset, sahel, { vocabulary: 'registry' })

    expect(dataset.getName(1)).toBe('Nigeria')
  })

  it('matches rows that hold a registry name needing normalization exactly', () => {
    const africa = ReferenceRegistry.fromNames(['Congo (Brazzaville)', 'Japan', 'Réunion'])
    const dataset = new Dataset('gdp', 'Country', [
      { index: 0, values: { Country: 'Congo (Brazzaville)' } },
      { index: 1, values: { Country: 'Réunion' } },
    ])

    const report = resolveDataset(dataset, africa)

    expect(report.counts).toEqual({ rows: 2, exact: 2, fuzzy: 0, override: 0, unresolved: 0 })
    expect(report.resolutions).toEqual([])
    expect(dataset.names().map((row) => row.name)).toEqual(['Congo', 'Reunion'])
    expect(dataset.names().every((row) => africa.has(row.name))).toBe(true)
  })

  it('records outcome metrics', () => {
    const dataset = olympics()
    resolveDataset(dataset, registry, { matcher: createFuzzyMatcher({ cutoff: 0.8 }) })

    const snapshot = getMetricsSnapshot()
    expect(snapshot.datasets).toBe(1)
    expect(snapshot.rows).toEqual({ exact: 2, fuzzy: 0, override: 0, unresolved: 1 })
    expect(getResolutionRate()).toBe(0)
  })

  it('logs unresolved names and a summary', () => {
    const { entries, logger } = captureLogger()
    const dataset = new Dataset('gdp', 'Country', [{ index: 0, values: { Country: 'Quuxland' } }])

    resolveDataset(dataset, registry, { logger })

    const warn = entries.find((entry) => entry.level === 'warn')
    expect(warn?.message).toBe('Unresolved names need curator review')
    expect(warn?.names).toEqual(['Quuxland'])
    expect(warn?.datasetId).toBe('gdp')
    const info = entries.find((entry) => entry.level === 'info')
    expect(info?.message).toBe('Dataset resolved')
    expect(info?.event_name).toBe('Dataset resolved')
    expect(info?.stage).toBe('apply')
  })
})

describe('resolveAll', () => {
  function gdp(): Dataset {
    return new Dataset('gdp', 'Country', [
      { index: 0, values: { Country: 'Korea, South' } },
      { index: 1, values: { Country: 'Congo_(Kinshasa)' } },
    ])
  }

  const ledgers = new Map([
    ['olympics', OverrideLedger.fromEntries('olympics', [{ index: 14, correctedName: 'DR Congo' }])],
  ])

  it('gives the same per-dataset result in either order', () => {
    const forwardSets = [olympics(), gdp()]
    const backwardSets = [gdp(), olympics()]

    const forward = resolveAll(forwardSets, registry, { ledgers })
    const backward = resolveAll(backwardSets, registry, { ledgers })

    expect(forward.get('olympics')).toEqual(backward.get('olympics'))
    expect(forward.get('gdp')).toEqual(backward.get('gdp'))
    expect(forwardSets[0].toRows()).toEqual(backwardSets[1].toRows())
    expect(forwardSets[1].toRows()).toEqual(backwardSets[0].toRows())
  })

  it('rejects duplicate dataset ids', () => {
    expect(() => resolveAll([gdp(), gdp()], registry)).toThrow(ConfigurationError)
  })

  it('warns about ledgers for datasets not in the run', () => {
    const { entries, logger } = captureLogger()

    resolveAll([gdp()], registry, { ledgers, logger })

    expect(entries).toContainEqual(
      expect.objectContaining({ level: 'warn', message: 'Override ledgers supplied for unknown datasets', datasetIds: ['olympics'] })
    )
  })
})
