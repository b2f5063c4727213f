import { describe, it, expect } from 'vitest'
import { Dataset } from '../../dataset'
import { detectDivergence, mismatchedRows, unclaimedReferenceNames } from '../divergence'
import { ReferenceRegistry } from '../registry'
import { isMismatch } from '../types'

describe('ReferenceRegistry', () => {
  it('skips blank names and keeps the first of duplicates', () => {
    const registry = ReferenceRegistry.fromNames(['Chad', '', 'Peru', 'Chad', '  '])

    expect(registry.names).toEqual(['Chad', 'Peru'])
    expect(registry.size).toBe(2)
    expect(registry.indexOf('Chad')).toBe(0)
    expect(registry.indexOf('Peru')).toBe(2)
  })

  it('stores names in normalized form', () => {
    const registry = ReferenceRegistry.fromNames(['Côte d’Ivoire', 'Congo_(Brazzaville)', 'Congo'])

    expect(registry.names).toEqual(['Cote dIvoire', 'Congo'])
    expect(registry.has('Congo (Brazzaville)')).toBe(false)
    expect(registry.indexOf('Congo')).toBe(1)
  })

  it('normalizes names read from a dataset and keeps row indices', () => {
    const dataset = new Dataset('population', 'Location', [
      { index: 4, values: { Location: 'Bolivia (Plurinational State of)' } },
      { index: 9, values: { Location: 'Curaçao' } },
    ])
    const registry = ReferenceRegistry.fromDataset(dataset)

    expect(registry.names).toEqual(['Bolivia', 'Curacao'])
    expect(registry.indexOf('Curacao')).toBe(9)
  })

  it('is frozen', () => {
    const registry = ReferenceRegistry.fromNames(['Chad'])
    expect(Object.isFrozen(registry.names)).toBe(true)
    expect(Object.isFrozen(registry.entries[0])).toBe(true)
  })
})

describe('detectDivergence', () => {
  const registry = ReferenceRegistry.fromNames(['Chad', 'Peru', 'South Korea'])

  it('lists registry-only names first, then dataset-only rows', () => {
    const records = detectDivergence(registry, [
      { index: 0, name: 'Chad' },
      { index: 1, name: 'Korea, South' },
      { index: 2, name: 'Quuxland' },
    ])

    expect(records).toEqual([
      { primaryIndex: 1, referenceName: 'Peru' },
      { primaryIndex: 2, referenceName: 'South Korea' },
      { ancillaryIndex: 1, rawName: 'Korea, South' },
      { ancillaryIndex: 2, rawName: 'Quuxland' },
    ])
  })

  it('is empty when both sides agree exactly', () => {
    const records = detectDivergence(registry, [
      { index: 0, name: 'Peru' },
      { index: 1, name: 'Chad' },
      { index: 2, name: 'South Korea' },
    ])
    expect(records).toEqual([])
  })

  it('lists every dataset row without an exact counterpart exactly once', () => {
    const rows = [
      { index: 10, name: 'Chad' },
      { index: 11, name: 'chad' },
      { index: 12, name: '' },
      { index: 13, name: 'Chad' },
      { index: 14, name: 'Peru ' },
    ]
    const mismatches = mismatchedRows(detectDivergence(registry, rows))

    expect(mismatches.map((record) => record.ancillaryIndex)).toEqual([11, 12, 14])
    expect(mismatches.every(isMismatch)).toBe(true)
  })

  it('counts a registry name as claimed when any row matches it', () => {
    const records = detectDivergence(registry, [
      { index: 0, name: 'Chad' },
      { index: 1, name: 'Chad' },
    ])
    expect(unclaimedReferenceNames(records)).toEqual(['Peru', 'South Korea'])
  })
})
