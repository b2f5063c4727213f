import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  classifyError,
  ConfigurationError,
  ConflictingOverrideError,
  DatasetError,
  ERROR_CODES,
  IndexOutOfRangeError,
} from '../errors'

describe('ConcordanceError subclasses', () => {
  it('names the dataset and index of an out-of-range reference', () => {
    const error = new IndexOutOfRangeError('olympics', 99, 'override')

    expect(error.message).toBe('Index 99 referenced by override is not a row of dataset "olympics"')
    expect(error.category).toBe('dataset')
    expect(error.isStructural).toBe(true)
    expect(error.details).toEqual({ source: 'override' })
  })

  it('treats conflicting overrides as structural', () => {
    expect(new ConflictingOverrideError('gdp', 1, ['Chad', 'Peru']).isStructural).toBe(true)
  })

  it('does not treat configuration or shape errors as structural', () => {
    expect(new ConfigurationError('bad cutoff').isStructural).toBe(false)
    expect(new DatasetError('bad rows', 'gdp').isStructural).toBe(false)
  })

  it('keeps the cause', () => {
    const cause = new Error('disk')
    expect(new ConfigurationError('cannot read', ERROR_CODES.INVALID_OVERRIDE_LEDGER, { cause }).cause).toBe(cause)
  })
})

describe('classifyError', () => {
  it('passes through engine errors', () => {
    const classified = classifyError(new IndexOutOfRangeError('gdp', 4, 'match'))

    expect(classified).toMatchObject({
      category: 'dataset',
      code: ERROR_CODES.INDEX_OUT_OF_RANGE,
      isStructural: true,
      datasetId: 'gdp',
      index: 4,
    })
  })

  it('maps zod errors to validation failures', () => {
    const result = z.object({ index: z.number() }).safeParse({ index: 'x' })
    if (result.success) throw new Error('expected failure')

    const classified = classifyError(result.error)

    expect(classified.category).toBe('validation')
    expect(classified.code).toBe(ERROR_CODES.VALIDATION_FAILED)
    expect(classified.details).toEqual({
      issues: [{ path: 'index', message: 'Expected number, received string', code: 'invalid_type' }],
    })
  })

  it('maps anything else to an unexpected error', () => {
    expect(classifyError(new TypeError('nope'))).toMatchObject({ category: 'internal', message: 'nope' })
    expect(classifyError('plain')).toEqual({
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: 'plain',
      isStructural: false,
    })
  })
})
