/**
 * Dataset cleaning steps
 *
 * Each step returns a new dataset and keeps surviving rows at their original
 * index, so override ledgers written against the raw file stay valid.
 */

import { Dataset, type CellValue, type DatasetRow, type Row } from '../dataset'
import { DatasetError, ERROR_CODES } from '../errors'

/**
 * Region and income-group aggregates that appear as "locations" in
 * epidemiological series but are not countries.
 */
export const AGGREGATE_REGION_NAMES: readonly string[] = [
  'Africa',
  'Asia',
  'Europe',
  'European Union',
  'High income',
  'International',
  'Low income',
  'Lower middle income',
  'North America',
  'Oceania',
  'South America',
  'Upper middle income',
  'World',
]

function mapRows(dataset: Dataset, fn: (row: DatasetRow) => DatasetRow | undefined): Dataset {
  const rows: DatasetRow[] = []
  for (const row of dataset.toRows()) {
    const next = fn(row)
    if (next) rows.push(next)
  }
  return dataset.withRows(rows)
}

function requireColumns(dataset: Dataset, columns: readonly string[]): void {
  const known = new Set(dataset.columns())
  const missing = columns.filter((column) => !known.has(column))
  if (missing.length > 0) {
    throw new DatasetError(`Unknown columns: ${missing.join(', ')}`, dataset.id, ERROR_CODES.MISSING_COLUMN, {
      missing,
    })
  }
}

export function selectColumns(dataset: Dataset, columns: readonly string[]): Dataset {
  requireColumns(dataset, columns)
  const keep = columns.includes(dataset.nameColumn) ? columns : [dataset.nameColumn, ...columns]
  return mapRows(dataset, ({ index, values }) => {
    const next: Row = {}
    for (const column of keep) next[column] = values[column] ?? null
    return { index, values: next }
  })
}

export function dropColumns(dataset: Dataset, columns: readonly string[]): Dataset {
  requireColumns(dataset, columns)
  if (columns.includes(dataset.nameColumn)) {
    throw new DatasetError('The name column cannot be dropped', dataset.id, ERROR_CODES.MISSING_COLUMN, {
      column: dataset.nameColumn,
    })
  }
  const dropped = new Set(columns)
  return mapRows(dataset, ({ index, values }) => ({
    index,
    values: Object.fromEntries(Object.entries(values).filter(([column]) => !dropped.has(column))),
  }))
}

export function renameColumn(dataset: Dataset, from: string, to: string): Dataset {
  requireColumns(dataset, [from])
  const rows = dataset.toRows().map(({ index, values }) => {
    const next: Row = {}
    for (const [column, value] of Object.entries(values)) {
      next[column === from ? to : column] = value
    }
    return { index, values: next }
  })
  return dataset.withRows(rows, dataset.nameColumn === from ? to : dataset.nameColumn)
}

/** Drop rows whose stored name is one of `names` (exact match) */
export function dropRowsByName(dataset: Dataset, names: Iterable<string>): Dataset {
  const dropped = new Set(names)
  return mapRows(dataset, (row) => {
    const name = row.values[dataset.nameColumn]
    return typeof name === 'string' && dropped.has(name) ? undefined : row
  })
}

export function dropIndices(dataset: Dataset, indices: Iterable<number>): Dataset {
  const dropped = new Set(indices)
  return mapRows(dataset, (row) => (dropped.has(row.index) ? undefined : row))
}

export interface FillMissingOptions {
  /** Strings treated as missing, e.g. "no data" */
  sentinels?: readonly string[]
  /** Limit to these columns; defaults to every column except the name column */
  columns?: readonly string[]
}

/**
 * Replace null cells (and sentinel strings) with `value`. The name column is
 * never filled.
 */
export function fillMissing(dataset: Dataset, value: CellValue, options: FillMissingOptions = {}): Dataset {
  const sentinels = new Set(options.sentinels ?? [])
  const columns = options.columns ? new Set(options.columns) : undefined

  return mapRows(dataset, ({ index, values }) => {
    const next: Row = { ...values }
    for (const [column, cell] of Object.entries(values)) {
      if (column === dataset.nameColumn) continue
      if (columns && !columns.has(column)) continue
      if (cell === null || (typeof cell === 'string' && sentinels.has(cell.trim()))) {
        next[column] = value
      }
    }
    return { index, values: next }
  })
}

/** Multiply numeric cells of `columns` by `factor` (population is reported in thousands) */
export function scaleColumns(dataset: Dataset, columns: readonly string[], factor: number): Dataset {
  requireColumns(dataset, columns)
  return mapRows(dataset, ({ index, values }) => {
    const next: Row = { ...values }
    for (const column of columns) {
      const cell = values[column]
      if (typeof cell === 'number') next[column] = cell * factor
    }
    return { index, values: next }
  })
}

/** Add `target` as the sum of the numeric cells of `columns` (missing counts as 0) */
export function addTotalColumn(dataset: Dataset, columns: readonly string[], target = 'Total'): Dataset {
  requireColumns(dataset, columns)
  return mapRows(dataset, ({ index, values }) => {
    let total = 0
    for (const column of columns) {
      const cell = values[column]
      if (typeof cell === 'number') total += cell
    }
    return { index, values: { ...values, [target]: total } }
  })
}

/**
 * Rows with at least one missing cell, with the missing column names
 */
export function findMissingValues(dataset: Dataset): Array<{ index: number; columns: string[] }> {
  const columns = dataset.columns()
  const result: Array<{ index: number; columns: string[] }> = []
  for (const { index, values } of dataset.toRows()) {
    const missing = columns.filter((column) => values[column] === null || values[column] === undefined)
    if (missing.length > 0) result.push({ index, columns: missing })
  }
  return result
}
