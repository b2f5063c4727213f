/**
 * Dataset model
 *
 * An ordered collection of rows keyed by a stable row index assigned at load
 * time. Indices need not be contiguous: cleaning steps drop rows but never
 * renumber the survivors, so curated overrides keep pointing at the same row.
 *
 * Only the name column is ever written after construction, through setName.
 */

import { DatasetError, ERROR_CODES, IndexOutOfRangeError } from './errors'

export type CellValue = string | number | null
export type Row = Record<string, CellValue>

export interface DatasetRow {
  index: number
  values: Row
}

export interface NamedRow {
  index: number
  name: string
}

export class Dataset {
  readonly id: string
  readonly nameColumn: string
  private readonly rows = new Map<number, Row>()

  constructor(id: string, nameColumn: string, rows: Iterable<DatasetRow>) {
    this.id = id
    this.nameColumn = nameColumn

    for (const { index, values } of rows) {
      if (!Number.isInteger(index) || index < 0) {
        throw new DatasetError(`Row index ${index} is not a non-negative integer`, id, ERROR_CODES.INVALID_DATASET, {
          index,
        })
      }
      if (this.rows.has(index)) {
        throw new DatasetError(`Duplicate row index ${index}`, id, ERROR_CODES.INVALID_DATASET, { index })
      }
      if (typeof values[nameColumn] !== 'string') {
        throw new DatasetError(
          `Row ${index} has no string value in name column "${nameColumn}"`,
          id,
          ERROR_CODES.MISSING_COLUMN,
          { index, column: nameColumn }
        )
      }
      this.rows.set(index, { ...values })
    }
  }

  /**
   * Build a dataset whose row index is each record's position.
   */
  static fromRecords(id: string, nameColumn: string, records: readonly Row[]): Dataset {
    return new Dataset(
      id,
      nameColumn,
      records.map((values, index) => ({ index, values }))
    )
  }

  get size(): number {
    return this.rows.size
  }

  has(index: number): boolean {
    return this.rows.has(index)
  }

  indices(): number[] {
    return [...this.rows.keys()]
  }

  get(index: number): Row | undefined {
    const row = this.rows.get(index)
    return row ? { ...row } : undefined
  }

  getName(index: number): string {
    const row = this.rows.get(index)
    if (!row) {
      throw new IndexOutOfRangeError(this.id, index, 'lookup')
    }
    return readName(row, this.nameColumn)
  }

  setName(index: number, name: string): void {
    const row = this.rows.get(index)
    if (!row) {
      throw new IndexOutOfRangeError(this.id, index, 'lookup')
    }
    row[this.nameColumn] = name
  }

  names(): NamedRow[] {
    return [...this.rows].map(([index, row]) => ({ index, name: readName(row, this.nameColumn) }))
  }

  toRows(): DatasetRow[] {
    return [...this.rows].map(([index, values]) => ({ index, values: { ...values } }))
  }

  /** Column names in first-seen order across all rows */
  columns(): string[] {
    const seen = new Set<string>()
    for (const row of this.rows.values()) {
      for (const key of Object.keys(row)) seen.add(key)
    }
    return [...seen]
  }

  /**
   * New dataset with the same id. Used by cleaning steps, which never mutate.
   */
  withRows(rows: Iterable<DatasetRow>, nameColumn: string = this.nameColumn): Dataset {
    return new Dataset(this.id, nameColumn, rows)
  }
}

function readName(row: Row, column: string): string {
  const value = row[column]
  return typeof value === 'string' ? value : ''
}
