/**
 * CSV dataset loading
 *
 * Headers are normalized ("Gold Medal" -> "Gold_Medal") before anything else
 * looks at them. Row indices are zero-based data-row positions and stay fixed
 * for the rest of the run.
 */

import { readFileSync } from 'fs'
import { parse as csvParse } from 'csv-parse/sync'
import { normalizeColumnNames } from '@concordance/names'
import { z } from 'zod'
import { Dataset, type CellValue, type Row } from '../dataset'
import { DatasetError, ERROR_CODES, zodIssues } from '../errors'

export type CsvEncoding = 'utf8' | 'latin1'

export interface CsvDatasetOptions {
  id: string
  /** Name column as it reads after header normalization */
  nameColumn: string
  /** GDP exports ship as ISO-8859-1 */
  encoding?: CsvEncoding
}

const csvRecordsSchema = z.array(z.record(z.string()))

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/

/**
 * Blank cells become null, numeric cells numbers; the name column always
 * stays a string.
 */
export function toCell(value: string, isNameColumn: boolean): CellValue {
  if (isNameColumn) return value
  const trimmed = value.trim()
  if (trimmed.length === 0) return null
  return NUMERIC.test(trimmed) ? Number(trimmed) : value
}

export function parseCsvDataset(text: string, options: CsvDatasetOptions): Dataset {
  const parsed = csvRecordsSchema.safeParse(
    csvParse(text, {
      columns: (header: string[]) => normalizeColumnNames(header),
      bom: true,
      skip_empty_lines: true,
    })
  )

  if (!parsed.success) {
    throw new DatasetError('CSV rows could not be read as records', options.id, ERROR_CODES.INVALID_DATASET, {
      issues: zodIssues(parsed.error),
    })
  }

  const records = parsed.data
  if (records.length > 0 && !(options.nameColumn in records[0])) {
    throw new DatasetError(
      `Name column "${options.nameColumn}" not found`,
      options.id,
      ERROR_CODES.MISSING_COLUMN,
      { columns: Object.keys(records[0]) }
    )
  }

  const rows: Row[] = records.map((record) => {
    const row: Row = {}
    for (const [column, value] of Object.entries(record)) {
      row[column] = toCell(value, column === options.nameColumn)
    }
    return row
  })

  return Dataset.fromRecords(options.id, options.nameColumn, rows)
}

export function readCsvDataset(filePath: string, options: CsvDatasetOptions): Dataset {
  const text = readFileSync(filePath).toString(options.encoding ?? 'utf8')
  return parseCsvDataset(text, options)
}
