import type { ILogger } from '@concordance/logger'
import type { CsvEncoding } from '../../ingestion'

export interface CommandIO {
  stdout: (text: string) => void
  logger: ILogger
  env?: Record<string, string | undefined>
}

export interface DatasetSourceArgs {
  registryPath: string
  registryColumn: string
  registryEncoding?: CsvEncoding
  datasetPath: string
  datasetColumn: string
  datasetId: string
  encoding?: CsvEncoding
  dropAggregates: boolean
}

export function missingArgs(args: Record<string, unknown>, required: string[]): string[] {
  return required.filter((key) => {
    const value = args[key]
    return typeof value !== 'string' || value.length === 0
  })
}
