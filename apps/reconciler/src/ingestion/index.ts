export { parseCsvDataset, readCsvDataset, toCell } from './csv'
export type { CsvDatasetOptions, CsvEncoding } from './csv'
export {
  AGGREGATE_REGION_NAMES,
  selectColumns,
  dropColumns,
  renameColumn,
  dropRowsByName,
  dropIndices,
  fillMissing,
  scaleColumns,
  addTotalColumn,
  findMissingValues,
} from './cleaning'
export type { FillMissingOptions } from './cleaning'
