import type { Dataset } from '../../dataset'
import { AGGREGATE_REGION_NAMES, dropRowsByName, readCsvDataset } from '../../ingestion'
import { ReferenceRegistry } from '../../resolver'
import type { DatasetSourceArgs } from './shared'

export function loadSources(args: DatasetSourceArgs): { registry: ReferenceRegistry; dataset: Dataset } {
  const registryDataset = readCsvDataset(args.registryPath, {
    id: 'registry',
    nameColumn: args.registryColumn,
    encoding: args.registryEncoding,
  })
  const loaded = readCsvDataset(args.datasetPath, {
    id: args.datasetId,
    nameColumn: args.datasetColumn,
    encoding: args.encoding,
  })

  return {
    registry: ReferenceRegistry.fromDataset(registryDataset),
    dataset: args.dropAggregates ? dropRowsByName(loaded, AGGREGATE_REGION_NAMES) : loaded,
  }
}
