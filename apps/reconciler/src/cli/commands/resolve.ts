import { classifyError } from '../../errors'
import { createMatcherFromConfig, loadConfig } from '../../config'
import {
  OverrideLedger,
  readOverrideLedgerFile,
  resolveDataset,
  resolveDistinctNames,
  type ResolutionReport,
} from '../../resolver'
import { loadSources } from './load'
import { missingArgs, type CommandIO, type DatasetSourceArgs } from './shared'

export interface ResolveArgs extends DatasetSourceArgs {
  overridesPath?: string
  distinct: boolean
}

/**
 * Resolve one dataset against the registry and print the report plus the
 * resolved rows as JSON. Structural errors exit 1 and name the dataset.
 */
export function runResolveCommand(args: ResolveArgs, io: CommandIO): number {
  const log = io.logger.child('resolve', { datasetId: args.datasetId })
  const missing = missingArgs({ ...args }, ['registryPath', 'registryColumn', 'datasetPath', 'datasetColumn', 'datasetId'])
  if (missing.length > 0) {
    log.error('Missing required arguments', { missing })
    return 2
  }

  try {
    const config = loadConfig(io.env)
    const { registry, dataset } = loadSources(args)
    const ledgers = args.overridesPath ? readOverrideLedgerFile(args.overridesPath) : new Map<string, OverrideLedger>()
    const options = {
      matcher: createMatcherFromConfig(config, io.logger),
      ledger: ledgers.get(dataset.id),
      vocabulary: config.vocabulary,
      logger: io.logger,
    }

    const report: ResolutionReport = args.distinct
      ? resolveDistinctNames(dataset, registry, options)
      : resolveDataset(dataset, registry, options)

    io.stdout(
      JSON.stringify(
        {
          datasetId: report.datasetId,
          normalizationVersion: report.normalizationVersion,
          counts: report.counts,
          changed: report.changed,
          unresolved: report.unresolved,
          inactiveOverrides: report.inactiveOverrides,
          overridesOutsideRegistry: report.overridesOutsideRegistry,
          rows: dataset.toRows(),
        },
        null,
        2
      )
    )
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error(
      'Resolution failed',
      { code: classified.code, failedDatasetId: classified.datasetId, index: classified.index },
      error
    )
    return classified.category === 'configuration' ? 2 : 1
  }
}
