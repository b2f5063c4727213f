import { classifyError } from '../../errors'
import { createMatcherFromConfig, loadConfig } from '../../config'
import { buildCuratorReport, pendingRows } from '../../resolver'
import { loadSources } from './load'
import { missingArgs, type CommandIO, type DatasetSourceArgs } from './shared'

export interface ReportArgs extends DatasetSourceArgs {
  pendingOnly: boolean
}

/**
 * Print the curator report for one dataset as JSON.
 */
export function runReportCommand(args: ReportArgs, io: CommandIO): number {
  const log = io.logger.child('report', { datasetId: args.datasetId })
  const missing = missingArgs({ ...args }, ['registryPath', 'registryColumn', 'datasetPath', 'datasetColumn', 'datasetId'])
  if (missing.length > 0) {
    log.error('Missing required arguments', { missing })
    return 2
  }

  try {
    const config = loadConfig(io.env)
    const { registry, dataset } = loadSources(args)
    const report = buildCuratorReport(dataset, registry, {
      matcher: createMatcherFromConfig(config, io.logger),
      vocabulary: config.vocabulary,
    })
    const rows = args.pendingOnly ? pendingRows(report) : report.rows

    io.stdout(JSON.stringify({ ...report, rows }, null, 2))
    log.info('Curator report written', { rows: rows.length, pending: pendingRows(report).length })
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error('Curator report failed', { code: classified.code, details: classified.details }, error)
    return classified.category === 'configuration' ? 2 : 1
  }
}
