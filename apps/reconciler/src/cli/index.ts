import { runReportCommand } from './commands/report'
import { runResolveCommand } from './commands/resolve'
import type { CommandIO, DatasetSourceArgs } from './commands/shared'
import { asEncoding, asString, parseFlags, type Flags } from './parse-flags'

const HELP = [
  'Concordance CLI',
  '',
  'Commands:',
  '  report  --registry <csv> --registry-column <col> --dataset <csv> --column <col> --id <dataset-id>',
  '          [--encoding utf8|latin1] [--registry-encoding utf8|latin1] [--drop-aggregates] [--pending]',
  '  resolve --registry <csv> --registry-column <col> --dataset <csv> --column <col> --id <dataset-id>',
  '          [--overrides <ledger.json>] [--distinct] [--encoding utf8|latin1] [--drop-aggregates]',
  '',
  'Environment: CONCORDANCE_MATCH_CUTOFF, CONCORDANCE_SCORER, CONCORDANCE_VOCABULARY, LOG_LEVEL, LOG_FORMAT',
].join('\n')

function sourceArgs(flags: Flags): DatasetSourceArgs {
  return {
    registryPath: asString(flags.registry),
    registryColumn: asString(flags['registry-column']),
    registryEncoding: asEncoding(flags['registry-encoding']),
    datasetPath: asString(flags.dataset),
    datasetColumn: asString(flags.column),
    datasetId: asString(flags.id),
    encoding: asEncoding(flags.encoding),
    dropAggregates: flags['drop-aggregates'] === true,
  }
}

export function runCli(argv: string[], io: CommandIO): number {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h') {
    io.stdout(HELP)
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    io.stdout(HELP)
    return 0
  }

  switch (command) {
    case 'report':
      return runReportCommand({ ...sourceArgs(flags), pendingOnly: flags.pending === true }, io)
    case 'resolve':
      return runResolveCommand(
        {
          ...sourceArgs(flags),
          overridesPath: asString(flags.overrides) || undefined,
          distinct: flags.distinct === true,
        },
        io
      )
    default:
      io.logger.error('Unknown command', { command })
      io.stdout(HELP)
      return 2
  }
}
