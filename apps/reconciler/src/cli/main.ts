import '../env'
import { createLogger } from '@concordance/logger'
import { runCli } from './index'

const logger = createLogger('reconciler').child('cli')

process.exitCode = runCli(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(`${text}\n`)
  },
  logger,
  env: process.env,
})
