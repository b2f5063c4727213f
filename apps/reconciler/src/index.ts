/**
 * @concordance/reconciler
 *
 * Country-name reconciliation across independently sourced datasets.
 */

export { Dataset } from './dataset'
export type { CellValue, Row, DatasetRow, NamedRow } from './dataset'
export * from './errors'
export * from './resolver'
export * from './ingestion'
export { loadConfig, createMatcherFromConfig } from './config'
export type { ReconcilerConfig } from './config'
export { createWorkflowLogger } from './config/structured-log'
export type { WorkflowContext, WorkflowLogger } from './config/structured-log'
export { runCli } from './cli'
