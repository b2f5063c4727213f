/**
 * Structured logging helpers for reconciliation workflows.
 *
 * Enforces common envelope fields (workflow, stage, dataset) on every entry
 * and drops empty values so log lines stay compact.
 */

import type { ILogger, LogContext } from '@concordance/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  datasetId?: string
  [key: string]: unknown
}

export interface WorkflowLogger {
  debug(event: string, meta?: LogContext): void
  info(event: string, meta?: LogContext): void
  warn(event: string, meta?: LogContext, err?: unknown): void
  error(event: string, meta?: LogContext, err?: unknown): void
  child(extra: Partial<WorkflowContext>): WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: (extra) => createWorkflowLogger(base, { ...context, ...extra }),
  }
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
