/**
 * Structured logging helpers for harvester workflows.
 *
 * Enforces common envelope fields and redacts sensitive keys.
 * Must not log secrets or full URLs with query strings.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext } from '@hanjadex/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  sourceId?: string
  input?: string
  [key: string]: unknown
}

const REDACTED = '[REDACTED]'

const SENSITIVE_KEY_PATTERNS = [
  /authorization/i,
  /password/i,
  /secret/i,
  /token/i,
  /cookie/i,
  /api[-_]?key/i,
  /credential/i,
]

export function redactMeta(meta: LogContext): LogContext {
  const next: LogContext = {}
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined || value === null) continue
    next[key] = SENSITIVE_KEY_PATTERNS.some(pattern => pattern.test(key)) ? REDACTED : value
  }
  return next
}

/**
 * Wrap a base logger so every event carries the workflow envelope
 * (`event_name`, `workflow`, `stage`, `runId`, ...).
 */
export function createWorkflowLogger(base: ILogger, context: WorkflowContext): ILogger {
  const envelope = redactMeta(context)

  const withEnvelope = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...envelope,
    ...(meta ? redactMeta(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, withEnvelope(event, meta)),
    info: (event, meta) => base.info(event, withEnvelope(event, meta)),
    warn: (event, meta, err) => base.warn(event, withEnvelope(event, meta), err),
    error: (event, meta, err) => base.error(event, withEnvelope(event, meta), err),
    fatal: (event, meta, err) => base.fatal(event, withEnvelope(event, meta), err),
    child: (componentOrContext, defaultContext = {}) =>
      typeof componentOrContext === 'string'
        ? createWorkflowLogger(base.child(componentOrContext), { ...context, ...defaultContext })
        : createWorkflowLogger(base, { ...context, ...componentOrContext }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}
