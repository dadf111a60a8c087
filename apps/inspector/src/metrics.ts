/**
 * Inspection Run Events
 *
 * Structured log events for run outcomes. Prometheus sees only the usage
 * metrics themselves; run health is read from these events.
 */

import { loggers } from './config/logger.js'
import type { ProviderStatus } from './types.js'

const log = loggers.run

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_PROVIDERS_FOR_ALERT = 2

export interface RunCompletedPayload {
  runId: string
  providersTotal: number
  providersOk: number
  providersFailed: number
  providersDisabled: number
  metricsCollected: number
  statusCounts: Partial<Record<ProviderStatus, number>>
  deadlineExceeded: boolean
  durationMs: number
}

export function recordRunCompleted(payload: RunCompletedPayload): void {
  log.info('INSPECTION_RUN_COMPLETED', {
    event_name: 'INSPECTION_RUN_COMPLETED',
    ...payload,
  })

  const active = payload.providersOk + payload.providersFailed
  const failureRate = active > 0 ? payload.providersFailed / active : 0
  if (active >= MIN_PROVIDERS_FOR_ALERT && failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('INSPECTION_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'INSPECTION_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      failureRate,
      providersFailed: payload.providersFailed,
    })
  }
}

export function recordProviderFailed(payload: {
  runId: string
  provider: string
  identity?: string
  status: ProviderStatus
  errorDetail?: string
  metricsKept: number
}): void {
  log.warn('PROVIDER_INSPECTION_FAILED', {
    event_name: 'PROVIDER_INSPECTION_FAILED',
    ...payload,
  })
}

export function recordPushFailed(payload: {
  runId: string
  url: string
  job: string
  metricCount: number
  statusCode?: number
  reason: string
}): void {
  log.error('METRICS_PUSH_FAILED', {
    event_name: 'METRICS_PUSH_FAILED',
    ...payload,
  })
}
