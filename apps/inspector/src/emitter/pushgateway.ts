/**
 * Pushgateway Metric Emitter
 *
 * Renders a RunBatch in Prometheus text exposition format and pushes it to
 * the Pushgateway in a single PUT, replacing the job's previous group.
 *
 * - every collected metric is exported, including partial metrics of failed results
 * - provider_up{provider,status} is 1 for ok results and 0 for failures
 * - disabled results export nothing
 *
 * No retry: the next scheduled run pushes again.
 */

import { Gauge, Registry } from 'prom-client'
import { loggers } from '../config/logger.js'
import type { PushGatewaySettings } from '../config/settings.js'
import { SinkUnreachableError } from '../lib/errors.js'
import { recordPushFailed } from '../metrics.js'
import type { NetworkAccess, RawResponse } from '../network/types.js'
import type { Labels, RunBatch } from '../types.js'

const log = loggers.emitter

const PROVIDER_UP = 'provider_up'

export interface EmitResult {
  pushed: boolean
  /** Pushing is disabled by configuration */
  skipped: boolean
  error?: SinkUnreachableError
  metricCount: number
}

interface Sample {
  labels: Labels
  value: number
}

/** Prometheus metric name: [a-zA-Z_:][a-zA-Z0-9_:]* */
export function sanitizeMetricName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_:]/g, '_')
  return /^[a-zA-Z_:]/.test(cleaned) ? cleaned : `_${cleaned}`
}

/** Prometheus label name: [a-zA-Z_][a-zA-Z0-9_]* */
export function sanitizeLabelName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_]/g, '_')
  return /^[a-zA-Z_]/.test(cleaned) ? cleaned : `_${cleaned}`
}

function sanitizeLabels(labels: Labels): Record<string, string> {
  const sanitized: Record<string, string> = {}
  for (const [name, value] of Object.entries(labels)) {
    sanitized[sanitizeLabelName(name)] = value
  }
  return sanitized
}

function addSample(families: Map<string, Sample[]>, name: string, sample: Sample): void {
  const samples = families.get(name)
  if (samples) {
    samples.push(sample)
  } else {
    families.set(name, [sample])
  }
}

export class PushGatewayEmitter {
  constructor(
    private readonly network: NetworkAccess,
    private readonly settings: PushGatewaySettings
  ) {}

  /**
   * Build the registry for a batch. Each metric name becomes one gauge whose
   * label names are the union of its samples' labels.
   */
  buildRegistry(batch: RunBatch): { registry: Registry; metricCount: number } {
    const families = new Map<string, Sample[]>()
    let metricCount = 0

    for (const result of batch.results) {
      if (result.status === 'disabled') continue

      for (const metric of result.metrics) {
        addSample(families, sanitizeMetricName(`${this.settings.metricPrefix}${metric.metricName}`), {
          labels: sanitizeLabels(metric.labels),
          value: metric.value,
        })
        metricCount++
      }

      addSample(families, sanitizeMetricName(`${this.settings.metricPrefix}${PROVIDER_UP}`), {
        labels: {
          provider: result.provider,
          ...(result.identity !== undefined && { key: result.identity }),
          status: result.status,
        },
        value: result.status === 'ok' ? 1 : 0,
      })
    }

    const registry = new Registry()
    for (const [name, samples] of families) {
      const labelNames = Array.from(new Set(samples.flatMap(sample => Object.keys(sample.labels))))
      const gauge = new Gauge({
        name,
        help: `${name} as reported by the usage inspector`,
        labelNames,
        registers: [registry],
      })
      for (const sample of samples) {
        gauge.set(sample.labels, sample.value)
      }
    }

    return { registry, metricCount }
  }

  async emit(batch: RunBatch): Promise<EmitResult> {
    const { registry, metricCount } = this.buildRegistry(batch)

    if (!this.settings.enabled) {
      log.info('Pushgateway disabled, metrics not pushed', { runId: batch.runId, metricCount })
      return { pushed: false, skipped: true, metricCount }
    }

    const url = `${this.settings.url}/metrics/job/${encodeURIComponent(this.settings.job)}`
    const body = await registry.metrics()

    let response: RawResponse
    try {
      response = await this.network.request('PUT', url, null, {
        body,
        headers: { 'content-type': registry.contentType },
        relay: false,
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return this.failed(
        batch,
        url,
        metricCount,
        new SinkUnreachableError(`Pushgateway unreachable: ${reason}`, undefined, { cause: error })
      )
    }

    if (!response.ok) {
      return this.failed(
        batch,
        url,
        metricCount,
        new SinkUnreachableError(`Pushgateway returned HTTP ${response.status}`, response.status)
      )
    }

    log.info('Metrics pushed to Pushgateway', { runId: batch.runId, job: this.settings.job, metricCount })
    return { pushed: true, skipped: false, metricCount }
  }

  private failed(batch: RunBatch, url: string, metricCount: number, error: SinkUnreachableError): EmitResult {
    recordPushFailed({
      runId: batch.runId,
      url,
      job: this.settings.job,
      metricCount,
      statusCode: error.statusCode,
      reason: error.message,
    })
    return { pushed: false, skipped: false, error, metricCount }
  }
}
