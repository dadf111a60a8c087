/**
 * Inspection Orchestrator
 *
 * One run = one RunBatch. Providers are inspected in declared order:
 * - disabled providers are reported as `disabled` without touching a session or the network
 * - configuration faults (invalid entry, unknown adapter, unsupported auth mode) become `config_invalid`
 * - per-key adapters are expanded into one inspection per configured key
 * - session failures become `auth_failed`; adapter faults are classified by the adapter boundary
 *
 * Inspections run in a bounded pool. When the run deadline passes, in-flight
 * requests are aborted and every unfinished inspection is reported as
 * `network_failed`.
 */

import { createId } from '@paralleldrive/cuid2'
import { maskSecret } from '@quotawatch/logger'
import { loggers } from '../config/logger.js'
import type { CredentialStore } from '../credentials/store.js'
import { classifyError, formatErrorForLog } from '../lib/errors.js'
import { recordProviderFailed, recordRunCompleted } from '../metrics.js'
import type { NetworkAccess } from '../network/types.js'
import { loginFlowsFrom } from '../providers/adapters/index.js'
import type { AdapterRegistry, ProviderAdapter } from '../providers/types.js'
import type { CaptchaSolver } from '../session/captcha.js'
import { SessionManager } from '../session/manager.js'
import type {
  ActiveProviderConfig,
  FailureStatus,
  Labels,
  ProviderConfig,
  ProviderResult,
  ProviderStatus,
  RunBatch,
} from '../types.js'
import { mapWithConcurrency } from '../utils/concurrency.js'

const log = loggers.orchestrator

export const DEADLINE_EXCEEDED = 'run deadline exceeded'

export type SessionSource = Pick<SessionManager, 'acquire'>

export interface OrchestratorOptions {
  store: CredentialStore
  registry: AdapterRegistry
  network: NetworkAccess
  captchaSolver?: CaptchaSolver
  /** Inspections in flight at once (default 4) */
  concurrency?: number
  /** Whole-run budget (default 240s) */
  runDeadlineMs?: number
  now?: () => Date
  /** Builds the run's session source; defaults to a SessionManager bound to the run deadline */
  createSessions?: (signal: AbortSignal) => SessionSource
}

/** One adapter invocation: a provider, or one key of a per-key provider */
interface InspectionUnit {
  config: ActiveProviderConfig
  adapter: ProviderAdapter
  identity?: string
  labels?: Labels
}

type Slot = { kind: 'settled'; result: ProviderResult } | { kind: 'inspect'; unit: InspectionUnit }

function failed(
  provider: string,
  status: FailureStatus,
  errorDetail: string,
  durationMs: number,
  identity?: string
): ProviderResult {
  return {
    provider,
    ...(identity !== undefined && { identity }),
    status,
    metrics: [],
    errorDetail,
    durationMs,
  }
}

function uniqueKeys(keys: readonly string[]): string[] {
  return Array.from(new Set(keys))
}

export class Orchestrator {
  private readonly store: CredentialStore
  private readonly registry: AdapterRegistry
  private readonly network: NetworkAccess
  private readonly concurrency: number
  private readonly runDeadlineMs: number
  private readonly now: () => Date
  private readonly createSessions: (signal: AbortSignal) => SessionSource

  constructor(options: OrchestratorOptions) {
    this.store = options.store
    this.registry = options.registry
    this.network = options.network
    this.concurrency = options.concurrency ?? 4
    this.runDeadlineMs = options.runDeadlineMs ?? 240_000
    this.now = options.now ?? (() => new Date())
    this.createSessions =
      options.createSessions ??
      (signal =>
        new SessionManager({
          network: options.network,
          loginFlows: loginFlowsFrom(options.registry),
          captchaSolver: options.captchaSolver,
          signal,
          now: this.now,
        }))
  }

  async run(): Promise<RunBatch> {
    const runId = createId()
    const startedAt = this.now()
    const startTime = Date.now()

    const controller = new AbortController()
    const deadlineReached = new Promise<void>(resolve => {
      controller.signal.addEventListener('abort', () => resolve(), { once: true })
    })
    const timer = setTimeout(() => {
      log.warn('Run deadline exceeded, abandoning unfinished inspections', {
        runId,
        runDeadlineMs: this.runDeadlineMs,
      })
      controller.abort()
    }, this.runDeadlineMs)

    const sessions = this.createSessions(controller.signal)
    const slots = this.plan()

    log.info('Inspection run started', {
      runId,
      providers: this.store.names().length,
      inspections: slots.filter(slot => slot.kind === 'inspect').length,
      concurrency: this.concurrency,
    })

    let results: ProviderResult[]
    try {
      results = await mapWithConcurrency(slots, this.concurrency, async slot => {
        if (slot.kind === 'settled') return slot.result
        const { unit } = slot
        const unitStart = Date.now()
        const deadlineResult = () =>
          failed(unit.config.name, 'network_failed', DEADLINE_EXCEEDED, Date.now() - unitStart, unit.identity)
        if (controller.signal.aborted) return deadlineResult()
        return Promise.race([
          this.inspect(unit, sessions, controller.signal),
          deadlineReached.then(deadlineResult),
        ])
      })
    } finally {
      clearTimeout(timer)
    }

    const finishedAt = this.now()
    this.report(runId, results, controller.signal.aborted, Date.now() - startTime)
    return { runId, startedAt, finishedAt, results }
  }

  /**
   * Resolve every declared provider into either a final result or the
   * inspections to run, keeping declared order.
   */
  private plan(): Slot[] {
    const slots: Slot[] = []

    for (const name of this.store.names()) {
      let config: ProviderConfig
      try {
        config = this.store.resolve(name)
      } catch (error) {
        const classified = classifyError(error)
        slots.push({ kind: 'settled', result: failed(name, classified.status, classified.message, 0) })
        continue
      }

      if (!config.enabled) {
        slots.push({ kind: 'settled', result: { provider: name, status: 'disabled', metrics: [], durationMs: 0 } })
        continue
      }

      const adapter = this.registry.get(config.adapter)
      if (!adapter) {
        slots.push({
          kind: 'settled',
          result: failed(
            name,
            'config_invalid',
            `Unknown adapter '${config.adapter}' (known: ${this.registry.list().join(', ')})`,
            0
          ),
        })
        continue
      }
      if (!adapter.authModes.includes(config.authMode)) {
        slots.push({
          kind: 'settled',
          result: failed(
            name,
            'config_invalid',
            `Adapter '${adapter.id}' does not support auth mode '${config.authMode}'`,
            0
          ),
        })
        continue
      }

      for (const unit of this.expand(config, adapter)) {
        slots.push({ kind: 'inspect', unit })
      }
    }

    return slots
  }

  /**
   * Per-key adapters poll each distinct key as its own identity. The `key`
   * label is only added when there is more than one key to tell apart.
   */
  private expand(config: ActiveProviderConfig, adapter: ProviderAdapter): InspectionUnit[] {
    if (!adapter.perKey || config.authMode !== 'static_key') {
      return [{ config, adapter }]
    }
    const keys = uniqueKeys(config.credentials.apiKeys)
    if (keys.length === 0) {
      return [{ config, adapter }]
    }
    return keys.map(key => {
      const identity = maskSecret(key)
      return {
        config: { ...config, credentials: { ...config.credentials, apiKeys: [key] } },
        adapter,
        identity,
        ...(keys.length > 1 && { labels: { key: identity } }),
      }
    })
  }

  private async inspect(unit: InspectionUnit, sessions: SessionSource, signal: AbortSignal): Promise<ProviderResult> {
    const { config, adapter, identity } = unit
    const startTime = Date.now()

    try {
      const session = await sessions.acquire(config, identity)
      return await adapter.inspect(session, {
        config,
        network: this.network,
        labels: unit.labels,
        signal,
        now: this.now,
        log: loggers.providers.child({ provider: config.name, ...(identity !== undefined && { identity }) }),
      })
    } catch (error) {
      // Session failures land here; adapters convert their own faults
      const classified = classifyError(error)
      log.debug('Inspection stopped before the adapter ran', {
        provider: config.name,
        identity,
        ...formatErrorForLog(classified),
      })
      return failed(config.name, classified.status, classified.message, Date.now() - startTime, identity)
    }
  }

  private report(runId: string, results: readonly ProviderResult[], deadlineExceeded: boolean, durationMs: number): void {
    const statusCounts: Partial<Record<ProviderStatus, number>> = {}
    let metricsCollected = 0

    for (const result of results) {
      statusCounts[result.status] = (statusCounts[result.status] ?? 0) + 1
      metricsCollected += result.metrics.length
      if (result.status !== 'ok' && result.status !== 'disabled') {
        recordProviderFailed({
          runId,
          provider: result.provider,
          identity: result.identity,
          status: result.status,
          errorDetail: result.errorDetail,
          metricsKept: result.metrics.length,
        })
      }
    }

    const providersOk = statusCounts.ok ?? 0
    const providersDisabled = statusCounts.disabled ?? 0
    recordRunCompleted({
      runId,
      providersTotal: results.length,
      providersOk,
      providersFailed: results.length - providersOk - providersDisabled,
      providersDisabled,
      metricsCollected,
      statusCounts,
      deadlineExceeded,
      durationMs,
    })
  }
}
