/**
 * Adapter failure boundary
 *
 * defineAdapter wraps an adapter's collect() so that every fault becomes a
 * ProviderResult status and metrics collected before the fault survive.
 */

import { classifyError, formatErrorForLog } from '../lib/errors.js'
import type { ProviderResult, Session } from '../types.js'
import { MetricCollector } from './kit/metrics.js'
import type { AdapterDefinition, InspectionContext, ProviderAdapter } from './types.js'

export function defineAdapter(definition: AdapterDefinition): ProviderAdapter {
  return {
    id: definition.id,
    name: definition.name,
    authModes: definition.authModes,
    perKey: definition.perKey ?? false,
    login: definition.login,

    async inspect(session: Session, ctx: InspectionContext): Promise<ProviderResult> {
      const startTime = Date.now()
      const provider = ctx.config.name
      const metrics = new MetricCollector(provider, { ...ctx.labels, provider }, ctx.now())
      const base = { provider, ...(session.identity !== undefined && { identity: session.identity }) }

      try {
        await definition.collect(session, ctx, metrics)
      } catch (error) {
        const classified = classifyError(error)
        ctx.log.warn('Provider inspection failed', {
          adapterId: definition.id,
          identity: session.identity,
          metricsKept: metrics.size,
          ...formatErrorForLog(classified),
        })
        return {
          ...base,
          status: classified.status,
          metrics: metrics.toArray(),
          errorDetail: classified.message,
          durationMs: Date.now() - startTime,
        }
      }

      if (metrics.size === 0) {
        return {
          ...base,
          status: 'parse_failed',
          metrics: [],
          errorDetail: 'Response contained no usage data',
          durationMs: Date.now() - startTime,
        }
      }

      return {
        ...base,
        status: 'ok',
        metrics: metrics.toArray(),
        durationMs: Date.now() - startTime,
      }
    },
  }
}
