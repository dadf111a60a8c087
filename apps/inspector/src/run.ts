/**
 * One inspection run: collect, push once, decide the exit code.
 *
 * The batch is kept whatever happens to the push, so the summary still lists
 * every provider when the Pushgateway is down.
 */

import type { EmitResult, PushGatewayEmitter } from './emitter/pushgateway.js'
import { SinkUnreachableError } from './lib/errors.js'
import type { Orchestrator } from './orchestrator/orchestrator.js'
import type { RunBatch } from './types.js'
import { formatRunSummary } from './utils/summary.js'

export interface InspectionRun {
  batch: RunBatch
  push: EmitResult
  summary: string
  /** 1 when the push failed, 0 otherwise, even with failed providers */
  exitCode: number
}

function exportedMetricCount(batch: RunBatch): number {
  return batch.results
    .filter(result => result.status !== 'disabled')
    .reduce((count, result) => count + result.metrics.length, 0)
}

async function push(emitter: Pick<PushGatewayEmitter, 'emit'>, batch: RunBatch): Promise<EmitResult> {
  try {
    return await emitter.emit(batch)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    const sinkError =
      error instanceof SinkUnreachableError
        ? error
        : new SinkUnreachableError(`Push failed: ${reason}`, undefined, { cause: error })
    return { pushed: false, skipped: false, error: sinkError, metricCount: exportedMetricCount(batch) }
  }
}

export async function inspectOnce(
  orchestrator: Pick<Orchestrator, 'run'>,
  emitter: Pick<PushGatewayEmitter, 'emit'>
): Promise<InspectionRun> {
  const batch = await orchestrator.run()
  const result = await push(emitter, batch)

  return {
    batch,
    push: result,
    summary: formatRunSummary(batch, result),
    exitCode: result.error ? 1 : 0,
  }
}
