import type { EmitResult } from '../emitter/pushgateway.js'
import type { RunBatch } from '../types.js'

/**
 * Human-readable run summary: one line per provider result, then the push outcome.
 *
 *   quicknode                      ok              4 metrics  312ms
 *   coingecko [CG-abc1234...wxyz]  network_failed  0 metrics  30001ms  Request to ... timed out
 */
export function formatRunSummary(batch: RunBatch, emit: EmitResult): string {
  const rows = batch.results.map(result => ({
    name: result.identity !== undefined ? `${result.provider} [${result.identity}]` : result.provider,
    status: result.status,
    metrics: `${result.metrics.length} metrics`,
    duration: `${result.durationMs}ms`,
    detail: result.errorDetail ?? '',
  }))

  const nameWidth = Math.max(0, ...rows.map(row => row.name.length))
  const statusWidth = Math.max(0, ...rows.map(row => row.status.length))

  const elapsedMs = batch.finishedAt.getTime() - batch.startedAt.getTime()
  const lines = [`Run ${batch.runId}: ${batch.results.length} results in ${elapsedMs}ms`]
  for (const row of rows) {
    const parts = [row.name.padEnd(nameWidth), row.status.padEnd(statusWidth), row.metrics, row.duration]
    if (row.detail) parts.push(row.detail)
    lines.push(`  ${parts.join('  ')}`)
  }

  if (emit.skipped) {
    lines.push(`Push skipped (${emit.metricCount} metrics)`)
  } else if (emit.pushed) {
    lines.push(`Pushed ${emit.metricCount} metrics`)
  } else {
    lines.push(`Push FAILED: ${emit.error?.message ?? 'unknown error'}`)
  }

  return lines.join('\n')
}
