/**
 * Anthropic Adapter
 *
 * Organization message token usage over the last day, from the admin
 * usage report.
 */

import { z } from 'zod'
import { expectJson } from '../../../network/response.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireAdminKey } from '../../kit/credentials.js'

const ADAPTER_ID = 'anthropic'
const USAGE_REPORT_URL = 'https://api.anthropic.com/v1/organizations/usage_report/messages'
const API_VERSION = '2023-06-01'
const WINDOW_MS = 24 * 60 * 60 * 1000

const reportSchema = z.object({
  data: z.array(
    z.object({
      results: z.array(
        z.object({
          uncached_input_tokens: z.number().default(0),
          cache_read_input_tokens: z.number().default(0),
          output_tokens: z.number().default(0),
        })
      ),
    })
  ),
})

export const anthropicAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'Anthropic',
  authModes: ['static_key'],

  async collect(session, ctx, metrics) {
    const startingAt = new Date(ctx.now().getTime() - WINDOW_MS).toISOString()
    const response = await ctx.network.request('GET', USAGE_REPORT_URL, session, {
      headers: { 'x-api-key': requireAdminKey(session), 'anthropic-version': API_VERSION },
      query: { starting_at: startingAt, bucket_width: '1d' },
      signal: ctx.signal,
    })
    const report = reportSchema.parse(expectJson(response, 'Anthropic usage report'))

    let inputTokens = 0
    let outputTokens = 0
    for (const bucket of report.data) {
      for (const result of bucket.results) {
        inputTokens += result.uncached_input_tokens + result.cache_read_input_tokens
        outputTokens += result.output_tokens
      }
    }

    const labels = { usage_calculation: 'daily_tokens' }
    metrics.add('usage_input_tokens', inputTokens, labels)
    metrics.add('usage_output_tokens', outputTokens, labels)
  },
})
