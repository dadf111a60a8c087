/**
 * OpenAI Adapter
 *
 * Organization usage over the last day, read with an admin key:
 * - project API keys are listed to map each configured key to its key ID
 *   (matched on the last four characters of the redacted value)
 * - completion usage grouped by key ID gives input tokens and requests per key
 * - organization costs are split across the configured keys by their share
 *   of the input tokens those keys used
 *
 * Configured keys that match no project key are logged and skipped. List
 * endpoints are read page by page until `has_more` is false.
 */

import { maskSecret } from '@quotawatch/logger'
import { z } from 'zod'
import { ParseFailedError } from '../../../lib/errors.js'
import { expectJson } from '../../../network/response.js'
import type { Session } from '../../../types.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireAdminKey } from '../../kit/credentials.js'
import type { InspectionContext } from '../../types.js'

const ADAPTER_ID = 'openai'
const API_BASE = 'https://api.openai.com/v1'
const WINDOW_SECONDS = 24 * 60 * 60
const PAGE_LIMIT = 100

const listSchema = <T extends z.ZodTypeAny>(item: T) => z.object({ data: z.array(item) })

const pageSchema = z.object({
  data: z.array(z.unknown()),
  has_more: z.boolean().optional(),
  last_id: z.string().nullable().optional(),
})

const projectSchema = z.object({ id: z.string() })

const projectKeySchema = z.object({ id: z.string(), redacted_value: z.string() })

const usageSchema = listSchema(
  z.object({
    results: z.array(
      z.object({
        api_key_id: z.string().nullable().optional(),
        input_tokens: z.number().default(0),
        num_model_requests: z.number().default(0),
      })
    ),
  })
)

const costsSchema = listSchema(
  z.object({
    results: z.array(z.object({ amount: z.object({ value: z.number(), currency: z.string() }) })),
  })
)

interface KeyUsage {
  inputTokens: number
  requests: number
}

function adminHeaders(session: Session): Record<string, string> {
  return { authorization: `Bearer ${requireAdminKey(session)}` }
}

async function getJson(
  ctx: InspectionContext,
  session: Session,
  path: string,
  query: Record<string, string | number | readonly string[] | undefined>,
  what: string
): Promise<unknown> {
  const response = await ctx.network.request('GET', `${API_BASE}${path}`, session, {
    headers: adminHeaders(session),
    query,
    signal: ctx.signal,
  })
  return expectJson(response, what)
}

/** Follow the `after` cursor until the endpoint reports no more pages */
async function listAll<T>(
  ctx: InspectionContext,
  session: Session,
  path: string,
  item: z.ZodType<T>,
  what: string
): Promise<T[]> {
  const items: T[] = []
  let after: string | undefined
  for (;;) {
    const query = after === undefined ? { limit: PAGE_LIMIT } : { limit: PAGE_LIMIT, after }
    const page = pageSchema.parse(await getJson(ctx, session, path, query, what))
    items.push(...z.array(item).parse(page.data))
    if (!page.has_more || !page.last_id || page.last_id === after) return items
    after = page.last_id
  }
}

/** Map key suffix (last four characters) to key ID across all projects */
async function keyIdsBySuffix(ctx: InspectionContext, session: Session): Promise<Map<string, string>> {
  const projects = await listAll(ctx, session, '/organization/projects', projectSchema, 'OpenAI projects')

  const bySuffix = new Map<string, string>()
  for (const project of projects) {
    const keys = await listAll(
      ctx,
      session,
      `/organization/projects/${encodeURIComponent(project.id)}/api_keys`,
      projectKeySchema,
      'OpenAI project keys'
    )
    for (const key of keys) {
      bySuffix.set(key.redacted_value.slice(-4), key.id)
    }
  }
  return bySuffix
}

export const openaiAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'OpenAI',
  authModes: ['static_key'],

  async collect(session, ctx, metrics) {
    const endTime = Math.floor(ctx.now().getTime() / 1000)
    const window = { start_time: endTime - WINDOW_SECONDS, end_time: endTime, bucket_width: '1d', limit: 7 }
    const labels = { usage_calculation: 'daily_tokens' }

    const idsBySuffix = await keyIdsBySuffix(ctx, session)
    const tracked = new Map<string, string>()
    for (const apiKey of session.transport.apiKeys) {
      const keyId = idsBySuffix.get(apiKey.slice(-4))
      if (keyId === undefined) {
        ctx.log.warn('API key not found in any project', { key: maskSecret(apiKey) })
        continue
      }
      tracked.set(keyId, maskSecret(apiKey))
    }

    const usage = usageSchema.parse(
      await getJson(
        ctx,
        session,
        '/organization/usage/completions',
        { ...window, group_by: ['api_key_id'] },
        'OpenAI completions usage'
      )
    )

    const perKey = new Map<string, KeyUsage>()
    for (const bucket of usage.data) {
      for (const result of bucket.results) {
        if (!result.api_key_id) continue
        const entry = perKey.get(result.api_key_id) ?? { inputTokens: 0, requests: 0 }
        entry.inputTokens += result.input_tokens
        entry.requests += result.num_model_requests
        perKey.set(result.api_key_id, entry)
      }
    }

    let trackedTokens = 0
    for (const [keyId, key] of tracked) {
      const entry = perKey.get(keyId) ?? { inputTokens: 0, requests: 0 }
      trackedTokens += entry.inputTokens
      metrics.add('usage_input_tokens', entry.inputTokens, { ...labels, key })
      metrics.add('usage_requests', entry.requests, { ...labels, key })
    }

    const costs = costsSchema.parse(
      await getJson(ctx, session, '/organization/costs', window, 'OpenAI costs')
    )
    let totalCost = 0
    for (const bucket of costs.data) {
      for (const result of bucket.results) {
        if (result.amount.currency.toLowerCase() !== 'usd') {
          throw new ParseFailedError(`Unexpected cost currency ${result.amount.currency}`, 'amount.currency')
        }
        totalCost += result.amount.value
      }
    }

    metrics.add('usage_cost_usd_total', totalCost, labels)
    if (tracked.size === 0) return
    if (trackedTokens === 0) {
      ctx.log.warn('No input tokens on configured keys, per-key cost not reported', {
        keys: tracked.size,
        totalCost,
      })
      return
    }
    for (const [keyId, key] of tracked) {
      const tokens = perKey.get(keyId)?.inputTokens ?? 0
      metrics.add('usage_cost_usd', (totalCost * tokens) / trackedTokens, { ...labels, key })
    }
  },
})
