/**
 * QuickNode Adapter
 *
 * Monthly RPC credit usage from the account usage API.
 */

import { getPath, readNumber } from '../../../lib/json.js'
import { expectJson } from '../../../network/response.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireApiKey } from '../../kit/credentials.js'

const ADAPTER_ID = 'quicknode'
const USAGE_URL = 'https://api.quicknode.com/v0/usage/rpc'

export const quicknodeAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'QuickNode',
  authModes: ['static_key'],

  async collect(session, ctx, metrics) {
    const response = await ctx.network.request('GET', USAGE_URL, session, {
      headers: { 'x-api-key': requireApiKey(session) },
      signal: ctx.signal,
    })
    const body = expectJson(response, 'QuickNode usage')
    const labels = { usage_calculation: 'monthly_credits' }

    metrics.quota(
      {
        used: () => readNumber(body, 'data.credits_used'),
        limit: () => readNumber(body, 'data.limit'),
        remaining: () => readNumber(body, 'data.credits_remaining'),
      },
      labels
    )

    // Only reported once the plan is over its limit
    if (getPath(body, 'data.overages') != null) {
      metrics.add('usage_overages', readNumber(body, 'data.overages'), labels)
    }
  },
})
