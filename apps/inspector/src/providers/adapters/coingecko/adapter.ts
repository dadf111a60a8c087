/**
 * CoinGecko Adapter
 *
 * Pro API key usage. Each configured key is its own identity.
 */

import { readNumber } from '../../../lib/json.js'
import { expectJson } from '../../../network/response.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireApiKey } from '../../kit/credentials.js'

const ADAPTER_ID = 'coingecko'
const KEY_URL = 'https://pro-api.coingecko.com/api/v3/key'

export const coingeckoAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'CoinGecko',
  authModes: ['static_key'],
  perKey: true,

  async collect(session, ctx, metrics) {
    const response = await ctx.network.request('GET', KEY_URL, session, {
      headers: { 'x-cg-pro-api-key': requireApiKey(session) },
      signal: ctx.signal,
    })
    const body = expectJson(response, 'CoinGecko key usage')
    const labels = { usage_calculation: 'monthly_credits' }

    // current_total_monthly_calls lags behind; credit minus remaining is exact
    metrics.quota(
      {
        used: () =>
          readNumber(body, 'monthly_call_credit') - readNumber(body, 'current_remaining_monthly_calls'),
        limit: () => readNumber(body, 'monthly_call_credit'),
        remaining: () => readNumber(body, 'current_remaining_monthly_calls'),
      },
      labels
    )
    metrics.add('rate_limit_per_minute', readNumber(body, 'rate_limit_request_per_minute'), labels)
  },
})
