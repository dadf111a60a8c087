/**
 * TwitterAPI.io Adapter
 *
 * Remaining recharge credits for each configured API key.
 */

import { readNumber } from '../../../lib/json.js'
import { expectJson } from '../../../network/response.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireApiKey } from '../../kit/credentials.js'

const ADAPTER_ID = 'twitterapi'
const INFO_URL = 'https://api.twitterapi.io/oapi/my/info'

export const twitterapiAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'TwitterAPI.io',
  authModes: ['static_key'],
  perKey: true,

  async collect(session, ctx, metrics) {
    const response = await ctx.network.request('GET', INFO_URL, session, {
      headers: { 'x-api-key': requireApiKey(session) },
      signal: ctx.signal,
    })
    const body = expectJson(response, 'TwitterAPI account info')

    metrics.add('usage_remaining', readNumber(body, 'recharge_credits'), {
      usage_calculation: 'long_period_package',
    })
  },
})
