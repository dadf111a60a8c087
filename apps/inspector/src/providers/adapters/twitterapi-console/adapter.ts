/**
 * TwitterAPI.io Console Adapter
 *
 * Reads the dashboard's own backend with a replayed next-auth session cookie:
 * the cookie is exchanged for a short-lived access token, which then reads
 * the account's credit balance and 30-day consumption.
 */

import { z } from 'zod'
import { readNumber } from '../../../lib/json.js'
import { AuthenticationFailedError, ParseFailedError } from '../../../lib/errors.js'
import { expectJson } from '../../../network/response.js'
import { defineAdapter } from '../../define-adapter.js'

const ADAPTER_ID = 'twitterapi-console'
const SESSION_URL = 'https://twitterapi.io/api/auth/session'
const USER_INFO_URL = 'https://api.twitterapi.io/backend/user/info'

const BROWSER_HEADERS = {
  origin: 'https://twitterapi.io',
  referer: 'https://twitterapi.io/dashboard',
}

const authSessionSchema = z.object({
  accessToken: z.string().min(1),
  expires: z.string().optional(),
})

export const twitterapiConsoleAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'TwitterAPI.io console',
  authModes: ['cookie_session'],

  async collect(session, ctx, metrics) {
    const sessionResponse = await ctx.network.request('GET', SESSION_URL, session, {
      headers: BROWSER_HEADERS,
      signal: ctx.signal,
    })
    // An expired cookie yields an empty session object
    const auth = authSessionSchema.safeParse(expectJson(sessionResponse, 'TwitterAPI session'))
    if (!auth.success) {
      throw new AuthenticationFailedError(ctx.config.name, 'Session cookie no longer yields an access token')
    }

    const infoResponse = await ctx.network.request('GET', USER_INFO_URL, null, {
      headers: { ...BROWSER_HEADERS, authorization: `Bearer ${auth.data.accessToken}` },
      signal: ctx.signal,
    })
    const body = expectJson(infoResponse, 'TwitterAPI user info')
    const status = z.object({ status: z.string() }).safeParse(body)
    if (!status.success || status.data.status !== 'success') {
      throw new ParseFailedError('User info response is not a success payload', 'status')
    }

    const labels = { usage_calculation: 'long_period_package' }
    const consumed = 'data.user_credit_consume_logs_30day'
    metrics.add(
      'usage_used',
      readNumber(body, `${consumed}.free_credits_used`) + readNumber(body, `${consumed}.paid_credits_used`),
      labels
    )
    metrics.add(
      'usage_limit',
      readNumber(body, 'data.user_info.recharge_credits') +
        readNumber(body, 'data.user_info.unused_bonuses_credits'),
      labels
    )
    metrics.add('usage_api_calls', readNumber(body, `${consumed}.api_calls_count`), labels)
  },
})
