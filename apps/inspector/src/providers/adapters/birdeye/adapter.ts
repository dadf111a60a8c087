/**
 * Birdeye Adapter
 *
 * Email/password login to the data-services dashboard, then the account's
 * subscription plan (monthly units) and the subscription's current usage.
 * The API host is often listed in DNS_MAP because its public resolution
 * points at a CDN that blocks automated clients.
 */

import { z } from 'zod'
import { readNumber } from '../../../lib/json.js'
import { AuthenticationFailedError } from '../../../lib/errors.js'
import { expectJson } from '../../../network/response.js'
import type { LoginFlow } from '../../../session/manager.js'
import { defineAdapter } from '../../define-adapter.js'

const ADAPTER_ID = 'birdeye'
const API_BASE = 'https://multichain-api.birdeye.so'

const DASHBOARD_HEADERS = {
  origin: 'https://bds.birdeye.so',
  referer: 'https://bds.birdeye.so/',
}

const loginResponseSchema = z.object({ token: z.string().min(1) })

const accountSchema = z.object({
  data: z.object({
    subscription: z.object({ _id: z.string().min(1) }),
  }),
})

export const birdeyeLogin: LoginFlow = async ({ config, network, signal }) => {
  const response = await network.request('POST', `${API_BASE}/user/login`, null, {
    json: { email: config.credentials.email, password: config.credentials.password },
    headers: DASHBOARD_HEADERS,
    signal,
  })
  if (response.status === 400 || response.status === 401 || response.status === 403) {
    throw new AuthenticationFailedError(config.name, `Login rejected with HTTP ${response.status}`)
  }

  const parsed = loginResponseSchema.safeParse(expectJson(response, 'Birdeye login'))
  if (!parsed.success) {
    throw new AuthenticationFailedError(config.name, 'Login response carried no token')
  }
  return { token: parsed.data.token }
}

export const birdeyeAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'Birdeye',
  authModes: ['email_password'],
  login: birdeyeLogin,

  async collect(session, ctx, metrics) {
    const token = session.transport.token
    if (!token) {
      throw new AuthenticationFailedError(ctx.config.name, 'Session has no login token')
    }

    const accountResponse = await ctx.network.request('GET', `${API_BASE}/accounts/default`, session, {
      query: { token },
      headers: DASHBOARD_HEADERS,
      signal: ctx.signal,
    })
    const account = expectJson(accountResponse, 'Birdeye account')
    const subscriptionId = accountSchema.parse(account).data.subscription._id

    const usageResponse = await ctx.network.request(
      'GET',
      `${API_BASE}/payments/subscriptions/${encodeURIComponent(subscriptionId)}/usage`,
      session,
      { query: { token }, headers: DASHBOARD_HEADERS, signal: ctx.signal }
    )
    const usage = expectJson(usageResponse, 'Birdeye subscription usage')
    const labels = { usage_calculation: 'monthly_credits' }

    metrics.quota(
      {
        used: () => readNumber(usage, 'data.usage'),
        limit: () => readNumber(account, 'data.subscription.plan.monthlyUnits'),
      },
      labels
    )
    metrics.add('usage_api_units', readNumber(usage, 'data.api_usage'), labels)
    metrics.add('usage_ws_units', readNumber(usage, 'data.ws_usage'), labels)
  },
})
