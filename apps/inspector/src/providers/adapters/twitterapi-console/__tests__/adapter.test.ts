import { describe, it, expect } from 'vitest'
import { FakeNetwork, jsonResponse, makeContext, makeSession } from '../../../../__tests__/helpers/fake-network.js'
import type { ActiveProviderConfig } from '../../../../types.js'
import { twitterapiConsoleAdapter } from '../adapter.js'

const SESSION_URL = 'https://twitterapi.io/api/auth/session'
const USER_INFO_URL = 'https://api.twitterapi.io/backend/user/info'

const config: ActiveProviderConfig = {
  name: 'twitterapi-console',
  adapter: 'twitterapi-console',
  enabled: true,
  options: {},
  authMode: 'cookie_session',
  credentials: { cookies: ['__Secure-next-auth.session-token=test-cookie'] },
}

const session = makeSession(
  'twitterapi-console',
  { cookies: ['__Secure-next-auth.session-token=test-cookie'] },
  { authMode: 'cookie_session' }
)

const userInfo = {
  status: 'success',
  data: {
    user_info: { recharge_credits: 1000, unused_bonuses_credits: 500 },
    user_credit_consume_logs_30day: { free_credits_used: 100, paid_credits_used: 200, api_calls_count: 42 },
  },
}

describe('twitterapi-console adapter', () => {
  it('exchanges the cookie for a token and reads credit usage', async () => {
    const network = new FakeNetwork()
      .on('GET', SESSION_URL, jsonResponse({ accessToken: 'test-access-token', expires: '2026-02-01T00:00:00Z' }))
      .on('GET', USER_INFO_URL, jsonResponse(userInfo))

    const result = await twitterapiConsoleAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('ok')
    expect(result.metrics.map(m => [m.metricName, m.value])).toEqual([
      ['usage_used', 300],
      ['usage_limit', 1500],
      ['usage_api_calls', 42],
    ])

    const [sessionRequest, infoRequest] = network.requests
    expect(sessionRequest?.session).toBe(session)
    expect(infoRequest?.session).toBeNull()
    expect(infoRequest?.options.headers).toMatchObject({ authorization: 'Bearer test-access-token' })
  })

  it('reports an expired cookie as auth_failed', async () => {
    const network = new FakeNetwork().on('GET', SESSION_URL, jsonResponse({}))

    const result = await twitterapiConsoleAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('auth_failed')
    expect(result.errorDetail).toBe('Session cookie no longer yields an access token')
    expect(network.requestsTo(USER_INFO_URL)).toHaveLength(0)
  })

  it('reports a failed user info payload as parse_failed', async () => {
    const network = new FakeNetwork()
      .on('GET', SESSION_URL, jsonResponse({ accessToken: 'test-access-token' }))
      .on('GET', USER_INFO_URL, jsonResponse({ status: 'error', message: 'internal' }))

    const result = await twitterapiConsoleAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('parse_failed')
    expect(result.errorDetail).toBe('User info response is not a success payload (at status)')
  })
})
