import { describe, it, expect } from 'vitest'
import { FakeNetwork, jsonResponse, makeContext, makeSession } from '../../../../__tests__/helpers/fake-network.js'
import { loggers } from '../../../../config/logger.js'
import type { LoginProviderConfig } from '../../../../session/manager.js'
import { birdeyeAdapter, birdeyeLogin } from '../adapter.js'

const API_BASE = 'https://multichain-api.birdeye.so'
const LOGIN_URL = `${API_BASE}/user/login`
const ACCOUNT_URL = `${API_BASE}/accounts/default`
const USAGE_URL = `${API_BASE}/payments/subscriptions/sub-1/usage`

const config: LoginProviderConfig = {
  name: 'birdeye',
  adapter: 'birdeye',
  enabled: true,
  options: {},
  authMode: 'email_password',
  credentials: { email: 'ops@example.com', password: 'test-password' },
}

describe('birdeyeLogin', () => {
  it('posts the credentials and keeps the token', async () => {
    const network = new FakeNetwork().on('POST', LOGIN_URL, jsonResponse({ token: 'test-token' }))

    const result = await birdeyeLogin({ config, network, log: loggers.session })

    expect(result).toEqual({ token: 'test-token' })
    expect(network.requests[0]?.options.json).toEqual({ email: 'ops@example.com', password: 'test-password' })
    expect(network.requests[0]?.session).toBeNull()
  })

  it('rejects bad credentials', async () => {
    const network = new FakeNetwork().on('POST', LOGIN_URL, jsonResponse({ message: 'invalid' }, 401))

    await expect(birdeyeLogin({ config, network, log: loggers.session })).rejects.toMatchObject({
      name: 'AuthenticationFailedError',
      message: 'Login rejected with HTTP 401',
    })
  })

  it('rejects a response without a token', async () => {
    const network = new FakeNetwork().on('POST', LOGIN_URL, jsonResponse({ success: true }))

    await expect(birdeyeLogin({ config, network, log: loggers.session })).rejects.toThrow(
      'Login response carried no token'
    )
  })
})

describe('birdeye adapter', () => {
  const session = makeSession('birdeye', { token: 'test-token' }, { authMode: 'email_password' })

  it('reports subscription usage against the plan units', async () => {
    const network = new FakeNetwork()
      .on(
        'GET',
        ACCOUNT_URL,
        jsonResponse({ data: { subscription: { _id: 'sub-1', plan: { monthlyUnits: 1_000_000 } } } })
      )
      .on('GET', USAGE_URL, jsonResponse({ data: { usage: 250_000, api_usage: 200_000, ws_usage: 50_000 } }))

    const result = await birdeyeAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('ok')
    expect(result.metrics.map(m => [m.metricName, m.value])).toEqual([
      ['usage_used', 250_000],
      ['usage_limit', 1_000_000],
      ['usage_remaining', 750_000],
      ['usage_ratio', 0.25],
      ['usage_api_units', 200_000],
      ['usage_ws_units', 50_000],
    ])
    expect(network.requests.map(r => r.options.query)).toEqual([{ token: 'test-token' }, { token: 'test-token' }])
  })

  it('fails authentication without a token', async () => {
    const network = new FakeNetwork()

    const result = await birdeyeAdapter.inspect(
      makeSession('birdeye', {}, { authMode: 'email_password' }),
      makeContext(config, network)
    )

    expect(result.status).toBe('auth_failed')
    expect(network.requests).toHaveLength(0)
  })

  it('reports an account without a subscription as parse_failed', async () => {
    const network = new FakeNetwork().on('GET', ACCOUNT_URL, jsonResponse({ data: {} }))

    const result = await birdeyeAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('parse_failed')
    expect(network.requestsTo(USAGE_URL)).toHaveLength(0)
  })
})
