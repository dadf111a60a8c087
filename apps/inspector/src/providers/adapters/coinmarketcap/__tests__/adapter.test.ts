import { describe, it, expect, vi } from 'vitest'
import {
  FakeNetwork,
  jsonResponse,
  makeContext,
  makeSession,
  response,
} from '../../../../__tests__/helpers/fake-network.js'
import { loggers } from '../../../../config/logger.js'
import type { CaptchaSolver } from '../../../../session/captcha.js'
import type { LoginProviderConfig } from '../../../../session/manager.js'
import type { ActiveProviderConfig } from '../../../../types.js'
import { coinmarketcapAdapter, coinmarketcapLogin } from '../adapter.js'

const PORTAL_API = 'https://portal-api.coinmarketcap.com/v1'
const ANTIBOT_API = 'https://api.commonservice.io/gateway-api/v1/public/antibot'
const LOGIN_URL = `${PORTAL_API}/login`
const STATS_URL = `${PORTAL_API}/accounts/my/plan/stats`
const PLAN_URL = `${PORTAL_API}/accounts/my/plan/info`

const loginConfig: LoginProviderConfig = {
  name: 'coinmarketcap',
  adapter: 'coinmarketcap',
  enabled: true,
  options: {},
  authMode: 'captcha_login',
  credentials: { email: 'ops@example.com', password: 'test-password' },
}

const challenge = {
  code: '000000',
  success: true,
  data: { sig: 'sig-1', salt: 'salt-1', path2: '/img/2.png', ek: 'ek-1', captchaType: 'SLIDE', tag: 'tag-1' },
}

function solver(solution = 'slide-solution') {
  return { solve: vi.fn<CaptchaSolver['solve']>().mockResolvedValue(solution) }
}

describe('coinmarketcapLogin', () => {
  it('takes the session cookie when no captcha is asked for', async () => {
    const network = new FakeNetwork().on(
      'POST',
      LOGIN_URL,
      jsonResponse({ status: 'ok' }, 200, { setCookies: ['s=test-session'] })
    )

    const result = await coinmarketcapLogin({ config: loginConfig, network, log: loggers.session })

    expect(result).toEqual({ cookies: ['s=test-session'] })
    expect(network.requests).toHaveLength(1)
  })

  it('solves the captcha and logs in again with its token', async () => {
    const captcha = solver()
    const network = new FakeNetwork()
      .on(
        'POST',
        LOGIN_URL,
        jsonResponse({ captchaSecurityId: 'sec-1', captchaBizCode: 'CMC_login' }),
        jsonResponse({ status: 'ok' }, 200, { setCookies: ['s=test-session'] })
      )
      .on('POST', `${ANTIBOT_API}/getCaptcha`, jsonResponse(challenge))
      .on(
        'POST',
        `${ANTIBOT_API}/validateCaptcha`,
        jsonResponse({ code: '000000', success: true, data: { token: 'captcha-token' } })
      )

    const result = await coinmarketcapLogin({ config: loginConfig, network, captcha, log: loggers.session })

    expect(result).toEqual({ cookies: ['s=test-session'] })
    expect(captcha.solve).toHaveBeenCalledWith(
      {
        provider: 'coinmarketcap',
        kind: 'SLIDE',
        payload: { ...challenge.data, securityId: 'sec-1', bizId: 'CMC_login' },
      },
      undefined
    )

    const logins = network.requestsTo(LOGIN_URL)
    expect(logins).toHaveLength(2)
    expect(logins[1]?.options.json).toMatchObject({
      email: 'ops@example.com',
      captcha: 'captcha-token',
      securityId: 'sec-1',
    })
    const validation = network.requestsTo(`${ANTIBOT_API}/validateCaptcha`)[0]
    expect(validation?.options.relay).toBe(false)
    expect(validation?.options.body).toContain('&data=slide-solution&s=306704&sig=sig-1')
  })

  it('fails when a captcha is required and no solver is configured', async () => {
    const network = new FakeNetwork().on(
      'POST',
      LOGIN_URL,
      jsonResponse({ captchaSecurityId: 'sec-1', captchaBizCode: 'CMC_login' })
    )

    await expect(coinmarketcapLogin({ config: loginConfig, network, log: loggers.session })).rejects.toThrow(
      'Login requires a captcha and no solver is configured'
    )
  })

  it('fails when the captcha is not accepted', async () => {
    const network = new FakeNetwork()
      .on('POST', LOGIN_URL, jsonResponse({ captchaSecurityId: 'sec-1', captchaBizCode: 'CMC_login' }))
      .on('POST', `${ANTIBOT_API}/getCaptcha`, jsonResponse(challenge))
      .on('POST', `${ANTIBOT_API}/validateCaptcha`, jsonResponse({ code: '100001', success: false, data: null }))

    await expect(
      coinmarketcapLogin({ config: loginConfig, network, captcha: solver(), log: loggers.session })
    ).rejects.toMatchObject({
      name: 'AuthenticationFailedError',
      message: 'Captcha validation failed with code 100001',
    })
    expect(network.requestsTo(LOGIN_URL)).toHaveLength(1)
  })

  it('rejects wrong credentials', async () => {
    const network = new FakeNetwork().on('POST', LOGIN_URL, jsonResponse({ message: 'bad password' }, 400))

    await expect(coinmarketcapLogin({ config: loginConfig, network, log: loggers.session })).rejects.toThrow(
      'Login rejected with HTTP 400'
    )
  })
})

describe('coinmarketcap adapter', () => {
  const session = makeSession('coinmarketcap', { cookies: ['s=test-session'] }, { authMode: 'captcha_login' })
  const stats = { month: { credits_used: 30_000 }, day: { credits_used: 1_200 } }

  it('reports monthly and daily credit usage', async () => {
    const network = new FakeNetwork()
      .on('GET', STATS_URL, jsonResponse(stats))
      .on('GET', PLAN_URL, jsonResponse({ keyPlan: { plan: { limit_monthly: 120_000 } } }))

    const result = await coinmarketcapAdapter.inspect(session, makeContext(loginConfig, network))

    expect(result.status).toBe('ok')
    expect(result.metrics.map(m => [m.metricName, m.value])).toEqual([
      ['usage_used', 30_000],
      ['usage_limit', 120_000],
      ['usage_remaining', 90_000],
      ['usage_ratio', 0.25],
      ['usage_used_today', 1_200],
    ])
    expect(network.requests[0]?.session).toBe(session)
  })

  it('falls back to the configured plan limit', async () => {
    const config: ActiveProviderConfig = {
      name: 'coinmarketcap',
      adapter: 'coinmarketcap',
      enabled: true,
      options: { planLimit: '100000' },
      authMode: 'cookie_session',
      credentials: { cookies: ['s=test-session'] },
    }
    const network = new FakeNetwork()
      .on('GET', STATS_URL, jsonResponse(stats))
      .on('GET', PLAN_URL, response(404, 'not found'))

    const result = await coinmarketcapAdapter.inspect(session, makeContext(config, network))

    expect(result.status).toBe('ok')
    expect(result.metrics.find(m => m.metricName === 'usage_limit')?.value).toBe(100_000)
    expect(result.metrics.find(m => m.metricName === 'usage_ratio')?.value).toBe(0.3)
  })

  it('keeps used credits when no limit is known', async () => {
    const network = new FakeNetwork()
      .on('GET', STATS_URL, jsonResponse(stats))
      .on('GET', PLAN_URL, jsonResponse({ keyPlan: {} }))

    const result = await coinmarketcapAdapter.inspect(session, makeContext(loginConfig, network))

    expect(result.status).toBe('parse_failed')
    expect(result.errorDetail).toBe('Plan info carries no monthly limit (at keyPlan.plan.limit_monthly)')
    expect(result.metrics.map(m => m.metricName)).toEqual(['usage_used'])
  })

  it('reports a rejected portal session as auth_failed', async () => {
    const network = new FakeNetwork().on('GET', STATS_URL, response(401, ''))

    const result = await coinmarketcapAdapter.inspect(session, makeContext(loginConfig, network))

    expect(result.status).toBe('auth_failed')
    expect(result.errorDetail).toBe('Portal session is no longer valid')
  })

  it('requires the session cookie', async () => {
    const result = await coinmarketcapAdapter.inspect(
      makeSession('coinmarketcap', { cookies: ['other=1'] }, { authMode: 'cookie_session' }),
      makeContext(loginConfig, new FakeNetwork())
    )

    expect(result.status).toBe('auth_failed')
    expect(result.errorDetail).toBe("Session has no 's' cookie")
  })
})
