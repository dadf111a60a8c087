/**
 * CoinMarketCap Adapter
 *
 * Developer portal plan statistics, read with the portal's `s` session cookie.
 * The cookie comes either from configuration (cookie_session) or from a
 * captcha-guarded login (captcha_login):
 *
 * 1. Login without captcha; the portal answers with a captcha security ID
 * 2. Fetch the challenge from the anti-bot gateway
 * 3. Hand the challenge to the captcha solver
 * 4. Validate the solution, receiving a captcha token
 * 5. Login again with the token; the session cookie arrives in Set-Cookie
 */

import { randomBytes, randomUUID } from 'node:crypto'
import { z } from 'zod'
import { getPath, readNumber, safeJsonParse } from '../../../lib/json.js'
import { AuthenticationFailedError, ParseFailedError } from '../../../lib/errors.js'
import { expectJson } from '../../../network/response.js'
import type { NetworkAccess, RawResponse } from '../../../network/types.js'
import type { LoginContext, LoginFlow } from '../../../session/manager.js'
import { defineAdapter } from '../../define-adapter.js'

const ADAPTER_ID = 'coinmarketcap'
const PORTAL_API = 'https://portal-api.coinmarketcap.com/v1'
const ANTIBOT_API = 'https://api.commonservice.io/gateway-api/v1/public/antibot'
const SESSION_COOKIE = 's'
const CAPTCHA_OK = '000000'

const PORTAL_HEADERS = {
  authorization: 'Basic Og==',
  origin: 'https://pro.coinmarketcap.com',
  referer: 'https://pro.coinmarketcap.com/',
  'x-requested-with': 'xhr',
}

const DEVICE_INFO = {
  screen_resolution: '1920,1080',
  available_screen_resolution: '1920,1040',
  system_version: 'unknown',
  brand_model: 'unknown',
  timezone: 'UTC',
  timezoneOffset: 0,
  platform: 'Win32',
  webgl_vendor: 'unknown',
  webgl_renderer: 'unknown',
}

const captchaRequiredSchema = z.object({
  captchaSecurityId: z.string().min(1),
  captchaBizCode: z.string(),
})

const challengeSchema = z.object({
  code: z.string(),
  success: z.boolean(),
  data: z.object({
    sig: z.string(),
    salt: z.string(),
    path2: z.string(),
    ek: z.string(),
    captchaType: z.string(),
    tag: z.string(),
  }),
})

const validationSchema = z.object({
  code: z.string(),
  success: z.boolean(),
  data: z.object({ token: z.string().optional() }).passthrough().nullable(),
})

/** Browser fingerprint kept for every request of one login */
interface Fingerprint {
  fvideoId: string
  bncUuid: string
}

function sessionCookie(setCookies: readonly string[]): string | undefined {
  return setCookies.find(cookie => cookie.startsWith(`${SESSION_COOKIE}=`) && cookie.length > 2)
}

function loginBody(ctx: LoginContext, fingerprint: Fingerprint, captcha = '', securityId = '') {
  return {
    email: ctx.config.credentials.email,
    password: ctx.config.credentials.password,
    captcha,
    securityId,
    deviceInfo: JSON.stringify(DEVICE_INFO),
    fvideoId: fingerprint.fvideoId,
  }
}

function antibotHeaders(fingerprint: Fingerprint): Record<string, string> {
  return {
    origin: 'https://pro.coinmarketcap.com',
    referer: 'https://pro.coinmarketcap.com/',
    'content-type': 'text/plain; charset=UTF-8',
    clienttype: 'web',
    'captcha-sdk-version': '1.0.0',
    'x-captcha-se': 'true',
    'bnc-uuid': fingerprint.bncUuid,
    'fvideo-id': fingerprint.fvideoId,
    'device-info': Buffer.from(JSON.stringify(DEVICE_INFO)).toString('base64'),
  }
}

async function postLogin(
  network: NetworkAccess,
  body: ReturnType<typeof loginBody>,
  provider: string,
  signal?: AbortSignal
): Promise<RawResponse> {
  const response = await network.request('POST', `${PORTAL_API}/login`, null, {
    json: body,
    headers: PORTAL_HEADERS,
    signal,
  })
  if (response.status === 400 || response.status === 401 || response.status === 403) {
    throw new AuthenticationFailedError(provider, `Login rejected with HTTP ${response.status}`)
  }
  return response
}

export const coinmarketcapLogin: LoginFlow = async ctx => {
  const { config, network, signal, log } = ctx
  const fingerprint: Fingerprint = { fvideoId: randomBytes(20).toString('hex'), bncUuid: randomUUID() }

  const first = await postLogin(network, loginBody(ctx, fingerprint), config.name, signal)
  const direct = sessionCookie(first.setCookies)
  if (first.ok && direct) {
    return { cookies: [direct] }
  }

  const required = captchaRequiredSchema.safeParse(expectJson(first, 'CoinMarketCap login'))
  if (!required.success) {
    throw new AuthenticationFailedError(config.name, 'Login neither succeeded nor asked for a captcha')
  }
  if (!ctx.captcha) {
    throw new AuthenticationFailedError(config.name, 'Login requires a captcha and no solver is configured')
  }
  const securityId = required.data.captchaSecurityId
  const baseForm = `bizId=CMC_login&sv=20220812&lang=en&securityCheckResponseValidateId=${encodeURIComponent(securityId)}&clientType=web`

  const challengeResponse = await network.request('POST', `${ANTIBOT_API}/getCaptcha`, null, {
    body: baseForm,
    headers: antibotHeaders(fingerprint),
    relay: false,
    signal,
  })
  const challenge = challengeSchema.parse(expectJson(challengeResponse, 'Captcha challenge'))
  log.info('Captcha challenge received', { captchaType: challenge.data.captchaType })

  const solution = await ctx.captcha.solve(
    {
      provider: config.name,
      kind: challenge.data.captchaType,
      payload: { ...challenge.data, securityId, bizId: 'CMC_login' },
    },
    signal
  )

  const validationResponse = await network.request('POST', `${ANTIBOT_API}/validateCaptcha`, null, {
    body: `${baseForm}&data=${encodeURIComponent(solution)}&s=306704&sig=${encodeURIComponent(challenge.data.sig)}`,
    headers: antibotHeaders(fingerprint),
    relay: false,
    signal,
  })
  const validation = validationSchema.parse(expectJson(validationResponse, 'Captcha validation'))
  const captchaToken = validation.data?.token
  if (!validation.success || validation.code !== CAPTCHA_OK || !captchaToken) {
    throw new AuthenticationFailedError(config.name, `Captcha validation failed with code ${validation.code}`)
  }

  const final = await postLogin(network, loginBody(ctx, fingerprint, captchaToken, securityId), config.name, signal)
  const cookie = final.ok ? sessionCookie(final.setCookies) : undefined
  if (!cookie) {
    throw new AuthenticationFailedError(
      config.name,
      final.ok ? 'Login succeeded but returned no session cookie' : `Login failed with HTTP ${final.status}`
    )
  }
  return { cookies: [cookie] }
}

export const coinmarketcapAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'CoinMarketCap',
  authModes: ['captcha_login', 'cookie_session'],
  login: coinmarketcapLogin,

  async collect(session, ctx, metrics) {
    if (!sessionCookie(session.transport.cookies)) {
      throw new AuthenticationFailedError(ctx.config.name, `Session has no '${SESSION_COOKIE}' cookie`)
    }

    const statsResponse = await ctx.network.request('GET', `${PORTAL_API}/accounts/my/plan/stats`, session, {
      headers: PORTAL_HEADERS,
      signal: ctx.signal,
    })
    if (statsResponse.status === 401) {
      throw new AuthenticationFailedError(ctx.config.name, 'Portal session is no longer valid')
    }
    const stats = expectJson(statsResponse, 'CoinMarketCap plan stats')

    // Plan info is best effort; planLimit covers accounts where it is missing
    const planResponse = await ctx.network.request('GET', `${PORTAL_API}/accounts/my/plan/info`, session, {
      headers: PORTAL_HEADERS,
      signal: ctx.signal,
    })
    const planJson = planResponse.ok ? safeJsonParse(planResponse.body) : undefined
    const plan = planJson?.ok ? planJson.value : undefined
    if (!planResponse.ok) {
      ctx.log.warn('Plan info unavailable', { statusCode: planResponse.status })
    }

    const labels = { usage_calculation: 'monthly_credits' }
    metrics.quota(
      {
        used: () => readNumber(stats, 'month.credits_used'),
        limit: () => {
          if (getPath(plan, 'keyPlan.plan.limit_monthly') != null) {
            return readNumber(plan, 'keyPlan.plan.limit_monthly')
          }
          const configured = ctx.config.options.planLimit
          if (configured) {
            return readNumber({ planLimit: configured }, 'planLimit')
          }
          throw new ParseFailedError('Plan info carries no monthly limit', 'keyPlan.plan.limit_monthly')
        },
      },
      labels
    )
    metrics.add('usage_used_today', readNumber(stats, 'day.credits_used'), labels)
  },
})
