import { describe, it, expect, vi } from 'vitest'
import {
  FakeNetwork,
  FIXED_NOW,
  jsonResponse,
  staticKeyConfig,
  timeoutError,
} from '../../__tests__/helpers/fake-network.js'
import { AuthenticationFailedError, ParseFailedError } from '../../lib/errors.js'
import type { ActiveProviderConfig } from '../../types.js'
import type { CaptchaSolver } from '../captcha.js'
import { SessionManager } from '../manager.js'
import type { LoginFlow, LoginProviderConfig } from '../manager.js'

function loginConfig(
  extra: { authMode?: 'email_password' | 'captcha_login'; sessionTtlMs?: number } = {}
): LoginProviderConfig {
  return {
    name: 'birdeye',
    adapter: 'birdeye',
    enabled: true,
    options: {},
    authMode: extra.authMode ?? 'email_password',
    credentials: { email: 'ops@example.com', password: 'test-password' },
    sessionTtlMs: extra.sessionTtlMs,
  }
}

function cookieConfig(cookies: string[], expiresAt?: Date): ActiveProviderConfig {
  return {
    name: 'twitterapi-console',
    adapter: 'twitterapi-console',
    enabled: true,
    options: {},
    authMode: 'cookie_session',
    credentials: { cookies, expiresAt },
  }
}

function managerWith(flow: LoginFlow | undefined, extra: { now?: () => Date; captchaSolver?: CaptchaSolver } = {}) {
  const network = new FakeNetwork()
  const manager = new SessionManager({
    network,
    loginFlows: () => flow,
    captchaSolver: extra.captchaSolver,
    now: extra.now ?? (() => FIXED_NOW),
  })
  return { manager, network }
}

describe('SessionManager', () => {
  describe('static_key', () => {
    it('wraps the keys without touching the network', async () => {
      const { manager, network } = managerWith(undefined)

      const session = await manager.acquire(
        staticKeyConfig('openai', { apiKeys: ['test-key-1'], adminKey: 'test-admin-key' })
      )

      expect(session.provider).toBe('openai')
      expect(session.authMode).toBe('static_key')
      expect(session.transport.apiKeys).toEqual(['test-key-1'])
      expect(session.transport.adminKey).toBe('test-admin-key')
      expect(session.establishedAt).toEqual(FIXED_NOW)
      expect(session.expiresAt).toBeUndefined()
      expect(network.requests).toHaveLength(0)
    })

    it('keeps identities apart', async () => {
      const { manager } = managerWith(undefined)
      const config = staticKeyConfig('coingecko', { apiKeys: ['test-key-1'] })

      const first = await manager.acquire(config, 'key-a')
      const second = await manager.acquire(config, 'key-b')

      expect(first).not.toBe(second)
      expect(second.identity).toBe('key-b')
    })
  })

  describe('login modes', () => {
    it('logs in once and returns the cached session afterwards', async () => {
      const flow = vi.fn<LoginFlow>(async () => ({ token: 'test-token' }))
      const { manager } = managerWith(flow)
      const config = loginConfig()

      const [a, b] = await Promise.all([manager.acquire(config), manager.acquire(config)])
      const c = await manager.acquire(config)

      expect(flow).toHaveBeenCalledTimes(1)
      expect(a).toBe(b)
      expect(c).toBe(a)
      expect(a.transport.token).toBe('test-token')
    })

    it('shares one login request between concurrent acquires of the same identity', async () => {
      const loginUrl = 'https://login.example.test/session'
      let release: () => void = () => undefined
      const gate = new Promise<void>(resolve => {
        release = resolve
      })
      const flow = vi.fn<LoginFlow>(async ({ network }) => {
        await network.request('POST', loginUrl, null)
        return { token: 'test-token' }
      })
      const { manager, network } = managerWith(flow)
      network.on('POST', loginUrl, async () => {
        await gate
        return jsonResponse({ ok: true })
      })
      const config = loginConfig()

      const first = manager.acquire(config, 'ops')
      const second = manager.acquire(config, 'ops')
      release()
      const [a, b] = await Promise.all([first, second])

      expect(network.requestsTo(loginUrl)).toHaveLength(1)
      expect(flow).toHaveBeenCalledTimes(1)
      expect(a).toBe(b)
      expect(a.identity).toBe('ops')
    })

    it('passes credentials to the login flow', async () => {
      const flow = vi.fn<LoginFlow>(async () => ({ cookies: ['s=test-session'] }))
      const { manager } = managerWith(flow)

      const session = await manager.acquire(loginConfig())

      expect(flow.mock.calls[0]?.[0].config.credentials).toEqual({
        email: 'ops@example.com',
        password: 'test-password',
      })
      expect(session.transport.cookies).toEqual(['s=test-session'])
    })

    it('re-authenticates once a session has expired', async () => {
      let now = FIXED_NOW
      const flow = vi.fn<LoginFlow>(async () => ({ token: 'test-token' }))
      const { manager } = managerWith(flow, { now: () => now })
      const config = loginConfig({ sessionTtlMs: 60_000 })

      const first = await manager.acquire(config)
      expect(first.expiresAt).toEqual(new Date(FIXED_NOW.getTime() + 60_000))

      now = new Date(FIXED_NOW.getTime() + 120_000)
      const second = await manager.acquire(config)

      expect(flow).toHaveBeenCalledTimes(2)
      expect(second).not.toBe(first)
      expect(manager.isExpired(second)).toBe(false)
    })

    it('prefers the expiry reported by the login flow', async () => {
      const expiresAt = new Date('2026-01-15T13:00:00.000Z')
      const { manager } = managerWith(async () => ({ token: 'test-token', expiresAt }))

      const session = await manager.acquire(loginConfig({ sessionTtlMs: 5_000 }))

      expect(session.expiresAt).toEqual(expiresAt)
    })

    it('retries exactly once after a transient network failure', async () => {
      const flow = vi
        .fn<LoginFlow>()
        .mockRejectedValueOnce(timeoutError())
        .mockResolvedValueOnce({ token: 'test-token' })
      const { manager } = managerWith(flow)

      const session = await manager.acquire(loginConfig())

      expect(flow).toHaveBeenCalledTimes(2)
      expect(session.transport.token).toBe('test-token')
    })

    it('gives up after the retry fails too', async () => {
      const flow = vi.fn<LoginFlow>(async () => {
        throw timeoutError('https://multichain-api.birdeye.so/user/login')
      })
      const { manager } = managerWith(flow)

      const attempt = manager.acquire(loginConfig())

      await expect(attempt).rejects.toBeInstanceOf(AuthenticationFailedError)
      await expect(attempt).rejects.toThrow(
        'Login failed: Request to multichain-api.birdeye.so timed out after 30000ms'
      )
      expect(flow).toHaveBeenCalledTimes(2)
    })

    it('does not retry other failures', async () => {
      const flow = vi.fn<LoginFlow>(async () => {
        throw new ParseFailedError('Login response is not JSON')
      })
      const { manager } = managerWith(flow)

      await expect(manager.acquire(loginConfig())).rejects.toThrow('Login failed: Login response is not JSON')
      expect(flow).toHaveBeenCalledTimes(1)
    })

    it('keeps authentication failures as they are', async () => {
      const flow = vi.fn<LoginFlow>(async () => {
        throw new AuthenticationFailedError('birdeye', 'Login rejected with HTTP 401')
      })
      const { manager } = managerWith(flow)

      await expect(manager.acquire(loginConfig())).rejects.toThrow(/^Login rejected with HTTP 401$/)
    })

    it('stays failed for the rest of the run', async () => {
      const flow = vi.fn<LoginFlow>(async () => {
        throw new AuthenticationFailedError('birdeye', 'Login rejected with HTTP 401')
      })
      const { manager } = managerWith(flow)
      const config = loginConfig()

      await expect(manager.acquire(config)).rejects.toThrow(AuthenticationFailedError)
      await expect(manager.acquire(config)).rejects.toThrow(AuthenticationFailedError)
      expect(flow).toHaveBeenCalledTimes(1)
    })

    it('fails when the adapter has no login flow', async () => {
      const { manager } = managerWith(undefined)

      await expect(manager.acquire(loginConfig())).rejects.toThrow("Adapter 'birdeye' has no login flow")
    })

    it('requires a captcha solver for captcha logins', async () => {
      const flow = vi.fn<LoginFlow>(async () => ({ token: 'test-token' }))
      const { manager } = managerWith(flow)

      await expect(manager.acquire(loginConfig({ authMode: 'captcha_login' }))).rejects.toThrow(
        'Captcha login requires CAPTCHA_SOLVER_ENDPOINT'
      )
      expect(flow).not.toHaveBeenCalled()
    })

    it('hands the solver to captcha logins', async () => {
      const solver: CaptchaSolver = { solve: vi.fn(async () => 'test-solution') }
      const flow = vi.fn<LoginFlow>(async ctx => {
        const token = await ctx.captcha?.solve({ provider: 'coinmarketcap', kind: 'SLIDE', payload: {} })
        return { token }
      })
      const { manager } = managerWith(flow, { captchaSolver: solver })

      const session = await manager.acquire(loginConfig({ authMode: 'captcha_login' }))

      expect(session.transport.token).toBe('test-solution')
    })
  })

  describe('cookie_session', () => {
    it('wraps well-formed cookies', async () => {
      const expiresAt = new Date('2026-02-01T00:00:00.000Z')
      const { manager, network } = managerWith(undefined)

      const session = await manager.acquire(cookieConfig(['session-token=test-cookie'], expiresAt))

      expect(session.transport.cookies).toEqual(['session-token=test-cookie'])
      expect(session.expiresAt).toEqual(expiresAt)
      expect(network.requests).toHaveLength(0)
    })

    it('rejects malformed cookies', async () => {
      const { manager } = managerWith(undefined)

      await expect(manager.acquire(cookieConfig(['not a cookie']))).rejects.toThrow('Session cookies are malformed')
      await expect(manager.acquire({ ...cookieConfig([]), name: 'other' })).rejects.toThrow(
        'Session cookies are malformed'
      )
    })

    it('treats expired cookies as a terminal authentication failure', async () => {
      const { manager } = managerWith(undefined)

      await expect(
        manager.acquire(cookieConfig(['session-token=test-cookie'], new Date('2026-01-01T00:00:00.000Z')))
      ).rejects.toThrow('Session cookies expired at 2026-01-01T00:00:00.000Z')
    })
  })
})
