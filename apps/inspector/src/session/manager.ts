/**
 * Session Manager
 *
 * Turns a provider configuration into a ready-to-use Session. One acquisition
 * per provider+identity per run: concurrent callers share the in-flight
 * promise, later callers get the cached Session, and a failed acquisition
 * stays failed for the rest of the run. A Session known to be expired is
 * re-established once when next requested.
 *
 * Login request sequences belong to the provider adapters and are looked up
 * through a LoginFlowResolver; this module only owns the policy around them.
 */

import type { ILogger } from '@quotawatch/logger'
import { loggers } from '../config/logger.js'
import { AuthenticationFailedError, NetworkFailedError } from '../lib/errors.js'
import type { NetworkAccess } from '../network/types.js'
import type { ActiveProviderConfig, AuthMode, Session, SessionTransport } from '../types.js'
import type { CaptchaSolver } from './captcha.js'

const log = loggers.session

type ConfigByMode = { [M in AuthMode]: Extract<ActiveProviderConfig, { authMode: M }> }

export type LoginProviderConfig = ConfigByMode['email_password'] | ConfigByMode['captcha_login']

export interface LoginContext {
  config: LoginProviderConfig
  network: NetworkAccess
  /** Present only when a solver is configured */
  captcha?: CaptchaSolver
  signal?: AbortSignal
  log: ILogger
}

/** What a successful login leaves behind for subsequent requests */
export interface LoginResult {
  headers?: Record<string, string>
  cookies?: string[]
  token?: string
  expiresAt?: Date
}

export type LoginFlow = (ctx: LoginContext) => Promise<LoginResult>

export type LoginFlowResolver = (config: LoginProviderConfig) => LoginFlow | undefined

export interface SessionManagerOptions {
  network: NetworkAccess
  loginFlows: LoginFlowResolver
  captchaSolver?: CaptchaSolver
  /** Run deadline; aborts in-flight logins */
  signal?: AbortSignal
  now?: () => Date
}

interface StrategyContext {
  identity?: string
  now: Date
}

type Strategy<M extends AuthMode> = (config: ConfigByMode[M], ctx: StrategyContext) => Promise<Session>

const COOKIE_PAIR = /^[^=\s;,]+=[^\s;,]+$/

function sessionOf(
  config: ActiveProviderConfig,
  ctx: StrategyContext,
  transport: Partial<SessionTransport>,
  expiresAt?: Date
): Session {
  return {
    provider: config.name,
    identity: ctx.identity,
    authMode: config.authMode,
    transport: {
      headers: transport.headers ?? {},
      cookies: transport.cookies ?? [],
      apiKeys: transport.apiKeys ?? [],
      adminKey: transport.adminKey,
      token: transport.token,
    },
    establishedAt: ctx.now,
    expiresAt,
  }
}

export class SessionManager {
  private readonly cache = new Map<string, Promise<Session>>()
  private readonly network: NetworkAccess
  private readonly loginFlows: LoginFlowResolver
  private readonly captchaSolver?: CaptchaSolver
  private readonly signal?: AbortSignal
  private readonly now: () => Date
  private readonly strategies: { [M in AuthMode]: Strategy<M> }

  constructor(options: SessionManagerOptions) {
    this.network = options.network
    this.loginFlows = options.loginFlows
    this.captchaSolver = options.captchaSolver
    this.signal = options.signal
    this.now = options.now ?? (() => new Date())

    this.strategies = {
      static_key: async (config, ctx) =>
        sessionOf(config, ctx, {
          apiKeys: config.credentials.apiKeys,
          adminKey: config.credentials.adminKey,
        }),
      email_password: (config, ctx) => this.login(config, ctx),
      captcha_login: (config, ctx) => this.login(config, ctx),
      cookie_session: async (config, ctx) => {
        const { cookies, expiresAt } = config.credentials
        const malformed = cookies.filter(cookie => !COOKIE_PAIR.test(cookie))
        if (cookies.length === 0 || malformed.length > 0) {
          throw new AuthenticationFailedError(config.name, 'Session cookies are malformed')
        }
        // Cookies come from configuration and cannot be renewed here
        if (expiresAt && expiresAt.getTime() <= ctx.now.getTime()) {
          throw new AuthenticationFailedError(
            config.name,
            `Session cookies expired at ${expiresAt.toISOString()}`
          )
        }
        return sessionOf(config, ctx, { cookies }, expiresAt)
      },
    }
  }

  /**
   * @throws AuthenticationFailedError
   */
  async acquire(config: ActiveProviderConfig, identity?: string): Promise<Session> {
    const key = `${config.name}\u0000${identity ?? ''}`
    const cached = this.cache.get(key)

    if (cached) {
      const session = await cached
      if (!this.isExpired(session)) {
        return session
      }
      // Another caller may already have started the renewal
      const current = this.cache.get(key)
      if (current && current !== cached) {
        return current
      }
      log.info('Session expired, re-authenticating', { provider: config.name, identity })
    }

    const pending = this.establish(config, identity)
    this.cache.set(key, pending)
    return pending
  }

  isExpired(session: Session): boolean {
    return session.expiresAt !== undefined && session.expiresAt.getTime() <= this.now().getTime()
  }

  private async establish(config: ActiveProviderConfig, identity?: string): Promise<Session> {
    const ctx: StrategyContext = { identity, now: this.now() }
    try {
      const session = await this.dispatch(config.authMode, config, ctx)
      log.debug('Session established', {
        provider: config.name,
        identity,
        authMode: config.authMode,
        expiresAt: session.expiresAt?.toISOString(),
      })
      return session
    } catch (error) {
      if (error instanceof AuthenticationFailedError) {
        throw error
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new AuthenticationFailedError(config.name, `Session setup failed: ${message}`, { cause: error })
    }
  }

  private dispatch<M extends AuthMode>(mode: M, config: ConfigByMode[M], ctx: StrategyContext): Promise<Session> {
    return this.strategies[mode](config, ctx)
  }

  private async login(config: LoginProviderConfig, ctx: StrategyContext): Promise<Session> {
    const flow = this.loginFlows(config)
    if (!flow) {
      throw new AuthenticationFailedError(config.name, `Adapter '${config.adapter}' has no login flow`)
    }
    if (config.authMode === 'captcha_login' && !this.captchaSolver) {
      throw new AuthenticationFailedError(config.name, 'Captcha login requires CAPTCHA_SOLVER_ENDPOINT')
    }

    const loginCtx: LoginContext = {
      config,
      network: this.network,
      captcha: this.captchaSolver,
      signal: this.signal,
      log: log.child({ provider: config.name }),
    }

    let result: LoginResult
    try {
      result = await flow(loginCtx)
    } catch (error) {
      // One retry, and only for transport hiccups
      if (!(error instanceof NetworkFailedError) || !error.transient || this.signal?.aborted) {
        throw wrapLoginError(config.name, error)
      }
      log.warn('Login hit a transient network error, retrying once', {
        provider: config.name,
        reason: error.message,
      })
      try {
        result = await flow(loginCtx)
      } catch (retryError) {
        throw wrapLoginError(config.name, retryError)
      }
    }

    const expiresAt =
      result.expiresAt ??
      (config.sessionTtlMs !== undefined ? new Date(ctx.now.getTime() + config.sessionTtlMs) : undefined)

    return sessionOf(
      config,
      ctx,
      { headers: result.headers, cookies: result.cookies, token: result.token },
      expiresAt
    )
  }
}

function wrapLoginError(provider: string, error: unknown): AuthenticationFailedError {
  if (error instanceof AuthenticationFailedError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new AuthenticationFailedError(provider, `Login failed: ${message}`, { cause: error })
}
