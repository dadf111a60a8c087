/**
 * Inspector domain model
 *
 * Shapes shared by the credential store, session manager, provider adapters,
 * orchestrator and emitter. Everything the pipeline passes between components
 * is one of these; provider-specific payloads never leave their adapter.
 */

export const AUTH_MODES = ['static_key', 'email_password', 'cookie_session', 'captcha_login'] as const

export type AuthMode = (typeof AUTH_MODES)[number]

export const PROVIDER_STATUSES = [
  'ok',
  'auth_failed',
  'network_failed',
  'parse_failed',
  'disabled',
  'config_invalid',
] as const

export type ProviderStatus = (typeof PROVIDER_STATUSES)[number]

/** Statuses a fault can be classified into */
export type FailureStatus = Exclude<ProviderStatus, 'ok' | 'disabled'>

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface StaticKeyCredentials {
  apiKeys: readonly string[]
  adminKey?: string
}

export interface LoginCredentials {
  email: string
  password: string
}

export interface CookieCredentials {
  /** name=value pairs */
  cookies: readonly string[]
  expiresAt?: Date
}

interface ActiveConfigBase {
  name: string
  adapter: string
  enabled: true
  /** Adapter-specific string options (endpoint overrides, field paths) */
  options: Readonly<Record<string, string>>
  /** Lifetime of a login session; absent means valid for the whole run */
  sessionTtlMs?: number
}

export type ActiveProviderConfig =
  | (ActiveConfigBase & { authMode: 'static_key'; credentials: StaticKeyCredentials })
  | (ActiveConfigBase & { authMode: 'email_password'; credentials: LoginCredentials })
  | (ActiveConfigBase & { authMode: 'captcha_login'; credentials: LoginCredentials })
  | (ActiveConfigBase & { authMode: 'cookie_session'; credentials: CookieCredentials })

/** Disabled providers are kept for reporting only; their credentials are never read. */
export interface DisabledProviderConfig {
  name: string
  adapter: string
  enabled: false
}

export type ProviderConfig = ActiveProviderConfig | DisabledProviderConfig

// ============================================================================
// SESSIONS
// ============================================================================

export interface SessionTransport {
  headers: Readonly<Record<string, string>>
  /** name=value pairs sent as the Cookie header */
  cookies: readonly string[]
  apiKeys: readonly string[]
  adminKey?: string
  /** Bearer or query token obtained by a login flow */
  token?: string
}

export interface Session {
  provider: string
  /** Set when the provider is polled once per configured key */
  identity?: string
  authMode: AuthMode
  transport: Readonly<SessionTransport>
  establishedAt: Date
  expiresAt?: Date
}

// ============================================================================
// RESULTS
// ============================================================================

export type Labels = Readonly<Record<string, string>>

export interface UsageMetric {
  readonly provider: string
  readonly metricName: string
  readonly value: number
  readonly labels: Labels
  readonly observedAt: Date
}

export interface ProviderResult {
  provider: string
  identity?: string
  status: ProviderStatus
  metrics: UsageMetric[]
  errorDetail?: string
  durationMs: number
}

export interface RunBatch {
  runId: string
  startedAt: Date
  finishedAt: Date
  results: ProviderResult[]
}
