/**
 * Inspector Settings
 *
 * Reads the process environment once at startup into an explicit settings
 * object that is handed to each component. Global settings are validated here
 * and fail the whole run; per-provider values are passed through raw so the
 * credential store can reject one provider without affecting the others.
 *
 * Environment Variables:
 * - PUSH_GATEWAY_ENABLED (default off) / PUSH_GATEWAY_URL / PUSH_GATEWAY_JOB / METRIC_PREFIX
 * - DNS_MAP: JSON object of hostname -> address
 * - FLARESOLVER_ENABLED / FLARESOLVER_ENDPOINT / FLARESOLVER_PROXY /
 *   FLARESOLVER_MAX_TIMEOUT_MS / FLARESOLVER_HOSTS
 * - OUTBOUND_PROXY_URL, REQUEST_TIMEOUT_MS, INSPECTOR_CONCURRENCY, RUN_DEADLINE_MS
 * - CAPTCHA_SOLVER_ENDPOINT / CAPTCHA_SOLVER_API_KEY / CAPTCHA_SOLVER_TIMEOUT_MS
 * - INSPECTOR_PROVIDERS: comma list, declared order of providers
 * - <PROVIDER>_*: per-provider values, see providerEntryFromEnv
 */

import { z } from 'zod'
import { ConfigInvalidError } from '../lib/errors.js'
import type { ProviderEntry } from '../credentials/store.js'
import { safeJsonParse } from '../lib/json.js'

export const MAX_REQUEST_TIMEOUT_MS = 30_000

export interface RelaySettings {
  endpoint: string
  proxyUrl?: string
  maxTimeoutMs: number
  /** Hostnames routed through the relay; empty means every host */
  hosts: readonly string[]
}

export interface NetworkSettings {
  dnsMap: Readonly<Record<string, string>>
  relay?: RelaySettings
  proxyUrl?: string
  timeoutMs: number
}

export interface PushGatewaySettings {
  enabled: boolean
  url: string
  job: string
  metricPrefix: string
}

export interface CaptchaSolverSettings {
  endpoint: string
  apiKey?: string
  timeoutMs: number
}

export interface InspectorSettings {
  pushGateway: PushGatewaySettings
  network: NetworkSettings
  captchaSolver?: CaptchaSolverSettings
  concurrency: number
  runDeadlineMs: number
  debug: boolean
  providers: ProviderEntry[]
}

/**
 * Built-in providers: default adapter and auth mode per provider name.
 * INSPECTOR_PROVIDERS may name others, which then need <P>_ADAPTER.
 */
export const PROVIDER_CATALOG: Readonly<Record<string, { adapter: string; authMode: string }>> = {
  quicknode: { adapter: 'quicknode', authMode: 'static_key' },
  coingecko: { adapter: 'coingecko', authMode: 'static_key' },
  twitterapi: { adapter: 'twitterapi', authMode: 'static_key' },
  'twitterapi-console': { adapter: 'twitterapi-console', authMode: 'cookie_session' },
  birdeye: { adapter: 'birdeye', authMode: 'email_password' },
  coinmarketcap: { adapter: 'coinmarketcap', authMode: 'captcha_login' },
  openai: { adapter: 'openai', authMode: 'static_key' },
  anthropic: { adapter: 'anthropic', authMode: 'static_key' },
}

/** Per-provider env suffixes copied into ProviderEntry.options */
const OPTION_SUFFIXES: Readonly<Record<string, string>> = {
  USAGE_URL: 'usageUrl',
  USED_FIELD: 'usedField',
  LIMIT_FIELD: 'limitField',
  KEY_HEADER: 'keyHeader',
  KEY_PREFIX: 'keyPrefix',
  PLAN_LIMIT: 'planLimit',
}

type Env = Readonly<Record<string, string | undefined>>

function envBool(env: Env, key: string): boolean {
  const value = env[key]
  if (value === undefined || value === '') {
    return false
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase())
}

function envText(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue)

const globalSchema = z.object({
  PUSH_GATEWAY_URL: z.string().url().default('http://localhost:9091'),
  PUSH_GATEWAY_JOB: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, 'job name may only contain letters, digits, _ . -')
    .default('cron-apikey-usage'),
  METRIC_PREFIX: z
    .string()
    .regex(/^[a-zA-Z_:]*$/, 'metric prefix may only contain letters, _ and :')
    .default('apikey_'),
  FLARESOLVER_ENDPOINT: z.string().url().default('http://localhost:8191/v1'),
  FLARESOLVER_PROXY: z.string().url().optional(),
  FLARESOLVER_MAX_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).default(25_000),
  OUTBOUND_PROXY_URL: z.string().url().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).default(MAX_REQUEST_TIMEOUT_MS),
  INSPECTOR_CONCURRENCY: positiveInt(4),
  RUN_DEADLINE_MS: positiveInt(240_000),
  CAPTCHA_SOLVER_ENDPOINT: z.string().url().optional(),
  CAPTCHA_SOLVER_API_KEY: z.string().optional(),
  CAPTCHA_SOLVER_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).default(MAX_REQUEST_TIMEOUT_MS),
})

const dnsMapSchema = z.record(z.string().min(1), z.string().ip())

/** Upper-case env prefix for a provider name: twitterapi-console -> TWITTERAPI_CONSOLE */
export function envPrefix(provider: string): string {
  return provider.toUpperCase().replace(/[^A-Z0-9]+/g, '_')
}

function splitCommaList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
}

function parseDnsMap(raw: string | undefined): Record<string, string> {
  if (!raw) return {}
  const parsed = safeJsonParse(raw)
  if (!parsed.ok) {
    throw new ConfigInvalidError('settings', [`DNS_MAP is not valid JSON: ${parsed.error}`])
  }
  const result = dnsMapSchema.safeParse(parsed.value)
  if (!result.success) {
    throw new ConfigInvalidError(
      'settings',
      result.error.issues.map(issue => `DNS_MAP.${issue.path.join('.')}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Build the raw entry for one provider from <PREFIX>_* variables.
 */
export function providerEntryFromEnv(name: string, env: Env): ProviderEntry {
  const prefix = envPrefix(name)
  const catalog = PROVIDER_CATALOG[name]
  const ttlSeconds = envText(env, `${prefix}_SESSION_TTL_SECONDS`)

  const options: Record<string, string> = {}
  for (const [suffix, option] of Object.entries(OPTION_SUFFIXES)) {
    const value = envText(env, `${prefix}_${suffix}`)
    if (value !== undefined) {
      options[option] = value
    }
  }

  return {
    name,
    enabled: envBool(env, `${prefix}_ENABLED`),
    adapter: envText(env, `${prefix}_ADAPTER`) ?? catalog?.adapter ?? name.toLowerCase(),
    authMode: envText(env, `${prefix}_AUTH_MODE`) ?? catalog?.authMode ?? 'static_key',
    apiKeys: envText(env, `${prefix}_APIKEY`),
    adminKey: envText(env, `${prefix}_ADMIN_APIKEY`),
    email: envText(env, `${prefix}_EMAIL`),
    password: envText(env, `${prefix}_PASSWORD`),
    cookies: envText(env, `${prefix}_COOKIES`),
    cookiesExpireAt: envText(env, `${prefix}_COOKIES_EXPIRE_AT`),
    sessionTtlSeconds: ttlSeconds === undefined ? undefined : Number(ttlSeconds),
    options,
  }
}

/**
 * Load settings from the environment.
 * @throws ConfigInvalidError when a global setting is malformed
 */
export function loadSettings(env: Env = process.env): InspectorSettings {
  // Blank variables mean unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = globalSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigInvalidError(
      'settings',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  const g = parsed.data

  const declared = splitCommaList(env.INSPECTOR_PROVIDERS)
  const providerNames = declared.length > 0 ? declared : Object.keys(PROVIDER_CATALOG)

  const relay: RelaySettings | undefined = envBool(env, 'FLARESOLVER_ENABLED')
    ? {
        endpoint: g.FLARESOLVER_ENDPOINT,
        proxyUrl: g.FLARESOLVER_PROXY,
        maxTimeoutMs: g.FLARESOLVER_MAX_TIMEOUT_MS,
        hosts: splitCommaList(env.FLARESOLVER_HOSTS).map(host => host.toLowerCase()),
      }
    : undefined

  return {
    pushGateway: {
      enabled: envBool(env, 'PUSH_GATEWAY_ENABLED'),
      url: g.PUSH_GATEWAY_URL.replace(/\/+$/, ''),
      job: g.PUSH_GATEWAY_JOB,
      metricPrefix: g.METRIC_PREFIX,
    },
    network: {
      dnsMap: parseDnsMap(envText(env, 'DNS_MAP')),
      relay,
      proxyUrl: g.OUTBOUND_PROXY_URL,
      timeoutMs: g.REQUEST_TIMEOUT_MS,
    },
    captchaSolver: g.CAPTCHA_SOLVER_ENDPOINT
      ? {
          endpoint: g.CAPTCHA_SOLVER_ENDPOINT,
          apiKey: g.CAPTCHA_SOLVER_API_KEY,
          timeoutMs: g.CAPTCHA_SOLVER_TIMEOUT_MS,
        }
      : undefined,
    concurrency: g.INSPECTOR_CONCURRENCY,
    runDeadlineMs: g.RUN_DEADLINE_MS,
    debug: envBool(env, 'DEBUG_ENABLED'),
    providers: providerNames.map(name => providerEntryFromEnv(name, env)),
  }
}
