/**
 * Credential Store
 *
 * Validates provider entries once at load and answers lookups afterwards.
 * An invalid entry is recorded against its provider only; every other
 * provider still resolves. Disabled entries are never validated.
 */

import { z } from 'zod'
import { ConfigInvalidError, ConfigMissingError } from '../lib/errors.js'
import { safeJsonParse } from '../lib/json.js'
import { AUTH_MODES } from '../types.js'
import type { ActiveProviderConfig, ProviderConfig } from '../types.js'

/**
 * Raw provider entry as supplied by configuration.
 * List fields accept an array, a JSON array string, or a delimited string.
 */
export interface ProviderEntry {
  name: string
  enabled: boolean
  adapter?: string
  authMode?: string
  apiKeys?: string | readonly string[]
  adminKey?: string
  email?: string
  password?: string
  cookies?: string | readonly string[]
  cookiesExpireAt?: string
  sessionTtlSeconds?: number
  options?: Readonly<Record<string, string>>
}

const PLACEHOLDER_KEYS = new Set(['YOUR_API_KEY', 'YOUR_ADMIN_API_KEY', 'CHANGEME', 'CHANGE_ME', 'XXX'])

/** Split a delimited or JSON-array string; arrays pass through */
function toList(separator: string) {
  return (value: unknown): unknown => {
    if (typeof value !== 'string') return value
    const trimmed = value.trim()
    if (trimmed.startsWith('[')) {
      const parsed = safeJsonParse(trimmed)
      return parsed.ok ? parsed.value : value
    }
    return trimmed
      .split(separator)
      .map(item => item.trim())
      .filter(item => item.length > 0)
  }
}

const requiredText = z.string().trim().min(1, 'must not be empty')

const apiKeySchema = requiredText.refine(key => !PLACEHOLDER_KEYS.has(key.toUpperCase()), {
  message: 'placeholder API key',
})

const cookieSchema = z
  .string()
  .trim()
  .regex(/^[^=\s;,]+=[^\s;,]+$/, 'cookie must be a single name=value pair')

const credentialsSchema = z
  .discriminatedUnion('authMode', [
    z.object({
      authMode: z.literal('static_key'),
      apiKeys: z.preprocess(toList(','), z.array(apiKeySchema)).default([]),
      adminKey: apiKeySchema.optional(),
    }),
    z.object({ authMode: z.literal('email_password'), email: requiredText, password: requiredText }),
    z.object({ authMode: z.literal('captcha_login'), email: requiredText, password: requiredText }),
    z.object({
      authMode: z.literal('cookie_session'),
      cookies: z.preprocess(toList(';'), z.array(cookieSchema).min(1, 'at least one cookie is required')),
      cookiesExpireAt: z.coerce.date().optional(),
    }),
  ])
  .superRefine((value, ctx) => {
    if (value.authMode === 'static_key' && value.apiKeys.length === 0 && value.adminKey === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKeys'],
        message: 'at least one API key is required',
      })
    }
  })

const entrySchema = z.object({
  name: requiredText,
  adapter: requiredText,
  authMode: z.enum(AUTH_MODES, {
    errorMap: () => ({ message: `auth mode must be one of ${AUTH_MODES.join(', ')}` }),
  }),
  sessionTtlSeconds: z.number().int().positive().optional(),
  options: z.record(z.string()).default({}),
})

type StoredEntry =
  | { kind: 'valid'; config: ProviderConfig }
  | { kind: 'invalid'; error: ConfigInvalidError }

function validate(entry: ProviderEntry): ActiveProviderConfig {
  const base = entrySchema.safeParse({
    ...entry,
    adapter: entry.adapter ?? entry.name,
    authMode: entry.authMode ?? 'static_key',
  })
  if (!base.success) {
    throw new ConfigInvalidError(entry.name, formatIssues(base.error))
  }

  const creds = credentialsSchema.safeParse({ ...entry, authMode: base.data.authMode })
  if (!creds.success) {
    throw new ConfigInvalidError(entry.name, formatIssues(creds.error))
  }

  const common = {
    name: base.data.name,
    adapter: base.data.adapter,
    enabled: true as const,
    options: base.data.options,
    sessionTtlMs: base.data.sessionTtlSeconds === undefined ? undefined : base.data.sessionTtlSeconds * 1000,
  }
  const c = creds.data

  switch (c.authMode) {
    case 'static_key':
      return { ...common, authMode: c.authMode, credentials: { apiKeys: c.apiKeys, adminKey: c.adminKey } }
    case 'email_password':
      return { ...common, authMode: c.authMode, credentials: { email: c.email, password: c.password } }
    case 'captcha_login':
      return { ...common, authMode: c.authMode, credentials: { email: c.email, password: c.password } }
    case 'cookie_session':
      return { ...common, authMode: c.authMode, credentials: { cookies: c.cookies, expiresAt: c.cookiesExpireAt } }
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export class CredentialStore {
  private readonly entries = new Map<string, StoredEntry>()
  private readonly order: string[] = []

  private constructor() {}

  /**
   * Validate entries and build a store. Never throws for a bad entry;
   * the failure is returned by resolve() for that provider.
   */
  static load(entries: readonly ProviderEntry[]): CredentialStore {
    const store = new CredentialStore()

    for (const entry of entries) {
      if (store.entries.has(entry.name)) {
        store.entries.set(entry.name, {
          kind: 'invalid',
          error: new ConfigInvalidError(entry.name, ['provider is declared more than once']),
        })
        continue
      }
      store.order.push(entry.name)

      if (!entry.enabled) {
        store.entries.set(entry.name, {
          kind: 'valid',
          config: { name: entry.name, adapter: entry.adapter ?? entry.name, enabled: false },
        })
        continue
      }

      try {
        store.entries.set(entry.name, { kind: 'valid', config: validate(entry) })
      } catch (error) {
        if (!(error instanceof ConfigInvalidError)) throw error
        store.entries.set(entry.name, { kind: 'invalid', error })
      }
    }

    return store
  }

  /** Provider names in declared order */
  names(): string[] {
    return [...this.order]
  }

  /**
   * @throws ConfigMissingError when no entry exists
   * @throws ConfigInvalidError when the entry failed validation
   */
  resolve(name: string): ProviderConfig {
    const stored = this.entries.get(name)
    if (!stored) throw new ConfigMissingError(name)
    if (stored.kind === 'invalid') throw stored.error
    return stored.config
  }

  /** Validation failures, for startup logging */
  problems(): ConfigInvalidError[] {
    const problems: ConfigInvalidError[] = []
    for (const stored of this.entries.values()) {
      if (stored.kind === 'invalid') problems.push(stored.error)
    }
    return problems
  }
}
