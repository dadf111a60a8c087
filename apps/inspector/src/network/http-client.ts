/**
 * HTTP Client
 *
 * The one transport every adapter and login flow goes through.
 * - undici fetch with a shared dispatcher (connection pool safe for concurrent use)
 * - hostname -> address overrides applied at socket lookup
 * - optional outbound proxy
 * - optional anti-bot relay for selected hosts
 * - per-request timeout plus caller abort signal
 *
 * No retries here: callers decide whether a failure is worth repeating.
 * Non-2xx responses are returned, not thrown.
 */

import { Agent, ProxyAgent, fetch as undiciFetch } from 'undici'
import type { Dispatcher, RequestInit, Response } from 'undici'
import { loggers } from '../config/logger.js'
import { MAX_REQUEST_TIMEOUT_MS } from '../config/settings.js'
import type { RelaySettings } from '../config/settings.js'
import { NetworkFailedError } from '../lib/errors.js'
import type { Session } from '../types.js'
import { createOverrideLookup } from './dns.js'
import { buildRelayPayload, decodeRelayResponse, shouldRelay } from './relay.js'
import type { HttpMethod, NetworkAccess, RawResponse, RequestOptions } from './types.js'

const log = loggers.network

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36'

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'user-agent': DEFAULT_USER_AGENT,
  accept: 'application/json, text/plain, */*',
  'accept-language': 'en-US,en;q=0.9',
}

/** Relay calls get the relay's own budget plus this margin, within the client cap */
const RELAY_TIMEOUT_MARGIN_MS = 5_000

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface HttpClientOptions {
  dnsMap?: Readonly<Record<string, string>>
  relay?: RelaySettings
  proxyUrl?: string
  timeoutMs?: number
  /** Log response body previews at debug level */
  logBodies?: boolean
  /** Replaces undici fetch, for tests */
  fetch?: FetchLike
}

function buildDispatcher(options: HttpClientOptions): Dispatcher | undefined {
  if (options.proxyUrl) {
    // The proxy resolves the target host; DNS overrides do not apply behind it
    return new ProxyAgent(options.proxyUrl)
  }
  if (options.dnsMap && Object.keys(options.dnsMap).length > 0) {
    return new Agent({ connect: { lookup: createOverrideLookup(options.dnsMap) } })
  }
  return undefined
}

function buildUrl(url: string, query: RequestOptions['query']): URL {
  const target = new URL(url)
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue
      if (typeof value === 'string' || typeof value === 'number') {
        target.searchParams.set(key, String(value))
      } else {
        for (const item of value) target.searchParams.append(key, item)
      }
    }
  }
  return target
}

function buildBody(options: RequestOptions): { body?: string; contentType?: string } {
  if (options.json !== undefined) {
    return { body: JSON.stringify(options.json), contentType: 'application/json' }
  }
  if (options.form) {
    return {
      body: new URLSearchParams(options.form).toString(),
      contentType: 'application/x-www-form-urlencoded',
    }
  }
  if (options.body !== undefined) {
    return { body: options.body }
  }
  return {}
}

function sessionHeaders(session: Session | null): Record<string, string> {
  if (!session) return {}
  const headers: Record<string, string> = { ...session.transport.headers }
  if (session.transport.cookies.length > 0) {
    headers.cookie = session.transport.cookies.join('; ')
  }
  return headers
}

/** Keep only name=value of each Set-Cookie header */
function cookiePairs(setCookie: readonly string[]): string[] {
  return setCookie
    .map(value => value.split(';')[0]?.trim() ?? '')
    .filter(pair => pair.includes('='))
}

function headerRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {}
  response.headers.forEach((value, key) => {
    headers[key] = value
  })
  return headers
}

/** host + path only; query strings may carry tokens */
function describeUrl(url: URL): string {
  return `${url.host}${url.pathname}`
}

function transportFailure(error: unknown, url: URL, timedOut: boolean, timeoutMs: number, callerAborted: boolean): NetworkFailedError {
  if (timedOut) {
    return new NetworkFailedError(`Request to ${describeUrl(url)} timed out after ${timeoutMs}ms`, {
      url: url.toString(),
      transient: true,
      timedOut: true,
      cause: error,
    })
  }
  if (callerAborted) {
    return new NetworkFailedError(`Request to ${describeUrl(url)} was aborted`, {
      url: url.toString(),
      transient: false,
      cause: error,
    })
  }
  if (error instanceof NetworkFailedError) {
    return error
  }
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause : undefined
  const detail = cause?.message ?? (error instanceof Error ? error.message : String(error))
  return new NetworkFailedError(`Request to ${describeUrl(url)} failed: ${detail}`, {
    url: url.toString(),
    transient: true,
    cause: error,
  })
}

export class HttpClient implements NetworkAccess {
  private readonly fetchImpl: FetchLike
  private readonly dispatcher?: Dispatcher
  private readonly relay?: RelaySettings
  private readonly timeoutMs: number
  private readonly logBodies: boolean

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetch ?? undiciFetch
    this.dispatcher = buildDispatcher(options)
    this.relay = options.relay
    this.timeoutMs = Math.min(options.timeoutMs ?? MAX_REQUEST_TIMEOUT_MS, MAX_REQUEST_TIMEOUT_MS)
    this.logBodies = options.logBodies ?? false
  }

  async request(
    method: HttpMethod,
    url: string,
    session: Session | null,
    options: RequestOptions = {}
  ): Promise<RawResponse> {
    const target = buildUrl(url, options.query)

    if (shouldRelay(this.relay, method, target, options)) {
      return this.viaRelay(this.relay, method === 'POST' ? 'POST' : 'GET', target, options)
    }

    const { body, contentType } = buildBody(options)
    const headers: Record<string, string> = {
      ...DEFAULT_HEADERS,
      ...(contentType ? { 'content-type': contentType } : {}),
      ...sessionHeaders(session),
      ...options.headers,
    }

    const timeoutMs = Math.min(options.timeoutMs ?? this.timeoutMs, this.timeoutMs)
    return this.send(target, { method, headers, body }, timeoutMs, options.signal, false)
  }

  /**
   * Release pooled connections.
   */
  async close(): Promise<void> {
    await this.dispatcher?.close()
  }

  private async viaRelay(
    relay: RelaySettings,
    method: 'GET' | 'POST',
    target: URL,
    options: RequestOptions
  ): Promise<RawResponse> {
    const payload = buildRelayPayload(relay, method, target, options)
    const relayUrl = new URL(relay.endpoint)
    const timeoutMs = Math.min(
      options.timeoutMs ?? this.timeoutMs,
      this.timeoutMs,
      relay.maxTimeoutMs + RELAY_TIMEOUT_MARGIN_MS
    )
    const raw = await this.send(
      relayUrl,
      {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
      },
      timeoutMs,
      options.signal,
      true
    )

    if (!raw.ok) {
      throw new NetworkFailedError(`Relay returned HTTP ${raw.status}`, {
        url: target.toString(),
        statusCode: raw.status,
        transient: raw.status >= 500,
      })
    }

    const relayed = decodeRelayResponse(raw.body, target.toString())
    return {
      status: relayed.status,
      ok: relayed.status >= 200 && relayed.status < 300,
      url: relayed.url,
      headers: relayed.headers,
      setCookies: relayed.setCookies,
      body: relayed.body,
      durationMs: raw.durationMs,
      relayed: true,
    }
  }

  private async send(
    target: URL,
    init: { method: string; headers: Record<string, string>; body?: string },
    timeoutMs: number,
    signal: AbortSignal | undefined,
    relayed: boolean
  ): Promise<RawResponse> {
    const startTime = Date.now()
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    if (signal?.aborted) {
      controller.abort()
    } else {
      signal?.addEventListener('abort', onAbort, { once: true })
    }

    try {
      const response = await this.fetchImpl(target.toString(), {
        ...init,
        signal: controller.signal,
        redirect: 'follow',
        dispatcher: this.dispatcher,
      })
      // Body read stays under the same timeout
      const body = await response.text()
      const durationMs = Date.now() - startTime

      log.debug('HTTP request completed', {
        method: init.method,
        url: describeUrl(target),
        statusCode: response.status,
        durationMs,
        relay: relayed,
        ...(this.logBodies && { bodyPreview: body.slice(0, 500) }),
      })

      return {
        status: response.status,
        ok: response.ok,
        url: response.url || target.toString(),
        headers: headerRecord(response),
        setCookies: cookiePairs(response.headers.getSetCookie()),
        body,
        durationMs,
        relayed,
      }
    } catch (error) {
      throw transportFailure(error, target, timedOut, timeoutMs, signal?.aborted ?? false)
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
