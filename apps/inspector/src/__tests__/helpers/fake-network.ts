/**
 * In-process stand-ins for the network and the pipeline's value objects.
 */

import { loggers } from '../../config/logger.js'
import { NetworkFailedError } from '../../lib/errors.js'
import type { HttpMethod, NetworkAccess, RawResponse, RequestOptions } from '../../network/types.js'
import type { InspectionContext } from '../../providers/types.js'
import type {
  ActiveProviderConfig,
  AuthMode,
  Session,
  SessionTransport,
  StaticKeyCredentials,
} from '../../types.js'

export interface RecordedRequest {
  method: HttpMethod
  /** URL as passed, without query */
  url: string
  session: Session | null
  options: RequestOptions
}

type Reply = RawResponse | Error | ((request: RecordedRequest) => RawResponse | Promise<RawResponse>)

interface Route {
  method: HttpMethod
  url: string
  replies: Reply[]
}

export function response(
  status: number,
  body: string,
  extra: { setCookies?: string[]; headers?: Record<string, string> } = {}
): RawResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    url: 'https://fake.invalid/',
    headers: extra.headers ?? {},
    setCookies: extra.setCookies ?? [],
    body,
    durationMs: 1,
    relayed: false,
  }
}

export function jsonResponse(
  body: unknown,
  status = 200,
  extra: { setCookies?: string[] } = {}
): RawResponse {
  return response(status, JSON.stringify(body), extra)
}

export function timeoutError(url = 'https://fake.invalid/'): NetworkFailedError {
  return new NetworkFailedError(`Request to ${new URL(url).host} timed out after 30000ms`, {
    url,
    transient: true,
    timedOut: true,
  })
}

/**
 * Routes are matched on method and URL (query excluded). Each route replays
 * its replies in order and repeats the last one.
 */
export class FakeNetwork implements NetworkAccess {
  readonly requests: RecordedRequest[] = []
  private readonly routes: Route[] = []

  on(method: HttpMethod, url: string, ...replies: Reply[]): this {
    this.routes.push({ method, url, replies })
    return this
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter(request => request.url === url)
  }

  async request(
    method: HttpMethod,
    url: string,
    session: Session | null,
    options: RequestOptions = {}
  ): Promise<RawResponse> {
    const recorded: RecordedRequest = { method, url, session, options }
    this.requests.push(recorded)

    const route = this.routes.find(candidate => candidate.method === method && candidate.url === url)
    if (!route || route.replies.length === 0) {
      throw new NetworkFailedError(`No fake route for ${method} ${url}`, { url, transient: false })
    }
    const reply = route.replies.length > 1 ? route.replies.shift() : route.replies[0]
    if (reply === undefined) {
      throw new NetworkFailedError(`No fake reply for ${method} ${url}`, { url, transient: false })
    }
    if (reply instanceof Error) {
      throw reply
    }
    if (typeof reply === 'function') {
      return reply(recorded)
    }
    return reply
  }
}

export function staticKeyConfig(
  name: string,
  credentials: StaticKeyCredentials,
  extra: { adapter?: string; options?: Record<string, string> } = {}
): ActiveProviderConfig {
  return {
    name,
    adapter: extra.adapter ?? name,
    enabled: true,
    options: extra.options ?? {},
    authMode: 'static_key',
    credentials,
  }
}

export function makeSession(
  provider: string,
  transport: Partial<SessionTransport> = {},
  extra: { authMode?: AuthMode; identity?: string } = {}
): Session {
  return {
    provider,
    identity: extra.identity,
    authMode: extra.authMode ?? 'static_key',
    transport: {
      headers: transport.headers ?? {},
      cookies: transport.cookies ?? [],
      apiKeys: transport.apiKeys ?? [],
      adminKey: transport.adminKey,
      token: transport.token,
    },
    establishedAt: new Date('2026-01-15T12:00:00.000Z'),
  }
}

export const FIXED_NOW = new Date('2026-01-15T12:00:00.000Z')

export function makeContext(
  config: ActiveProviderConfig,
  network: NetworkAccess,
  extra: Partial<Pick<InspectionContext, 'labels' | 'signal' | 'now'>> = {}
): InspectionContext {
  return {
    config,
    network,
    labels: extra.labels,
    signal: extra.signal,
    now: extra.now ?? (() => FIXED_NOW),
    log: loggers.providers,
  }
}
