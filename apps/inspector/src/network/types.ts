/**
 * Network access contract
 *
 * Adapters and login flows talk to providers only through NetworkAccess, so
 * tests can substitute an in-process fake for the whole transport.
 */

import type { Session } from '../types.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export interface RequestOptions {
  headers?: Readonly<Record<string, string>>
  /** Appended to the URL; undefined values are skipped, arrays repeat the key */
  query?: Readonly<Record<string, string | number | readonly string[] | undefined>>
  /** JSON body */
  json?: unknown
  /** application/x-www-form-urlencoded body */
  form?: Readonly<Record<string, string>>
  /** Raw body, sent as-is */
  body?: string
  /** Overrides the client default; capped at the client maximum */
  timeoutMs?: number
  /** Caller cancellation, e.g. the run deadline */
  signal?: AbortSignal
  /** false keeps this call off the anti-bot relay */
  relay?: boolean
}

export interface RawResponse {
  status: number
  ok: boolean
  /** Final URL after redirects */
  url: string
  headers: Readonly<Record<string, string>>
  /** Set-Cookie values, name=value only */
  setCookies: string[]
  body: string
  durationMs: number
  relayed: boolean
}

export interface NetworkAccess {
  request(
    method: HttpMethod,
    url: string,
    session: Session | null,
    options?: RequestOptions
  ): Promise<RawResponse>
}
