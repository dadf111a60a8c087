/**
 * Anti-bot relay (FlareSolverr protocol)
 *
 * The relay fetches the target in a real browser and returns the rendered
 * page. JSON APIs come back wrapped in the browser's HTML viewer, so the
 * payload is unwrapped from its <pre> element.
 */

import * as cheerio from 'cheerio'
import { z } from 'zod'
import { NetworkFailedError } from '../lib/errors.js'
import { safeJsonParse } from '../lib/json.js'
import type { RelaySettings } from '../config/settings.js'
import type { HttpMethod, RequestOptions } from './types.js'

export interface RelayPayload {
  cmd: 'request.get' | 'request.post'
  url: string
  maxTimeout: number
  postData?: string
  proxy?: { url: string }
}

const relayResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  solution: z
    .object({
      url: z.string(),
      status: z.number(),
      response: z.string(),
      headers: z.record(z.string()).optional(),
      cookies: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
    })
    .optional(),
})

export interface RelayedResponse {
  status: number
  url: string
  headers: Record<string, string>
  setCookies: string[]
  body: string
}

/**
 * Whether a request can and should go through the relay.
 * The relay only speaks GET and form POST, and forwards no request headers.
 */
export function shouldRelay(
  relay: RelaySettings | undefined,
  method: HttpMethod,
  url: URL,
  options: RequestOptions
): relay is RelaySettings {
  if (!relay || options.relay === false) return false
  if (method !== 'GET' && method !== 'POST') return false
  if (relay.hosts.length === 0) return true
  return relay.hosts.includes(url.hostname.toLowerCase())
}

function encodePostData(options: RequestOptions): string | undefined {
  if (options.form) {
    return new URLSearchParams(options.form).toString()
  }
  if (options.body !== undefined) {
    return options.body
  }
  if (options.json !== undefined && typeof options.json === 'object' && options.json !== null) {
    const params = new URLSearchParams()
    for (const [key, value] of Object.entries(options.json)) {
      if (value !== undefined && value !== null) params.set(key, String(value))
    }
    return params.toString()
  }
  return undefined
}

export function buildRelayPayload(
  relay: RelaySettings,
  method: 'GET' | 'POST',
  url: URL,
  options: RequestOptions
): RelayPayload {
  const payload: RelayPayload = {
    cmd: method === 'POST' ? 'request.post' : 'request.get',
    url: url.toString(),
    maxTimeout: relay.maxTimeoutMs,
  }
  if (method === 'POST') {
    payload.postData = encodePostData(options) ?? ''
  }
  if (relay.proxyUrl) {
    payload.proxy = { url: relay.proxyUrl }
  }
  return payload
}

/**
 * Extract the API body from rendered HTML.
 * Bodies that are not HTML are returned unchanged.
 */
export function unwrapRenderedBody(rendered: string): string {
  const trimmed = rendered.trim()
  if (!trimmed.startsWith('<')) {
    return rendered
  }
  const $ = cheerio.load(trimmed)
  const pre = $('pre').first()
  if (pre.length > 0) {
    return pre.text()
  }
  const bodyText = $('body').text().trim()
  return bodyText.startsWith('{') || bodyText.startsWith('[') ? bodyText : rendered
}

/**
 * Decode the relay's own JSON response.
 * @throws NetworkFailedError when the relay reports an error
 */
export function decodeRelayResponse(relayBody: string, targetUrl: string): RelayedResponse {
  const json = safeJsonParse(relayBody)
  const parsed = relayResponseSchema.safeParse(json.ok ? json.value : undefined)
  if (!parsed.success) {
    throw new NetworkFailedError('Relay returned an unexpected response', {
      url: targetUrl,
      transient: false,
      cause: parsed.error,
    })
  }

  const { status, message, solution } = parsed.data
  if (status !== 'ok' || !solution) {
    throw new NetworkFailedError(`Relay failed: ${message ?? status}`, {
      url: targetUrl,
      transient: false,
    })
  }

  return {
    status: solution.status,
    url: solution.url,
    headers: solution.headers ?? {},
    setCookies: (solution.cookies ?? []).map(cookie => `${cookie.name}=${cookie.value}`),
    body: unwrapRenderedBody(solution.response),
  }
}
