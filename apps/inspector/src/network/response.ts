import { NetworkFailedError } from '../lib/errors.js'
import { parseJsonBody } from '../lib/json.js'
import type { RawResponse } from './types.js'

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500
}

/**
 * @throws NetworkFailedError for any non-2xx response
 */
export function expectOk(response: RawResponse, what: string): RawResponse {
  if (!response.ok) {
    throw new NetworkFailedError(`${what} returned HTTP ${response.status}`, {
      url: response.url,
      statusCode: response.status,
      transient: isTransientStatus(response.status),
    })
  }
  return response
}

/**
 * Require a 2xx response and parse its body as JSON.
 */
export function expectJson(response: RawResponse, what: string): unknown {
  return parseJsonBody(expectOk(response, what).body, what)
}
