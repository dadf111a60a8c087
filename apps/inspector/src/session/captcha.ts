/**
 * Captcha solving hand-off
 *
 * Login flows that hit a captcha describe the challenge and wait for a solved
 * token. Any failure, including a timeout, surfaces as AuthenticationFailed.
 */

import { z } from 'zod'
import type { CaptchaSolverSettings } from '../config/settings.js'
import { AuthenticationFailedError, NetworkFailedError } from '../lib/errors.js'
import { safeJsonParse } from '../lib/json.js'
import type { NetworkAccess, RawResponse } from '../network/types.js'

export interface CaptchaChallenge {
  provider: string
  /** Vendor-specific challenge type, e.g. "slide" */
  kind: string
  /** Challenge context as issued by the provider */
  payload: Readonly<Record<string, unknown>>
}

export interface CaptchaSolver {
  solve(challenge: CaptchaChallenge, signal?: AbortSignal): Promise<string>
}

const solverResponseSchema = z.union([
  z.object({ solution: z.string().min(1) }),
  z.object({ error: z.string() }),
])

/**
 * Posts the challenge as JSON to an external solving service and expects
 * `{ "solution": "..." }` or `{ "error": "..." }` back.
 */
export class HttpCaptchaSolver implements CaptchaSolver {
  constructor(
    private readonly network: NetworkAccess,
    private readonly settings: CaptchaSolverSettings
  ) {}

  async solve(challenge: CaptchaChallenge, signal?: AbortSignal): Promise<string> {
    let response: RawResponse
    try {
      response = await this.network.request('POST', this.settings.endpoint, null, {
        json: challenge,
        headers: this.settings.apiKey ? { authorization: `Bearer ${this.settings.apiKey}` } : {},
        timeoutMs: this.settings.timeoutMs,
        relay: false,
        signal,
      })
    } catch (error) {
      const reason =
        error instanceof NetworkFailedError && error.timedOut ? 'timed out' : 'is unreachable'
      throw new AuthenticationFailedError(challenge.provider, `Captcha solver ${reason}`, { cause: error })
    }

    if (!response.ok) {
      throw new AuthenticationFailedError(
        challenge.provider,
        `Captcha solver returned HTTP ${response.status}`
      )
    }

    const json = safeJsonParse(response.body)
    const parsed = solverResponseSchema.safeParse(json.ok ? json.value : undefined)
    if (!parsed.success) {
      throw new AuthenticationFailedError(challenge.provider, 'Captcha solver returned an unreadable response')
    }
    if ('error' in parsed.data) {
      throw new AuthenticationFailedError(challenge.provider, `Captcha unsolved: ${parsed.data.error}`)
    }
    return parsed.data.solution
  }
}
