import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  AuthenticationFailedError,
  ConfigInvalidError,
  ConfigMissingError,
  NetworkFailedError,
  ParseFailedError,
  SinkUnreachableError,
  classifyError,
  formatErrorForLog,
} from '../errors.js'

describe('error taxonomy', () => {
  it('names errors after their class', () => {
    expect(new ConfigMissingError('quicknode').name).toBe('ConfigMissingError')
    expect(new ParseFailedError('bad').name).toBe('ParseFailedError')
  })

  it('joins config issues into the message', () => {
    const error = new ConfigInvalidError('birdeye', ['email: must not be empty', 'password: must not be empty'])
    expect(error.message).toBe(
      "Invalid configuration for provider 'birdeye': email: must not be empty; password: must not be empty"
    )
  })

  it('appends the field path to parse failures', () => {
    expect(new ParseFailedError('Expected a number', 'data.limit').message).toBe('Expected a number (at data.limit)')
  })

  it('derives the network error code from its details', () => {
    expect(new NetworkFailedError('x', { transient: true, timedOut: true }).code).toBe('NETWORK_TIMEOUT')
    expect(new NetworkFailedError('x', { transient: false, statusCode: 404 }).code).toBe('HTTP_STATUS')
    expect(new NetworkFailedError('x', { transient: true }).code).toBe('NETWORK_FAILED')
  })
})

describe('classifyError', () => {
  it('maps config errors to config_invalid', () => {
    expect(classifyError(new ConfigMissingError('a')).status).toBe('config_invalid')
    const classified = classifyError(new ConfigInvalidError('a', ['bad']))
    expect(classified.status).toBe('config_invalid')
    expect(classified.details).toEqual({ issues: ['bad'] })
  })

  it('maps authentication failures to auth_failed', () => {
    const classified = classifyError(new AuthenticationFailedError('a', 'Login rejected with HTTP 401'))
    expect(classified).toMatchObject({
      status: 'auth_failed',
      code: 'AUTHENTICATION_FAILED',
      message: 'Login rejected with HTTP 401',
      isRetryable: false,
    })
  })

  it('maps network failures to network_failed and keeps transience', () => {
    const classified = classifyError(new NetworkFailedError('Usage returned HTTP 503', { transient: true, statusCode: 503 }))
    expect(classified).toMatchObject({
      status: 'network_failed',
      code: 'HTTP_STATUS',
      isRetryable: true,
      details: { statusCode: 503 },
    })
  })

  it('maps sink failures to network_failed', () => {
    expect(classifyError(new SinkUnreachableError('down', 502)).status).toBe('network_failed')
  })

  it('maps parse failures and schema mismatches to parse_failed', () => {
    expect(classifyError(new ParseFailedError('bad')).status).toBe('parse_failed')

    const result = z.object({ data: z.object({ usage: z.number() }) }).safeParse({ data: { usage: 'many' } })
    expect(result.success).toBe(false)
    if (result.success) return
    const classified = classifyError(result.error)
    expect(classified.status).toBe('parse_failed')
    expect(classified.code).toBe('SCHEMA_MISMATCH')
    expect(classified.message).toBe('Unexpected response shape: data.usage: Expected number, received string')
  })

  it('maps socket error codes to network_failed', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' })
    expect(classifyError(error)).toMatchObject({ status: 'network_failed', isRetryable: true })
  })

  it('maps runtime type errors to parse_failed', () => {
    expect(classifyError(new TypeError("Cannot read properties of undefined (reading 'used')")).status).toBe(
      'parse_failed'
    )
  })

  it('maps anything else to network_failed', () => {
    const classified = classifyError('boom')
    expect(classified.status).toBe('network_failed')
    expect(classified.code).toBe('UNEXPECTED_ERROR')
  })
})

describe('formatErrorForLog', () => {
  it('produces prefixed log fields', () => {
    const fields = formatErrorForLog(classifyError(new ParseFailedError('bad', 'data.used')))
    expect(fields).toMatchObject({
      error_status: 'parse_failed',
      error_code: 'PARSE_FAILED',
      error_message: 'bad (at data.used)',
      error_is_retryable: false,
      error_name: 'ParseFailedError',
    })
  })
})
