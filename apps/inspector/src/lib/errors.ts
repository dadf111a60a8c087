/**
 * Error Taxonomy and Classification
 *
 * Every fault inside a provider inspection is converted into a ProviderResult
 * status at the adapter boundary. classifyError is the single mapping from a
 * thrown value to that status; formatErrorForLog turns the classification into
 * structured log fields.
 */

import { ZodError } from 'zod'
import type { FailureStatus } from '../types.js'

export const ERROR_CODES = {
  CONFIG_MISSING: 'CONFIG_MISSING',
  CONFIG_INVALID: 'CONFIG_INVALID',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  NETWORK_FAILED: 'NETWORK_FAILED',
  NETWORK_TIMEOUT: 'NETWORK_TIMEOUT',
  HTTP_STATUS: 'HTTP_STATUS',
  PARSE_FAILED: 'PARSE_FAILED',
  SCHEMA_MISMATCH: 'SCHEMA_MISMATCH',
  SINK_UNREACHABLE: 'SINK_UNREACHABLE',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export abstract class InspectorError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A provider is referenced but has no configuration entry */
export class ConfigMissingError extends InspectorError {
  readonly code = ERROR_CODES.CONFIG_MISSING

  constructor(readonly provider: string) {
    super(`No configuration for provider '${provider}'`)
  }
}

/** A provider's configuration failed validation at load time */
export class ConfigInvalidError extends InspectorError {
  readonly code = ERROR_CODES.CONFIG_INVALID

  constructor(
    readonly provider: string,
    readonly issues: readonly string[]
  ) {
    super(`Invalid configuration for provider '${provider}': ${issues.join('; ')}`)
  }
}

export class AuthenticationFailedError extends InspectorError {
  readonly code = ERROR_CODES.AUTHENTICATION_FAILED

  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export interface NetworkFailureDetails {
  url?: string
  statusCode?: number
  /** Whether a single immediate retry is reasonable */
  transient: boolean
  timedOut?: boolean
  cause?: unknown
}

export class NetworkFailedError extends InspectorError {
  readonly code: ErrorCode
  readonly url?: string
  readonly statusCode?: number
  readonly transient: boolean
  readonly timedOut: boolean

  constructor(message: string, details: NetworkFailureDetails) {
    super(message, { cause: details.cause })
    this.url = details.url
    this.statusCode = details.statusCode
    this.transient = details.transient
    this.timedOut = details.timedOut ?? false
    this.code = this.timedOut
      ? ERROR_CODES.NETWORK_TIMEOUT
      : details.statusCode !== undefined
        ? ERROR_CODES.HTTP_STATUS
        : ERROR_CODES.NETWORK_FAILED
  }
}

export class ParseFailedError extends InspectorError {
  readonly code = ERROR_CODES.PARSE_FAILED

  constructor(
    message: string,
    readonly path?: string
  ) {
    super(path ? `${message} (at ${path})` : message)
  }
}

export class SinkUnreachableError extends InspectorError {
  readonly code = ERROR_CODES.SINK_UNREACHABLE

  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/**
 * Structured error information for logging and result conversion
 */
export interface ClassifiedError {
  status: FailureStatus
  code: ErrorCode
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]

/**
 * Classify any thrown value into a provider failure status.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ConfigMissingError || error instanceof ConfigInvalidError) {
    return {
      status: 'config_invalid',
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: error instanceof ConfigInvalidError ? { issues: error.issues } : undefined,
      originalError: error,
    }
  }

  if (error instanceof AuthenticationFailedError) {
    return {
      status: 'auth_failed',
      code: error.code,
      message: error.message,
      isRetryable: false,
      originalError: error,
    }
  }

  if (error instanceof NetworkFailedError) {
    return {
      status: 'network_failed',
      code: error.code,
      message: error.message,
      isRetryable: error.transient,
      details: error.statusCode !== undefined ? { statusCode: error.statusCode } : undefined,
      originalError: error,
    }
  }

  if (error instanceof SinkUnreachableError) {
    return {
      status: 'network_failed',
      code: error.code,
      message: error.message,
      isRetryable: false,
      originalError: error,
    }
  }

  if (error instanceof ParseFailedError) {
    return {
      status: 'parse_failed',
      code: error.code,
      message: error.message,
      isRetryable: false,
      originalError: error,
    }
  }

  // Provider payload did not match the expected schema
  if (error instanceof ZodError) {
    return {
      status: 'parse_failed',
      code: ERROR_CODES.SCHEMA_MISMATCH,
      message: `Unexpected response shape: ${describeZodIssues(error)}`,
      isRetryable: false,
      details: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const errorCode = readErrorCode(error)
    if (errorCode && NETWORK_ERROR_CODES.includes(errorCode)) {
      return {
        status: 'network_failed',
        code: errorCode === 'ETIMEDOUT' ? ERROR_CODES.NETWORK_TIMEOUT : ERROR_CODES.NETWORK_FAILED,
        message: `Network error: ${errorCode}`,
        isRetryable: true,
        details: { errorCode },
        originalError: error,
      }
    }

    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return {
        status: 'network_failed',
        code: ERROR_CODES.NETWORK_TIMEOUT,
        message: error.message || 'Operation aborted',
        isRetryable: false,
        originalError: error,
      }
    }

    // Faults raised while walking a payload (undefined access, bad JSON)
    if (error instanceof TypeError || error instanceof SyntaxError || error instanceof RangeError) {
      return {
        status: 'parse_failed',
        code: ERROR_CODES.PARSE_FAILED,
        message: error.message,
        isRetryable: false,
        originalError: error,
      }
    }

    return {
      status: 'network_failed',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    status: 'network_failed',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  // undici wraps socket errors: TypeError('fetch failed', { cause })
  const cause = error.cause
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}

function describeZodIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_status: classified.status,
    error_code: classified.code,
    error_message: classified.message,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_name: classified.originalError.name,
      error_stack: classified.originalError.stack,
    }),
  }
}
