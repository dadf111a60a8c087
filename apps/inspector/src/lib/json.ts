import { ParseFailedError } from './errors.js'

export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

/**
 * Parse a response body as JSON or throw ParseFailedError.
 */
export function parseJsonBody(body: string, what: string): unknown {
  const parsed = safeJsonParse(body)
  if (!parsed.ok) {
    throw new ParseFailedError(`${what} is not valid JSON: ${parsed.error}`)
  }
  return parsed.value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read a dotted path such as "data.usage.used". Numeric segments index arrays.
 * Returns undefined when any segment is missing.
 */
export function getPath(value: unknown, path: string): unknown {
  let current: unknown = value
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)]
    } else if (isRecord(current)) {
      current = current[segment]
    } else {
      return undefined
    }
  }
  return current
}

/**
 * Read a finite number at a dotted path. Numeric strings are accepted.
 * @throws ParseFailedError when the field is missing or not numeric
 */
export function readNumber(value: unknown, path: string): number {
  const raw = getPath(value, path)
  const num = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw
  if (typeof num !== 'number' || !Number.isFinite(num)) {
    throw new ParseFailedError(`Expected a number, got ${describe(raw)}`, path)
  }
  return num
}

function describe(raw: unknown): string {
  if (raw === undefined) return 'nothing'
  if (raw === null) return 'null'
  if (typeof raw === 'string') return `"${raw.slice(0, 40)}"`
  return typeof raw
}
