/**
 * Type guard utilities
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value)
}

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message
  if (isString(error)) return error
  return String(error)
}

/** HTTP status carried by SDK errors (`status` or `statusCode`), if any. */
export function getErrorStatus(error: unknown): number | null {
  if (!isRecord(error)) return null
  if (isNumber(error.status)) return error.status
  if (isNumber(error.statusCode)) return error.statusCode
  return null
}

/** Node system error code (`ECONNRESET`, ...), looking through `cause`. */
export function getErrorCode(error: unknown): string | null {
  if (!isRecord(error)) return null
  if (isString(error.code)) return error.code
  return error.cause === undefined ? null : getErrorCode(error.cause)
}
