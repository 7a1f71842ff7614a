import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for values thrown across package boundaries, where
 * `instanceof BaseError` can fail if two copies of this package are loaded.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false
  if (!isRecord(e)) return false

  const timestamp = e.timestamp

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}
