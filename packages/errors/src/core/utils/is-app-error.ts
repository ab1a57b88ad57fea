import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural guard for {@link AppError}. Matches errors created by other
 * copies of this package as well, where `instanceof` would fail.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false

  const fields: Record<string, unknown> = { ...e }
  const timestamp = fields.timestamp

  return (
    typeof fields.code === "string" &&
    isRecord(fields.context) &&
    typeof fields.isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}
