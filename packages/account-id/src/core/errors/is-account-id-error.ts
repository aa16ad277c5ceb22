import type { ErrorContext } from "../../ports/error"

export type AccountIdErrorLike = Error & {
  readonly code: string
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural guard for toolkit errors.
 *
 * Unlike `instanceof AccountIdError`, this also recognises errors created by
 * another copy of the package (e.g. a duplicated dependency).
 */
export function isAccountIdError(e: unknown): e is AccountIdErrorLike {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}
