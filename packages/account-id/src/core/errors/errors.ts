import type { ErrorContext } from "../../ports/error"
import { AccountIdError } from "./account-id-error"

/**
 * Thrown by the abort-style validator. An invalid literal is a defect in the
 * calling code, not a runtime condition to recover from.
 */
export class AccountIdInvariantError extends AccountIdError<"invariant_violation"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invariant_violation", context, isOperational: false })
  }
}

/** Binary framing failure: truncated input, trailing bytes or a non-string payload. */
export class AccountIdDecodeError extends AccountIdError<"decode_failed"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { code: "decode_failed", ...options })
  }
}

export class AccountIdTypeError extends AccountIdError<"invalid_type"> {
  constructor(kind: string, value: unknown) {
    super(`${kind} must be a string, got ${value === null ? "null" : typeof value}`, {
      code: "invalid_type",
      context: { kind, type: value === null ? "null" : typeof value },
    })
  }
}
