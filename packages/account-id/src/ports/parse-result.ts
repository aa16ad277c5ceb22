import type { ParseAccountError } from "../core/errors/parse-account-error"

export type ParseSuccess<T> = {
  readonly success: true
  readonly value: T
}

export type ParseFailure = {
  readonly success: false
  readonly error: ParseAccountError
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure

/**
 * Outcome of checking a string against the account ID grammar without
 * constructing anything.
 */
export type ValidationResult = { readonly success: true } | ParseFailure
