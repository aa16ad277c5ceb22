import { ParseAccountError, ParseErrorKind, type CharPosition } from "../errors/parse-account-error"
import type { ValidationResult } from "../../ports/parse-result"

/** Shortest valid account ID, in bytes. */
export const MIN_LEN = 2
/** Longest valid account ID, in bytes. */
export const MAX_LEN = 64

/**
 * The account ID grammar as a regular expression, without the length bounds.
 *
 * `validate` does not use it; it exists for schema languages and tooling that
 * want a pattern.
 */
export const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/

type CharClass = "body" | "separator" | "invalid"

export function classifyCharCode(code: number): CharClass {
  if ((code >= 0x61 && code <= 0x7a) || (code >= 0x30 && code <= 0x39)) return "body"
  if (code === 0x2d || code === 0x5f || code === 0x2e) return "separator"
  return "invalid"
}

/** Byte length of `value` once encoded as UTF-8. */
export function utf8ByteLength(value: string): number {
  let bytes = 0

  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? 0
    bytes += codePoint < 0x80 ? 1 : codePoint < 0x800 ? 2 : codePoint < 0x10000 ? 3 : 4
  }

  return bytes
}

/**
 * Checks `id` against the account ID grammar.
 *
 * Length bounds are checked first, then a single left-to-right scan over code
 * points reports the first character that breaks a rule. The scan starts as
 * if a separator had just been seen, so a leading separator is reported as
 * redundant, the same as `..` in the middle.
 *
 * Never throws.
 *
 * @example
 * ```ts
 * validate("alice.near") // { success: true }
 * validate("a__b")       // RedundantSeparator '_' at index 2
 * ```
 */
export function validate(id: string): ValidationResult {
  // UTF-16 length never exceeds UTF-8 length, so long inputs are rejected without a full pass.
  const byteLength = id.length > MAX_LEN ? id.length : utf8ByteLength(id)

  if (byteLength < MIN_LEN) return failure(ParseErrorKind.TooShort)
  if (byteLength > MAX_LEN) return failure(ParseErrorKind.TooLong)

  let lastCharIsSeparator = true
  let last: CharPosition | undefined
  let index = 0

  for (const char of id) {
    last = { index, char }

    const charClass = classifyCharCode(char.codePointAt(0) ?? 0)
    if (charClass === "invalid") {
      return failure(ParseErrorKind.InvalidChar, last)
    }

    const isSeparator = charClass === "separator"
    if (isSeparator && lastCharIsSeparator) {
      return failure(ParseErrorKind.RedundantSeparator, last)
    }

    lastCharIsSeparator = isSeparator
    index++
  }

  if (lastCharIsSeparator) {
    return failure(ParseErrorKind.RedundantSeparator, last)
  }

  return { success: true }
}

/** Grammar predicate over unknown input. */
export function isValidAccountId(value: unknown): value is string {
  return typeof value === "string" && validate(value).success
}

function failure(kind: ParseErrorKind, char?: CharPosition): ValidationResult {
  return { success: false, error: new ParseAccountError(kind, char) }
}
