import { AccountIdError } from "./account-id-error"

export const ParseErrorKind = {
  /** Shorter than `MIN_LEN` bytes. */
  TooShort: "TooShort",
  /** Longer than `MAX_LEN` bytes. */
  TooLong: "TooLong",
  /** A character outside `[a-z0-9]` and the separators `-`, `_`, `.`. */
  InvalidChar: "InvalidChar",
  /** A separator at the start, at the end, or right after another separator. */
  RedundantSeparator: "RedundantSeparator",
} as const

export type ParseErrorKind = (typeof ParseErrorKind)[keyof typeof ParseErrorKind]

const PARSE_ERROR_CODES = {
  TooShort: "too_short",
  TooLong: "too_long",
  InvalidChar: "invalid_char",
  RedundantSeparator: "redundant_separator",
} as const satisfies Record<ParseErrorKind, Lowercase<string>>

export type ParseErrorCode = (typeof PARSE_ERROR_CODES)[ParseErrorKind]

/** A code point and its 0-based code-point index within the input. */
export type CharPosition = Readonly<{
  index: number
  char: string
}>

/**
 * Raised (or returned inside a failed result) when a string is not a valid
 * account ID. Only the first violation found by the left-to-right scan is
 * reported.
 */
export class ParseAccountError extends AccountIdError<ParseErrorCode> {
  readonly kind: ParseErrorKind
  readonly char: CharPosition | undefined

  constructor(kind: ParseErrorKind, char?: CharPosition) {
    super(messageFor(kind, char), {
      code: PARSE_ERROR_CODES[kind],
      context: {
        kind,
        ...(char ? { index: char.index, char: char.char } : {}),
      },
    })

    this.kind = kind
    this.char = char
  }
}

function messageFor(kind: ParseErrorKind, char?: CharPosition): string {
  const at = char ? ` '${char.char}' at index ${char.index}` : ""

  switch (kind) {
    case ParseErrorKind.TooShort:
      return "the Account ID is too short"
    case ParseErrorKind.TooLong:
      return "the Account ID is too long"
    case ParseErrorKind.InvalidChar:
      return `the Account ID contains an invalid character${at}`
    case ParseErrorKind.RedundantSeparator:
      return `the Account ID has a redundant separator${at}`
  }
}
