import { AccountIdInvariantError } from "../errors/errors"
import { classifyCharCode, MAX_LEN, MIN_LEN } from "./validate"

/**
 * Abort-style mirror of `validate` for values that are known when the code
 * is written (constants, literals). Any violation throws an
 * `AccountIdInvariantError`, which is a programmer error rather than bad
 * input.
 *
 * Works on UTF-16 code units: anything outside ASCII is an invalid character
 * here, and lengths of ASCII strings equal their byte lengths, so it accepts
 * exactly what `validate` accepts.
 */
export function validateOrThrow(id: string): void {
  if (id.length < MIN_LEN) {
    throw new AccountIdInvariantError("Account ID is too short", { accountId: id })
  }
  if (id.length > MAX_LEN) {
    throw new AccountIdInvariantError("Account ID is too long", { accountId: id })
  }

  scan(id, 0, false)
}

function scan(id: string, index: number, previousIsSeparator: boolean): void {
  if (index >= id.length) {
    if (previousIsSeparator) {
      throw new AccountIdInvariantError(
        "Account ID cannot end with a separator (-, _, .)",
        { accountId: id, index: index - 1 },
      )
    }
    return
  }

  switch (classifyCharCode(id.charCodeAt(index))) {
    case "body":
      return scan(id, index + 1, false)
    case "separator":
      if (previousIsSeparator) {
        throw new AccountIdInvariantError(
          "Account ID cannot contain a redundant separator (-, _, .)",
          { accountId: id, index },
        )
      }
      if (index === 0) {
        throw new AccountIdInvariantError(
          "Account ID cannot start with a separator (-, _, .)",
          { accountId: id, index },
        )
      }
      return scan(id, index + 1, true)
    case "invalid":
      throw new AccountIdInvariantError(
        "Account ID cannot contain invalid characters (only a-z, 0-9, -, _ and . are allowed)",
        { accountId: id, index },
      )
  }
}
