import type { AccountId } from "./account-id"
import type { AccountIdRef } from "./account-id-ref"

/** Anything that can be compared with an account ID: owned, borrowed or plain text. */
export type AccountIdLike = AccountId | AccountIdRef | string

export type Ordering = -1 | 0 | 1

function textOf(value: AccountIdLike): string {
  return typeof value === "string" ? value : value.asStr()
}

/**
 * The one comparison routine behind every `equals`/`compare` pairing.
 *
 * Orders by UTF-8 bytes. Code-point order is the same order, and unlike
 * `<` on JS strings it does not depend on UTF-16 surrogate layout.
 */
export function compareAccountIds(a: AccountIdLike, b: AccountIdLike): Ordering {
  const left = textOf(a)
  const right = textOf(b)

  if (left === right) return 0

  let i = 0
  while (i < left.length && i < right.length) {
    const x = left.codePointAt(i) ?? 0
    const y = right.codePointAt(i) ?? 0

    if (x !== y) return x < y ? -1 : 1

    i += x > 0xffff ? 2 : 1
  }

  return left.length < right.length ? -1 : 1
}

export function accountIdsEqual(a: AccountIdLike, b: AccountIdLike): boolean {
  return textOf(a) === textOf(b)
}
