import { AccountId } from "./account-id"
import type { AccountIdRef } from "./account-id-ref"

/**
 * Accepts an account ID in either form and returns an owned one.
 *
 * An `AccountId` is returned as is; a view is promoted with `toOwned()`.
 * Lets functions take "any account ID" without the caller converting first.
 *
 * @example
 * ```ts
 * function grant(account: AccountId | AccountIdRef) {
 *   const owner = intoAccountId(account)
 * }
 * ```
 */
export function intoAccountId(value: AccountId | AccountIdRef): AccountId {
  return value instanceof AccountId ? value : value.toOwned()
}
