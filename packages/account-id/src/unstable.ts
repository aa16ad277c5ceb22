import { type AccountId, ownUnchecked } from "./core/account-id"

/**
 * Builds an `AccountId` without validating `id`.
 *
 * Every other way of obtaining an `AccountId` guarantees the text is valid;
 * this one does not, and operations on an invalid value give unspecified
 * results. Meant for trusted storage that was validated when written.
 *
 * @deprecated Use `AccountId.parse`. Kept for callers migrating from
 * unchecked constructors; may be removed without notice.
 */
export function newUnvalidatedAccountId(id: string): AccountId {
  return ownUnchecked(id)
}
