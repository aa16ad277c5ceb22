import type { ParseResult, ValidationResult } from "../ports/parse-result"
import { type AccountIdRef, newUnchecked } from "./account-id-ref"
import type { AccountType } from "./account-type"
import { type AccountIdLike, accountIdsEqual, compareAccountIds, type Ordering } from "./compare"
import { MAX_LEN, MIN_LEN, validate } from "./validation/validate"

let createOwned: (ref: AccountIdRef) => AccountId

/**
 * Owned account ID: a unique, syntactically valid, human-readable account
 * identifier.
 *
 * There is no way to obtain an `AccountId` whose text fails validation
 * through the package root. Instances are immutable; every transformation
 * produces a new value.
 *
 * ## Rules
 *
 * - 2 to 64 bytes long
 * - labels of `[a-z0-9]` separated by `.`, each label may use single `-` or
 *   `_` between alphanumerics: `1_4m-4l1c3.near` ✔, `not-_alice.near` ✗
 * - no leading, trailing or doubled separators: `_alice.` ✗, `a..near` ✗
 *
 * ## Error kind precedence
 *
 * With several violations, the first one met by the left-to-right scan wins:
 *
 * ```ts
 * AccountId.validate("A__ƒƒluent.") // InvalidChar at 0
 * AccountId.validate("a__ƒƒluent.") // RedundantSeparator at 2
 * AccountId.validate("aƒƒluent.")   // InvalidChar at 1
 * AccountId.validate("affluent.")   // RedundantSeparator at 8
 * ```
 */
export class AccountId {
  static readonly MIN_LEN = MIN_LEN
  static readonly MAX_LEN = MAX_LEN

  static {
    createOwned = (ref) => new AccountId(ref)
  }

  private constructor(private readonly ref: AccountIdRef) {
    Object.freeze(this)
  }

  /** @throws ParseAccountError */
  static parse(id: string): AccountId {
    const result = validate(id)
    if (!result.success) throw result.error

    return new AccountId(newUnchecked(id))
  }

  static safeParse(id: string): ParseResult<AccountId> {
    const result = validate(id)

    return result.success ? { success: true, value: new AccountId(newUnchecked(id)) } : result
  }

  /**
   * Checks a string without constructing an `AccountId`.
   */
  static validate(id: string): ValidationResult {
    return validate(id)
  }

  static is(value: unknown): value is AccountId {
    return value instanceof AccountId
  }

  static compare(a: AccountIdLike, b: AccountIdLike): Ordering {
    return compareAccountIds(a, b)
  }

  /** Borrow as a view. Never copies and never fails. */
  asRef(): AccountIdRef {
    return this.ref
  }

  asStr(): string {
    return this.ref.asStr()
  }

  asBytes(): Uint8Array {
    return this.ref.asBytes()
  }

  len(): number {
    return this.ref.len()
  }

  isSystem(): boolean {
    return this.ref.isSystem()
  }

  isTopLevel(): boolean {
    return this.ref.isTopLevel()
  }

  isSubAccountOf(parent: AccountIdRef | AccountId): boolean {
    return this.ref.isSubAccountOf(parent)
  }

  getAccountType(): AccountType {
    return this.ref.getAccountType()
  }

  getParentAccountId(): AccountIdRef | undefined {
    return this.ref.getParentAccountId()
  }

  equals(other: AccountIdLike): boolean {
    return accountIdsEqual(this, other)
  }

  compare(other: AccountIdLike): Ordering {
    return compareAccountIds(this, other)
  }

  toString(): string {
    return this.ref.asStr()
  }

  toJSON(): string {
    return this.ref.asStr()
  }
}

export function ownFromRef(ref: AccountIdRef): AccountId {
  return createOwned(ref)
}

/**
 * Owned value without validation. Backs the deprecated constructor in
 * `@tessera/account-id/unstable`; not exported from the package root.
 */
export function ownUnchecked(id: string): AccountId {
  return createOwned(newUnchecked(id))
}
