import type { ParseResult } from "../ports/parse-result"
import { type AccountId, ownFromRef } from "./account-id"
import { type AccountType, classifyAccountId } from "./account-type"
import { type AccountIdLike, accountIdsEqual, compareAccountIds, type Ordering } from "./compare"
import type { AccountIdLiteral } from "./validation/account-id-literal"
import { MAX_LEN, MIN_LEN, validate } from "./validation/validate"
import { validateOrThrow } from "./validation/validate-or-throw"

const encoder = new TextEncoder()

const SYSTEM_ACCOUNT = "system"

let createUnchecked: (id: string) => AccountIdRef

/**
 * Borrowed, validated account ID.
 *
 * A view holds a reference to the caller's string rather than a copy of it;
 * JS strings are immutable, so the text it was validated against cannot
 * change underneath it. `AccountIdRef` is to {@link AccountId} what a slice
 * is to an owned buffer: cheap to create from an owned value, promoted to an
 * owned value with {@link AccountIdRef.toOwned}.
 *
 * @example
 * ```ts
 * const alice = AccountIdRef.parse("alice.near")
 * alice.getParentAccountId()?.asStr() // "near"
 *
 * AccountIdRef.safeParse("invalid.").success // false
 * ```
 */
export class AccountIdRef {
  static readonly MIN_LEN = MIN_LEN
  static readonly MAX_LEN = MAX_LEN

  static {
    createUnchecked = (id) => new AccountIdRef(id)
  }

  private constructor(private readonly value: string) {
    Object.freeze(this)
  }

  /** @throws ParseAccountError */
  static parse(id: string): AccountIdRef {
    const result = validate(id)
    if (!result.success) throw result.error

    return new AccountIdRef(id)
  }

  static safeParse(id: string): ParseResult<AccountIdRef> {
    const result = validate(id)

    return result.success ? { success: true, value: new AccountIdRef(id) } : result
  }

  static is(value: unknown): value is AccountIdRef {
    return value instanceof AccountIdRef
  }

  /**
   * Builds a view from a string literal that is checked at compile time:
   * passing an invalid literal, or a non-literal `string`, is a type error.
   *
   * The literal is validated again at run time and an invalid one throws
   * `AccountIdInvariantError`, for callers that bypass the type check.
   *
   * @example
   * ```ts
   * const ROOT = AccountIdRef.fromLiteral("near")
   * ```
   */
  static fromLiteral<S extends string>(id: S & AccountIdLiteral<S>): AccountIdRef {
    validateOrThrow(id)

    return new AccountIdRef(id)
  }

  asStr(): string {
    return this.value
  }

  asBytes(): Uint8Array {
    return encoder.encode(this.value)
  }

  /** Length in bytes. */
  len(): number {
    // valid account IDs are ASCII: one byte per UTF-16 unit
    return this.value.length
  }

  toOwned(): AccountId {
    return ownFromRef(this)
  }

  /**
   * `true` for the reserved `system` account.
   */
  isSystem(): boolean {
    return this.value === SYSTEM_ACCOUNT
  }

  /**
   * `true` if the account has no parent. `system` is reserved and is never
   * top-level even though it contains no `.`.
   *
   * @example
   * ```ts
   * AccountIdRef.parse("near").isTopLevel()       // true
   * AccountIdRef.parse("alice.near").isTopLevel() // false
   * ```
   */
  isTopLevel(): boolean {
    return !this.isSystem() && !this.value.includes(".")
  }

  /**
   * `true` if this account is a direct sub-account of `parent`.
   *
   * @example
   * ```ts
   * const app = AccountIdRef.parse("app.alice.near")
   * app.isSubAccountOf(AccountIdRef.parse("alice.near")) // true
   * app.isSubAccountOf(AccountIdRef.parse("near"))       // false, not a direct child
   * ```
   */
  isSubAccountOf(parent: AccountIdRef | AccountId): boolean {
    const suffix = `.${parent.asStr()}`
    if (!this.value.endsWith(suffix)) return false

    return !this.value.slice(0, -suffix.length).includes(".")
  }

  getAccountType(): AccountType {
    return classifyAccountId(this.value)
  }

  /**
   * The account after the first `.`, or `undefined` for a top-level account.
   *
   * The remainder of a valid account ID split at a separator is itself valid,
   * so it is not validated again.
   */
  getParentAccountId(): AccountIdRef | undefined {
    const dot = this.value.indexOf(".")
    if (dot === -1) return undefined

    return createUnchecked(this.value.slice(dot + 1))
  }

  equals(other: AccountIdLike): boolean {
    return accountIdsEqual(this, other)
  }

  compare(other: AccountIdLike): Ordering {
    return compareAccountIds(this, other)
  }

  toString(): string {
    return this.value
  }

  toJSON(): string {
    return this.value
  }
}

/**
 * Builds a view without validating it. Only for text whose validity follows
 * from how it was obtained; not exported from the package root.
 */
export function newUnchecked(id: string): AccountIdRef {
  return createUnchecked(id)
}
