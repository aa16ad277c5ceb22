import fc from "fast-check"
import { AccountId } from "../../core/account-id"
import { AccountIdError } from "../../core/errors/account-id-error"
import { AccountType, accountTypes } from "../../core/account-type"
import { MAX_LEN, MIN_LEN } from "../../core/validation/validate"

const EDGE_CHARS = [..."0123456789abcdefghijklmnopqrstuvwxyz"]
const INNER_SEPARATORS = ["-", "_"]

const MAX_RUN_LEN = 6
const MAX_INNER_SEPARATORS = 2
const MAX_LABELS = 4

const run = fc
  .array(fc.constantFrom(...EDGE_CHARS), { minLength: 1, maxLength: MAX_RUN_LEN })
  .map((chars) => chars.join(""))

/**
 * One `.`-free label: alphanumeric runs joined by single `-` or `_`, so it
 * starts and ends with `[a-z0-9]` and never has two separators in a row.
 */
export function accountLabelArbitrary(): fc.Arbitrary<string> {
  return fc
    .tuple(
      run,
      fc.array(fc.tuple(fc.constantFrom(...INNER_SEPARATORS), run), {
        maxLength: MAX_INNER_SEPARATORS,
      }),
    )
    .map(([head, rest]) => head + rest.map(([sep, tail]) => sep + tail).join(""))
}

/**
 * Named accounts built from labels joined by `.`, within the length bounds.
 * Labels are at most 20 characters, so a generated ID never takes one of the
 * hex shapes and always classifies as `NamedAccount`.
 */
export function namedAccountIdArbitrary(): fc.Arbitrary<AccountId> {
  return fc
    .array(accountLabelArbitrary(), { minLength: 1, maxLength: MAX_LABELS })
    .map((labels) => labels.join("."))
    .filter((id) => id.length >= MIN_LEN && id.length <= MAX_LEN)
    .map((id) => AccountId.parse(id))
}

function hexOf(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex")
}

function hexBytes(length: number): fc.Arbitrary<string> {
  return fc.uint8Array({ minLength: length, maxLength: length }).map(hexOf)
}

export function nearImplicitAccountIdArbitrary(): fc.Arbitrary<AccountId> {
  return hexBytes(32).map((hex) => AccountId.parse(hex))
}

export function ethImplicitAccountIdArbitrary(): fc.Arbitrary<AccountId> {
  return hexBytes(20).map((hex) => AccountId.parse(`0x${hex}`))
}

export function nearDeterministicAccountIdArbitrary(): fc.Arbitrary<AccountId> {
  return hexBytes(20).map((hex) => AccountId.parse(`0s${hex}`))
}

const ARBITRARIES: Record<AccountType, () => fc.Arbitrary<AccountId>> = {
  [AccountType.NamedAccount]: namedAccountIdArbitrary,
  [AccountType.NearImplicitAccount]: nearImplicitAccountIdArbitrary,
  [AccountType.EthImplicitAccount]: ethImplicitAccountIdArbitrary,
  [AccountType.NearDeterministicAccount]: nearDeterministicAccountIdArbitrary,
}

const DEFAULT_WEIGHTS: Record<AccountType, number> = {
  [AccountType.NamedAccount]: 4,
  [AccountType.NearImplicitAccount]: 1,
  [AccountType.EthImplicitAccount]: 1,
  [AccountType.NearDeterministicAccount]: 1,
}

export type AccountIdArbitraryOptions = {
  /**
   * Relative weight per account type. Types left out keep their default
   * weight; a weight of 0 excludes the type.
   * @default { NamedAccount: 4, NearImplicitAccount: 1, EthImplicitAccount: 1, NearDeterministicAccount: 1 }
   */
  weights?: Partial<Record<AccountType, number>>
}

/**
 * Any valid account ID, mixing the per-type arbitraries by weight.
 *
 * @example
 * ```ts
 * fc.assert(fc.property(accountIdArbitrary(), (id) => AccountId.validate(id.asStr()).success))
 *
 * // implicit accounts only
 * accountIdArbitrary({ weights: { NamedAccount: 0, NearDeterministicAccount: 0 } })
 * ```
 */
export function accountIdArbitrary(
  options: AccountIdArbitraryOptions = {},
): fc.Arbitrary<AccountId> {
  const weighted = accountTypes
    .map((type) => ({
      arbitrary: ARBITRARIES[type](),
      weight: options.weights?.[type] ?? DEFAULT_WEIGHTS[type],
    }))
    .filter(({ weight }) => weight > 0)

  if (weighted.length === 0) {
    throw new AccountIdError("At least one account type needs a positive weight", {
      code: "invalid_argument",
      context: { weights: options.weights },
      isOperational: false,
    })
  }

  return fc.oneof(...weighted)
}
