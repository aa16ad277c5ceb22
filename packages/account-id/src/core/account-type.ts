import { isEthImplicit, isNearDeterministic, isNearImplicit } from "./validation/implicit"

export const AccountType = {
  /** Any valid account that matches none of the derived shapes below. */
  NamedAccount: "NamedAccount",
  /** 64 lowercase hex characters. */
  NearImplicitAccount: "NearImplicitAccount",
  /** `0x` followed by 40 lowercase hex characters. */
  EthImplicitAccount: "EthImplicitAccount",
  /** `0s` followed by 40 lowercase hex characters. */
  NearDeterministicAccount: "NearDeterministicAccount",
} as const

export type AccountType = (typeof AccountType)[keyof typeof AccountType]

export const accountTypes: readonly AccountType[] = Object.values(AccountType)

export function isImplicitAccountType(type: AccountType): boolean {
  switch (type) {
    case AccountType.NearImplicitAccount:
    case AccountType.EthImplicitAccount:
      return true
    case AccountType.NamedAccount:
    case AccountType.NearDeterministicAccount:
      return false
  }
}

/**
 * Classifies the text of an already-valid account ID by shape alone.
 * Does not validate: callers pass text that has been through `validate`.
 */
export function classifyAccountId(id: string): AccountType {
  if (isEthImplicit(id)) return AccountType.EthImplicitAccount
  if (isNearDeterministic(id)) return AccountType.NearDeterministicAccount
  if (isNearImplicit(id)) return AccountType.NearImplicitAccount
  return AccountType.NamedAccount
}
