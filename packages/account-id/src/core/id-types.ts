import type { IdType } from "../ports/id-type"
import { AccountId } from "./account-id"
import { AccountIdRef } from "./account-id-ref"
import { AccountIdTypeError } from "./errors/errors"

export const accountIdType: IdType<AccountId> = {
  kind: "AccountId",
  parse: (value) => {
    if (value instanceof AccountId) return value
    if (value instanceof AccountIdRef) return value.toOwned()
    if (typeof value !== "string") throw new AccountIdTypeError("AccountId", value)

    return AccountId.parse(value)
  },
  is: (value): value is AccountId => value instanceof AccountId,
}

export const accountIdRefType: IdType<AccountIdRef> = {
  kind: "AccountIdRef",
  parse: (value) => {
    if (value instanceof AccountIdRef) return value
    if (value instanceof AccountId) return value.asRef()
    if (typeof value !== "string") throw new AccountIdTypeError("AccountIdRef", value)

    return AccountIdRef.parse(value)
  },
  is: (value): value is AccountIdRef => value instanceof AccountIdRef,
}
