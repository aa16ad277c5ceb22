import { AccountId } from "../account-id"
import { AccountIdRef } from "../account-id-ref"
import { AccountIdTypeError } from "../errors/errors"
import { ParseAccountError } from "../errors/parse-account-error"
import { accountIdRefType, accountIdType } from "../id-types"

describe("accountIdType", () => {
  it("has a kind", () => {
    expect(accountIdType.kind).toBe("AccountId")
  })

  it("parses strings", () => {
    expect(accountIdType.parse("alice.near").asStr()).toBe("alice.near")
  })

  it("passes owned values through and promotes views", () => {
    const id = AccountId.parse("near")

    expect(accountIdType.parse(id)).toBe(id)
    expect(accountIdType.parse(AccountIdRef.parse("near"))).toBeInstanceOf(AccountId)
  })

  it("rejects invalid strings with ParseAccountError", () => {
    expect(() => accountIdType.parse("NEAR")).toThrow(ParseAccountError)
  })

  it("rejects non-strings with AccountIdTypeError", () => {
    expect(() => accountIdType.parse(42)).toThrow(AccountIdTypeError)
    expect(() => accountIdType.parse(42)).toThrow("AccountId must be a string, got number")
  })

  it("guards instances", () => {
    expect(accountIdType.is(AccountId.parse("near"))).toBe(true)
    expect(accountIdType.is("near")).toBe(false)
  })
})

describe("accountIdRefType", () => {
  it("has a kind", () => {
    expect(accountIdRefType.kind).toBe("AccountIdRef")
  })

  it("borrows from owned values", () => {
    const id = AccountId.parse("near")

    expect(accountIdRefType.parse(id)).toBe(id.asRef())
  })

  it("parses strings and rejects other values", () => {
    expect(accountIdRefType.parse("near").asStr()).toBe("near")
    expect(() => accountIdRefType.parse(null)).toThrow("AccountIdRef must be a string, got null")
  })

  it("guards instances", () => {
    expect(accountIdRefType.is(AccountIdRef.parse("near"))).toBe(true)
    expect(accountIdRefType.is(AccountId.parse("near"))).toBe(false)
  })
})
