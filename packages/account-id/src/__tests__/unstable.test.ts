import * as api from "../index"
import { newUnvalidatedAccountId } from "../unstable"

describe("unstable", () => {
  it("builds an AccountId without validating", () => {
    const id = newUnvalidatedAccountId("Not Valid")

    expect(id).toBeInstanceOf(api.AccountId)
    expect(id.asStr()).toBe("Not Valid")
  })

  it("is not reachable from the package root", () => {
    const exported = Object.keys(api)

    expect(exported).not.toContain("newUnvalidatedAccountId")
    expect(exported).not.toContain("newUnchecked")
    expect(exported).not.toContain("ownUnchecked")
    expect(exported).not.toContain("ownFromRef")
  })
})
