import fc from "fast-check"
import { ACCOUNT_ID_PATTERN, MAX_LEN, MIN_LEN, validate } from "../validate"
import { validateOrThrow } from "../validate-or-throw"

const ALPHABET = [..."abz09-_.A ."]

const candidate = fc
  .array(fc.constantFrom(...ALPHABET), { maxLength: MAX_LEN + 4 })
  .map((chars) => chars.join(""))

function throws(fn: () => void): boolean {
  try {
    fn()
    return false
  } catch {
    return true
  }
}

describe("account ID grammar", () => {
  it("validate agrees with the pattern and the length bounds", () => {
    fc.assert(
      fc.property(candidate, (id) => {
        const expected = id.length >= MIN_LEN && id.length <= MAX_LEN && ACCOUNT_ID_PATTERN.test(id)

        expect(validate(id).success).toBe(expected)
      }),
    )
  })

  it("validateOrThrow accepts exactly what validate accepts", () => {
    fc.assert(
      fc.property(candidate, (id) => {
        expect(throws(() => validateOrThrow(id))).toBe(!validate(id).success)
      }),
    )
  })

  it("validate never throws on arbitrary text", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 80 }), (id) => {
        validate(id)
      }),
    )
  })
})
