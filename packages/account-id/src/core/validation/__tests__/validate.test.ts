import corpus from "../../../__tests__/fixtures/account-ids.json"
import { ParseAccountError } from "../../errors/parse-account-error"
import {
  ACCOUNT_ID_PATTERN,
  isValidAccountId,
  MAX_LEN,
  MIN_LEN,
  utf8ByteLength,
  validate,
} from "../validate"

function failureOf(id: string): ParseAccountError {
  const result = validate(id)
  if (result.success) throw new Error(`expected "${id}" to be invalid`)

  return result.error
}

describe("validate", () => {
  it.each(corpus.valid)("accepts %s", (id) => {
    expect(validate(id)).toEqual({ success: true })
  })

  it.each(corpus.invalid)("rejects $id as $kind", (entry) => {
    const error = failureOf(entry.id)

    expect(error).toBeInstanceOf(ParseAccountError)
    expect(error.kind).toBe(entry.kind)
    expect(error.char).toEqual(
      entry.index === undefined ? undefined : { index: entry.index, char: entry.char },
    )
  })

  describe("length bounds", () => {
    it("accepts exactly MIN_LEN and MAX_LEN bytes", () => {
      expect(validate("a".repeat(MIN_LEN)).success).toBe(true)
      expect(validate("a".repeat(MAX_LEN)).success).toBe(true)
    })

    it("rejects one byte over MAX_LEN", () => {
      expect(failureOf("a".repeat(MAX_LEN + 1)).kind).toBe("TooLong")
    })

    it("checks length before characters", () => {
      expect(failureOf("A").kind).toBe("TooShort")
      expect(failureOf("A".repeat(MAX_LEN + 1)).kind).toBe("TooLong")
    })

    it("counts UTF-8 bytes, not UTF-16 units", () => {
      // 33 two-byte characters: 33 units, 66 bytes
      expect(failureOf("é".repeat(33)).kind).toBe("TooLong")
      // 32 two-byte characters fit the bound and fail on the first character
      expect(failureOf("é".repeat(32)).kind).toBe("InvalidChar")
    })
  })

  describe("non-ASCII input", () => {
    it("reports an astral character as one code point", () => {
      const error = failureOf("ab🦀")

      expect(error.kind).toBe("InvalidChar")
      expect(error.char).toEqual({ index: 2, char: "🦀" })
    })

    it("treats a lone four-byte character as long enough", () => {
      expect(failureOf("🦀").char).toEqual({ index: 0, char: "🦀" })
    })
  })

  it("reports a trailing separator at the last index", () => {
    expect(failureOf("alice_").char).toEqual({ index: 5, char: "_" })
  })

  it("never throws", () => {
    expect(() => validate("")).not.toThrow()
    expect(() => validate("\u0000".repeat(200))).not.toThrow()
  })
})

describe("isValidAccountId", () => {
  it("narrows valid strings", () => {
    expect(isValidAccountId("alice.near")).toBe(true)
    expect(isValidAccountId("alice..near")).toBe(false)
  })

  it("rejects non-strings", () => {
    expect(isValidAccountId(42)).toBe(false)
    expect(isValidAccountId(null)).toBe(false)
    expect(isValidAccountId({ toString: () => "alice.near" })).toBe(false)
  })
})

describe("ACCOUNT_ID_PATTERN", () => {
  it.each(corpus.valid)("matches %s", (id) => {
    expect(ACCOUNT_ID_PATTERN.test(id)).toBe(true)
  })

  it.each(corpus.invalid.filter((entry) => entry.index !== undefined))(
    "does not match $id",
    ({ id }) => {
      expect(ACCOUNT_ID_PATTERN.test(id)).toBe(false)
    },
  )
})

describe("utf8ByteLength", () => {
  it("counts one to four bytes per code point", () => {
    expect(utf8ByteLength("near")).toBe(4)
    expect(utf8ByteLength("ƒ")).toBe(2)
    expect(utf8ByteLength("€")).toBe(3)
    expect(utf8ByteLength("🦀")).toBe(4)
  })
})
