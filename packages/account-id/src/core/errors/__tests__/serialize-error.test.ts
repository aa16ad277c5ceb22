import { AccountIdError, serializeError } from "../account-id-error"
import { ParseAccountError, ParseErrorKind } from "../parse-account-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-04T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("keeps code and context of toolkit errors", () => {
    const err = new ParseAccountError(ParseErrorKind.InvalidChar, { index: 1, char: "ƒ" })

    expect(serializeError(err)).toEqual({
      name: "ParseAccountError",
      code: "invalid_char",
      message: "the Account ID contains an invalid character 'ƒ' at index 1",
      context: { kind: "InvalidChar", index: 1, char: "ƒ" },
      isOperational: true,
      timestamp: "2025-03-04T08:00:00.000Z",
    })
  })

  it("serializes plain errors with code unknown", () => {
    const result = serializeError(new TypeError("bad input"))

    expect(result).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "bad input",
      context: {},
      isOperational: false,
      timestamp: "2025-03-04T08:00:00.000Z",
    })
  })

  it("wraps thrown strings", () => {
    const result = serializeError("boom")

    expect(result.name).toBe("NonErrorThrown")
    expect(result.message).toBe("boom")
    expect(result.context).toEqual({ value: "boom" })
  })

  it("wraps other thrown values with a generic message", () => {
    const result = serializeError(42)

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: 42 })
  })

  it("serializes the cause chain", () => {
    const root = new Error("disk full")
    const err = new AccountIdError("Write failed", { code: "write_failed", cause: root })

    const result = serializeError(err)

    expect(result.cause?.message).toBe("disk full")
    expect(result.cause?.code).toBe("unknown")
  })

  it("omits stack by default", () => {
    expect(serializeError(new Error("x")).stack).toBeUndefined()
  })

  it("includes stack when asked", () => {
    const err = new AccountIdError("with stack", { code: "test" })

    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })
})
