import { AccountId } from "../../../core/account-id"
import { AccountIdRef } from "../../../core/account-id-ref"
import { ParseAccountError } from "../../../core/errors/parse-account-error"
import { createAccountIdSerializer, createJsonCodec } from "../json-codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

describe("createJsonCodec", () => {
  it("writes account IDs as their raw text", () => {
    const codec = createJsonCodec<{ owner: AccountId }>()

    const text = decoder.decode(codec.encode({ owner: AccountId.parse("alice.near") }))

    expect(JSON.parse(text).json).toEqual({ owner: "alice.near" })
  })

  it("restores AccountId instances", () => {
    const codec = createJsonCodec<{ owner: AccountId }>()

    const { owner } = codec.decode(codec.encode({ owner: AccountId.parse("alice.near") }))

    expect(owner).toBeInstanceOf(AccountId)
    expect(owner.asStr()).toBe("alice.near")
  })

  it("restores views", () => {
    const codec = createJsonCodec<AccountIdRef[]>()

    const [first] = codec.decode(codec.encode([AccountIdRef.parse("near")]))

    expect(first).toBeInstanceOf(AccountIdRef)
    expect(first?.asStr()).toBe("near")
  })

  it("validates account IDs again on decode", () => {
    const codec = createJsonCodec<{ owner: AccountId }>()
    const text = decoder.decode(codec.encode({ owner: AccountId.parse("alice.near") }))
    const tampered = encoder.encode(text.replace("alice.near", "Alice.near"))

    expect(() => codec.decode(tampered)).toThrow(ParseAccountError)
  })

  it("accepts a caller-supplied serializer", () => {
    const serializer = createAccountIdSerializer()
    const codec = createJsonCodec<AccountId>(serializer)

    const bytes = codec.encode(AccountId.parse("bob.near"))

    expect(serializer.parse<AccountId>(decoder.decode(bytes)).asStr()).toBe("bob.near")
  })
})
