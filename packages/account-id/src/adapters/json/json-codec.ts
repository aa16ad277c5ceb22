import SuperJSON from "superjson"
import { AccountId } from "../../core/account-id"
import { AccountIdRef } from "../../core/account-id-ref"
import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * A superjson instance that knows both account ID types.
 *
 * Account IDs travel as their raw text; on the way back they are parsed
 * again, so tampered payloads fail with `ParseAccountError`.
 */
export function createAccountIdSerializer(): SuperJSON {
  const serializer = new SuperJSON()

  serializer.registerCustom<AccountId, string>(
    {
      isApplicable: (v): v is AccountId => v instanceof AccountId,
      serialize: (v) => v.asStr(),
      deserialize: (v) => AccountId.parse(v),
    },
    "AccountId",
  )

  serializer.registerCustom<AccountIdRef, string>(
    {
      isApplicable: (v): v is AccountIdRef => v instanceof AccountIdRef,
      serialize: (v) => v.asStr(),
      deserialize: (v) => AccountIdRef.parse(v),
    },
    "AccountIdRef",
  )

  return serializer
}

/**
 * JSON codec for values that contain account IDs anywhere in their shape.
 *
 * @example
 * ```ts
 * const codec = createJsonCodec<{ owner: AccountId }>()
 * codec.decode(codec.encode({ owner })).owner.equals(owner) // true
 * ```
 */
export function createJsonCodec<T>(
  serializer: SuperJSON = createAccountIdSerializer(),
): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(serializer.stringify(value)),
    decode: (bytes: Uint8Array) => serializer.parse<T>(decoder.decode(bytes)),
  }
}
