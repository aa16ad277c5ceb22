import { deserialize, serialize } from "borsh"
import { AccountId } from "../../core/account-id"
import { AccountIdDecodeError } from "../../core/errors/errors"
import type { Codec } from "../../ports/codec"

const SCHEMA = "string"
const LENGTH_PREFIX_BYTES = 4

/**
 * Binary form of an account ID: borsh `string`, i.e. a u32 little-endian
 * byte length followed by the UTF-8 bytes.
 *
 * Decoding never trusts the bytes: the text is validated again and an
 * invalid one throws the same `ParseAccountError` as `AccountId.parse`.
 *
 * @example
 * ```ts
 * borshAccountIdCodec.encode(AccountId.parse("bob.near"))
 * // Uint8Array [8, 0, 0, 0, 98, 111, 98, 46, 110, 101, 97, 114]
 * ```
 */
export const borshAccountIdCodec: Codec<AccountId> = {
  encode(value) {
    return serialize(SCHEMA, value.asStr())
  },

  decode(bytes) {
    return AccountId.parse(readString(bytes))
  },
}

function readString(bytes: Uint8Array): string {
  let decoded: unknown

  try {
    decoded = deserialize(SCHEMA, bytes)
  } catch (err) {
    throw new AccountIdDecodeError("Failed to decode a borsh string", {
      cause: err,
      context: { byteLength: bytes.length },
    })
  }

  if (typeof decoded !== "string") {
    throw new AccountIdDecodeError("Decoded borsh value is not a string", {
      context: { byteLength: bytes.length },
    })
  }

  // Invalid UTF-8 decodes to U+FFFD, so framing is checked against the prefix.
  const declared = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true)
  const consumed = LENGTH_PREFIX_BYTES + declared
  if (consumed !== bytes.length) {
    throw new AccountIdDecodeError(
      `Unexpected ${bytes.length - consumed} trailing byte(s) after the account ID`,
      { context: { byteLength: bytes.length, consumed } },
    )
  }

  if (!sameBytes(new TextEncoder().encode(decoded), bytes.subarray(LENGTH_PREFIX_BYTES))) {
    throw new AccountIdDecodeError("Account ID bytes are not valid UTF-8", {
      context: { byteLength: bytes.length },
    })
  }

  return decoded
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i])
}
