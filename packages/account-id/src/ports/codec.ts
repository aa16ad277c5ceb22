/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Decoding is a trust boundary: a codec carrying account IDs must re-run
 * validation on the bytes it reads and fail the same way `AccountId.parse`
 * would. Framing problems (truncation, trailing bytes) are reported
 * separately as `AccountIdDecodeError`.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /** @throws ParseAccountError | AccountIdDecodeError */
  decode(bytes: Uint8Array): T
}
