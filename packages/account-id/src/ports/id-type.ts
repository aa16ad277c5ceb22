/**
 * Contract for validating and parsing identifiers at runtime boundaries.
 *
 * IdType defines how to recognize and parse a specific identifier type when
 * data crosses boundaries (JSON payloads, CLI arguments, decoded messages).
 *
 * @example
 * ```typescript
 * const owner = accountIdType.parse(payload.owner) // AccountId
 *
 * if (accountIdRefType.is(value)) {
 *   value.isTopLevel()
 * }
 * ```
 */
export interface IdType<T> {
  /** Identifier name for error messages and debugging */
  readonly kind: string

  /**
   * Parse and validate unknown input.
   * @throws AccountIdTypeError for non-string input, ParseAccountError for invalid text
   */
  parse(value: unknown): T

  /** Type guard for non-throwing checks */
  is(value: unknown): value is T
}
