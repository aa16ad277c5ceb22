export type { Codec } from "./ports/codec"
export type { ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export type { IdType } from "./ports/id-type"
export type { ParseFailure, ParseResult, ParseSuccess, ValidationResult } from "./ports/parse-result"

export {
  AccountIdError,
  serializeError,
  type AccountIdErrorOptions,
  type SerializeOptions,
} from "./core/errors/account-id-error"
export { AccountIdDecodeError, AccountIdInvariantError, AccountIdTypeError } from "./core/errors/errors"
export { isAccountIdError, type AccountIdErrorLike } from "./core/errors/is-account-id-error"
export {
  ParseAccountError,
  ParseErrorKind,
  type CharPosition,
  type ParseErrorCode,
} from "./core/errors/parse-account-error"

export {
  ACCOUNT_ID_PATTERN,
  isValidAccountId,
  MAX_LEN,
  MIN_LEN,
  validate,
} from "./core/validation/validate"
export { validateOrThrow } from "./core/validation/validate-or-throw"
export type { AccountIdLiteral } from "./core/validation/account-id-literal"
export { isEthImplicit, isNearDeterministic, isNearImplicit } from "./core/validation/implicit"

export { AccountType, accountTypes, classifyAccountId, isImplicitAccountType } from "./core/account-type"
export { AccountId } from "./core/account-id"
export { AccountIdRef } from "./core/account-id-ref"
export { accountIdsEqual, compareAccountIds, type AccountIdLike, type Ordering } from "./core/compare"
export { intoAccountId } from "./core/into-account-id"
export { accountIdRefType, accountIdType } from "./core/id-types"

export { borshAccountIdCodec } from "./adapters/borsh/borsh-account-id-codec"
export { createAccountIdSerializer, createJsonCodec } from "./adapters/json/json-codec"
export { accountIdJsonSchema, accountIdSchema, accountIdStringSchema } from "./adapters/zod/account-id-schema"
export {
  accountIdArbitrary,
  accountLabelArbitrary,
  ethImplicitAccountIdArbitrary,
  namedAccountIdArbitrary,
  nearDeterministicAccountIdArbitrary,
  nearImplicitAccountIdArbitrary,
  type AccountIdArbitraryOptions,
} from "./adapters/arbitrary/account-id-arbitrary"
