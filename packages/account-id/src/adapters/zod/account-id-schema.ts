import { z } from "zod"
import { AccountId } from "../../core/account-id"
import { ACCOUNT_ID_PATTERN, MAX_LEN, MIN_LEN } from "../../core/validation/validate"

/**
 * Plain string schema carrying the account ID bounds and grammar, for schema
 * reflection. Lengths here count UTF-16 units; they agree with byte lengths
 * for every string the pattern accepts.
 */
export const accountIdStringSchema = z
  .string()
  .min(MIN_LEN)
  .max(MAX_LEN)
  .regex(ACCOUNT_ID_PATTERN)
  .meta({
    title: "AccountId",
    description:
      "Account identifier: 2 to 64 characters, lowercase alphanumeric labels separated by '.', with single '-' or '_' inside labels.",
  })

/**
 * Validates with the real validator and outputs an `AccountId`. A failure
 * carries the `ParseAccountError` message and its kind and position in
 * `params`.
 */
export const accountIdSchema = z.string().transform((value, ctx) => {
  const result = AccountId.safeParse(value)

  if (!result.success) {
    const { error } = result
    ctx.issues.push({
      code: "custom",
      message: error.message,
      input: value,
      params: {
        kind: error.kind,
        ...(error.char ? { index: error.char.index, char: error.char.char } : {}),
      },
    })

    return z.NEVER
  }

  return result.value
})

/** JSON Schema for the account ID text form. */
export function accountIdJsonSchema() {
  return z.toJSONSchema(accountIdStringSchema)
}
