import { AccountIdError } from "@tessera/account-id"

/** The merged configuration failed schema validation. */
export class ConfigError extends AccountIdError<"invalid_config"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { sources: [...sources] },
    })
  }
}
