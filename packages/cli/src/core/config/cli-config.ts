import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"
import type { IConfig } from "../../ports/config"
import type { ConfigSource } from "../../ports/source"
import { loadConfig } from "./load"

export const ENV_PREFIX = "ACCOUNT_ID_"

export const outputFormats = ["text", "json"] as const
export type OutputFormat = (typeof outputFormats)[number]

export const cliEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
  OUTPUT: z.enum(outputFormats).default("text"),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

export type CliConfig = {
  logging: {
    level: LogLevelName
    prettify: boolean
  }
  output: OutputFormat
}

export function mapEnvToConfig(env: CliEnv): CliConfig {
  return {
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    output: env.OUTPUT,
  }
}

export type LoadedCliConfig = {
  config: CliConfig
  env: IConfig<CliEnv>
}

/**
 * Reads `ACCOUNT_ID_*` variables from `env`, then applies `overrides`
 * (command-line flags, keyed like the variables without the prefix).
 */
export async function loadCliConfig(
  env: Record<string, string | undefined>,
  overrides: Partial<Record<keyof CliEnv, string>> = {},
): Promise<LoadedCliConfig> {
  const sources: ConfigSource[] = [
    new EnvSource({ env, prefix: ENV_PREFIX }),
    new ObjectSource(overrides, "flags"),
  ]

  const result = await loadConfig({ schema: cliEnvSchema, sources })

  return { config: mapEnvToConfig(result.value), env: result }
}
