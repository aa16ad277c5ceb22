import type { Logger } from "../ports/logger"
import type { TextSink } from "../ports/text-sink"
import type { LogLevelName } from "../ports/log-level"
import { createPinoLogger, type PinoLoggerDeps } from "../adapters/pino/pino-logger"
import { type CliConfig, type CliEnv, loadCliConfig } from "./config/cli-config"
import { Reporter } from "./reporter"

export type CommandContext = Readonly<{
  config: CliConfig
  logger: Logger
  output: Reporter
}>

/** Global flags, already parsed by commander. */
export type GlobalOptions = {
  json?: boolean
  logLevel?: LogLevelName
  pretty?: boolean
}

export type CommandContextDeps = {
  stdout: TextSink
  env: Record<string, string | undefined>
  /** Replaces the pino logger, e.g. with a null logger in tests. */
  logger?: Logger
  /** Where the pino logger writes; stderr when left out. */
  logDestination?: PinoLoggerDeps["destination"]
}

export function overridesFrom(options: GlobalOptions): Partial<Record<keyof CliEnv, string>> {
  return {
    ...(options.json ? { OUTPUT: "json" } : {}),
    ...(options.logLevel ? { LOG_LEVEL: options.logLevel } : {}),
    ...(options.pretty ? { LOG_PRETTY: "true" } : {}),
  }
}

export async function createCommandContext(
  options: GlobalOptions,
  deps: CommandContextDeps,
): Promise<CommandContext> {
  const { config, env } = await loadCliConfig(deps.env, overridesFrom(options))

  const logger =
    deps.logger ??
    createPinoLogger(
      { destination: deps.logDestination },
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: "account-id" },
    )

  logger.debug("Loaded configuration", {
    sources: env.sourcesUsed(),
    output: env.explain("OUTPUT"),
    logLevel: env.explain("LOG_LEVEL"),
  })

  const unknown = env.unknownKeys()
  if (unknown.length > 0) {
    logger.warn("Ignoring unknown configuration keys", { keys: unknown })
  }

  return { config, logger, output: new Reporter(deps.stdout, config.output) }
}
