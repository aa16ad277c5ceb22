export type { IConfig } from "./ports/config"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { logLevelNames, type LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { ConfigSource } from "./ports/source"
export type { TextSink } from "./ports/text-sink"

export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps, pinoOptionsFor } from "./adapters/pino/pino-logger"

export { Config } from "./core/config/config"
export { ConfigError } from "./core/config/config-error"
export { loadConfig, type LoadConfigOptions } from "./core/config/load"
export {
  type CliConfig,
  type CliEnv,
  cliEnvSchema,
  ENV_PREFIX,
  loadCliConfig,
  mapEnvToConfig,
  type OutputFormat,
  outputFormats,
} from "./core/config/cli-config"
export { ExitCode } from "./core/exit-code"
export { Reporter } from "./core/reporter"

export { createProgram, type ProgramDeps, run } from "./program"
