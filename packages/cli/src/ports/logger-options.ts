import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior: which levels are emitted and
 * whether entries are rendered for humans or machines.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below it are ignored.
   */
  level: LogLevelName

  /**
   * Pretty-print entries for a terminal instead of one JSON object per line.
   */
  prettify?: boolean
}
