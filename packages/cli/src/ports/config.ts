/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({ schema: cliEnvSchema, sources: [new EnvSource({ prefix: "ACCOUNT_ID_" })] })
 *
 * config.get("OUTPUT")     // "text"
 * config.explain("OUTPUT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema. */
  unknownKeys(): string[]
}
