/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z._default(z.coerce.number(), 4664) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("SERVER_PORT")     // 4664
 * config.explain("SERVER_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key,
   * or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   */
  unknownKeys(): string[]
}
