import type { ConfigBindings, ConfigValue } from "./value"

/**
 * Read-only view over stacked configuration layers.
 *
 * Every lookup is total: a key no layer binds reads as `""`, `[]` or `false`.
 *
 * @example
 * ```typescript
 * const view = new LayeredConfig([defaults, file, env, flags])
 *
 * view.getString("nsuser.soundName") // "Glass"
 * view.explain("nsuser.soundName")   // "env"
 * view.getStringList("defaults")     // ["banner"]
 * ```
 */
export interface ConfigView {
  /** Raw resolved value, or undefined when no layer binds the key. */
  get(key: string): ConfigValue | undefined

  /** Lists are joined with ",". */
  getString(key: string): string

  /** Strings are split on whitespace and commas. */
  getStringList(key: string): string[]

  /** Accepts 1, t, true, 0, f, false in any case. Anything else reads as false. */
  getBool(key: string): boolean

  isSet(key: string): boolean

  /**
   * Name of the layer that supplies the value of `key`, or undefined when
   * no layer binds it.
   */
  explain(key: string): string | undefined

  /**
   * Names of the layers that supply at least one resolved value, lowest
   * precedence first.
   */
  sourcesUsed(): string[]

  /** Every key bound by any layer, sorted. */
  keys(): string[]

  /** Resolved value of every key. */
  settings(): ConfigBindings

  /**
   * Resolved values under `prefix.`, keyed by the remainder of the path.
   * `section("slack")` turns `slack.token` into `token`.
   */
  section(prefix: string): ConfigBindings
}
