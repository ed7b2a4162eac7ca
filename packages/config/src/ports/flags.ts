export type FlagKind = "boolean" | "string"

export type FlagValue = boolean | string

export type FlagDefinition = Readonly<{
  /** Long name, used as `--name` */
  name: string

  kind: FlagKind

  usage: string

  /** Single-letter alias, used as `-x` */
  short?: string

  /** Value before the user touches the flag. `false` or `""` when omitted. */
  default?: FlagValue

  /**
   * Configuration key the flag overrides once set. Defaults to `name`.
   */
  key?: string
}>

/**
 * A flag's resolved value together with whether the user supplied it.
 *
 * `changed` is what decides precedence: a flag left at its default never
 * shadows the file or the environment.
 */
export type FlagState = Readonly<{
  definition: FlagDefinition
  value: FlagValue
  changed: boolean
}>
