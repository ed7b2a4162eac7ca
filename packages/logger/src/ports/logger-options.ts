import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "warn" suppresses trace, debug and info.
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON.
   *
   * @remarks
   * Meant for interactive terminals. Leave off when output is piped into
   * something that reads JSON.
   */
  prettify?: boolean
}
