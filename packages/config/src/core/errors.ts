import { BaseError } from "@noti/errors"

/**
 * A config file was found but could not be turned into bindings.
 */
export class ConfigParseError extends BaseError<"config_parse"> {
  constructor(readonly path: string, reason: string, cause?: unknown) {
    super(`Cannot parse config file: ${reason}`, {
      code: "config_parse",
      context: { path },
      cause,
    })
  }
}

/**
 * A config file named explicitly does not exist.
 */
export class ConfigNotFoundError extends BaseError<"config_not_found"> {
  constructor(readonly path: string, cause?: unknown) {
    super("Config file not found", { code: "config_not_found", context: { path }, cause })
  }
}

export class UnknownFlagError extends BaseError<"unknown_flag"> {
  constructor(readonly flag: string) {
    super(`Unknown flag: ${flag}`, { code: "unknown_flag", context: { flag } })
  }
}

export class InvalidFlagValueError extends BaseError<"invalid_flag_value"> {
  constructor(readonly flag: string, readonly value: string) {
    super(`Invalid value for flag ${flag}: ${value}`, {
      code: "invalid_flag_value",
      context: { flag, value },
    })
  }
}
