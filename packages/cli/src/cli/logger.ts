import { type Logger, PinoLogger, type PinoLoggerDeps } from "@noti/logger"

/**
 * Logger for terminal runs: warnings and errors only, everything from debug
 * up with `--verbose`. Without an explicit destination, records go to
 * stderr, pretty-printed when stderr is a terminal.
 */
export function createCliLogger(
  verbose: boolean,
  destination?: PinoLoggerDeps["destination"],
): Logger {
  const level = verbose ? "debug" : "warn"

  if (destination) return new PinoLogger({ destination }, { level }, { module: "cli" })

  return new PinoLogger(
    { destination: process.stderr },
    { level, prettify: process.stderr.isTTY },
    { module: "cli" },
  )
}
