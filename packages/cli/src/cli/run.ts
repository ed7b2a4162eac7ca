import { FlagSet } from "@noti/config"
import { BaseError, describeError, toAppError } from "@noti/errors"
import type { Logger, PinoLoggerDeps } from "@noti/logger"
import { CommanderError } from "commander"
import { enabledServices, unknownDefaultServices } from "../activation/enabled-services"
import { type AppConfig, configureApp } from "../config/configure-app"
import { defineFlags } from "../config/flags"
import { dispatchNotifications } from "../notifications/dispatch"
import { getNotifications } from "../notifications/get-notifications"
import type { Notifier } from "../notifications/notification"
import type { LineWriter } from "../notifications/stream-notifier"
import { createCliLogger } from "./logger"
import { createProgram, parseFlags } from "./program"
import { runUtility, UtilityError } from "./run-utility"

/** Exit code when the utility cannot be started, as a shell reports it */
const commandNotFound = 127

export type RunDeps = {
  notifier: Notifier

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Replaces the stderr logger built from `--verbose` */
  logger?: Logger

  /** Help and version output */
  stdout?: LineWriter

  /** Usage errors and fatal configuration errors */
  stderr?: NonNullable<PinoLoggerDeps["destination"]>

  searchPaths?: string[]
  cwd?: string
  runUtility?: (command: string, args: readonly string[]) => Promise<number>

  /** Milliseconds clock used for `--time` */
  now?: () => number
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000
  if (seconds < 60) return `${seconds.toFixed(1)}s`

  const minutes = Math.floor(seconds / 60)
  const rest = Math.round(seconds - minutes * 60)

  return `${minutes}m${rest}s`
}

/**
 * Runs noti once: parses `argv`, resolves the configuration, runs the
 * utility (if one was given) and notifies every enabled service.
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[], deps: RunDeps): Promise<number> {
  const stdout = deps.stdout ?? process.stdout
  const stderr = deps.stderr ?? process.stderr
  const now = deps.now ?? Date.now

  const flags = new FlagSet("noti")
  defineFlags(flags)

  const program = createProgram(flags, {
    writeOut: (str) => void stdout.write(str),
    writeErr: (str) => void stderr.write(str),
  })

  let utility: string[]
  try {
    utility = parseFlags(program, flags, argv)
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    if (err instanceof BaseError) {
      stderr.write(`noti: ${describeError(err)}\n`)
      return 2
    }
    throw err
  }

  const logger = deps.logger ?? createCliLogger(flags.getBool("verbose"), deps.stderr)
  const [command, ...args] = utility

  let app: AppConfig
  try {
    app = await configureApp({
      flags,
      ...(deps.env && { env: deps.env }),
      ...(deps.searchPaths && { searchPaths: deps.searchPaths }),
      ...(deps.cwd !== undefined && { cwd: deps.cwd }),
    })
  } catch (err) {
    const appError = toAppError(err)
    logger.error("Cannot load configuration", { err: appError })
    stderr.write(`noti: ${describeError(appError)}\n`)
    return 1
  }

  const { view, file } = app
  const log = logger.child({ configFile: file.configFileUsed(), command: command ?? "" })
  log.debug("Configuration resolved", { sources: view.sourcesUsed() })

  let exitCode = 0
  const started = now()

  if (command) {
    try {
      exitCode = await (deps.runUtility ?? runUtility)(command, args)
    } catch (err) {
      if (!(err instanceof UtilityError)) throw err

      log.error("Cannot run utility", { err })
      exitCode = commandNotFound
    }
    log.debug("Utility finished", { exitCode })
  }

  const elapsed = now() - started

  const title = view.getString("title") || command || "noti"
  let message = view.getString("message") || (exitCode === 0 ? "Done!" : "Failed!")
  if (view.getBool("time")) message += ` (${formatDuration(elapsed)})`

  const unknown = unknownDefaultServices(view)
  if (unknown.length > 0) log.debug("Ignoring unknown default services", { unknown })

  const active = enabledServices(view, flags)
  const notifications = getNotifications(view, active, { title, message })
  const report = await dispatchNotifications(notifications, view, deps.notifier, log)

  if (report.failed.length > 0) {
    log.warn("Some notifications failed", { failed: report.failed.map((e) => e.service) })
  }

  return exitCode
}
