import { spawn } from "node:child_process"
import os from "node:os"
import { BaseError } from "@noti/errors"

export class UtilityError extends BaseError<"utility_failed"> {
  constructor(readonly command: string, cause: unknown) {
    super(`Cannot run ${command}`, { code: "utility_failed", context: { command }, cause })
  }
}

/**
 * Runs `command` with the terminal attached and resolves with its exit code.
 * A signal-terminated child resolves with 128 + the signal number.
 */
export function runUtility(command: string, args: readonly string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: "inherit" })

    child.once("error", (err) => reject(new UtilityError(command, err)))
    child.once("close", (code, signal) => {
      if (code !== null) return resolve(code)

      resolve(signal ? 128 + os.constants.signals[signal] : 1)
    })
  })
}
