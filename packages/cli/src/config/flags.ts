import type { FlagSet } from "@noti/config"
import { serviceNames, services } from "../services"

/**
 * Declares every noti flag: one boolean per service, then the rest.
 */
export function defineFlags(flags: FlagSet): void {
  for (const name of serviceNames) {
    const { short, usage } = services[name]
    flags.define({ name, kind: "boolean", short, usage })
  }

  flags
    .define({
      name: "title",
      kind: "string",
      short: "t",
      usage: "Set notification title. Default is utility name.",
    })
    .define({
      name: "message",
      kind: "string",
      short: "m",
      usage: 'Set notification message. Default is "Done!".',
    })
    .define({ name: "time", kind: "boolean", short: "e", usage: "Show execution time in message." })
    .define({ name: "verbose", kind: "boolean", usage: "Enable verbose mode." })
    .define({ name: "config", kind: "string", usage: "Read configuration from this file." })
}
