import type { FlagSet } from "@noti/config"
import { Command, Option } from "commander"

export const version = "0.1.0"

export type ProgramOutput = {
  writeOut(str: string): void
  writeErr(str: string): void
}

/**
 * Builds the command line from the declared flags.
 *
 * Boolean flags also accept `--no-<name>` so a user can explicitly turn a
 * service off. Parsing errors, `--help` and `--version` throw a
 * `CommanderError` instead of exiting.
 */
export function createProgram(flags: FlagSet, output?: ProgramOutput): Command {
  const program = new Command("noti")
    .description("Monitor a process and trigger a notification.")
    .usage("[flags] [utility [args...]]")
    .version(version, "-V, --version")
    .argument("[utility...]", "utility to run and wait on")
    .passThroughOptions()
    .exitOverride()

  if (output) program.configureOutput(output)

  for (const definition of flags.definitions()) {
    const long = `--${definition.name}`
    const names = definition.short ? `-${definition.short}, ${long}` : long

    if (definition.kind === "boolean") {
      program.addOption(new Option(names, definition.usage))
      program.addOption(new Option(`--no-${definition.name}`).hideHelp())
    } else {
      program.addOption(new Option(`${names} <value>`, definition.usage))
    }
  }

  return program
}

/**
 * Parses `argv` (without node and script path) and copies every option the
 * user supplied into `flags`.
 *
 * @returns the utility and its arguments, if any
 */
export function parseFlags(program: Command, flags: FlagSet, argv: readonly string[]): string[] {
  program.parse([...argv], { from: "user" })

  for (const definition of flags.definitions()) {
    if (program.getOptionValueSource(definition.name) !== "cli") continue

    const value: unknown = program.getOptionValue(definition.name)
    if (typeof value === "boolean" || typeof value === "string") {
      flags.set(definition.name, value)
    }
  }

  return [...program.args]
}
