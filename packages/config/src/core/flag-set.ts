import { BaseError } from "@noti/errors"
import type { FlagDefinition, FlagState, FlagValue } from "../ports/flags"
import { parseBool } from "./cast"
import { InvalidFlagValueError, UnknownFlagError } from "./errors"

type MutableFlagState = {
  definition: FlagDefinition
  value: FlagValue
  changed: boolean
}

/**
 * Declared command-line flags and, per flag, whether the user set it.
 *
 * Parsing argv is left to the CLI layer, which reports each flag the user
 * supplied through `set`. Iteration follows declaration order.
 */
export class FlagSet {
  private readonly flags = new Map<string, MutableFlagState>()

  constructor(readonly name: string) {}

  define(definition: FlagDefinition): this {
    if (this.flags.has(definition.name)) {
      throw new BaseError(`Flag redefined: ${definition.name}`, {
        code: "flag_redefined",
        context: { flagSet: this.name, flag: definition.name },
        isOperational: false,
      })
    }

    const value = definition.default ?? (definition.kind === "boolean" ? false : "")

    this.flags.set(definition.name, { definition, value, changed: false })

    return this
  }

  /**
   * Records a user-supplied value and marks the flag as changed.
   *
   * Boolean flags accept a boolean or any string `parseBool` understands.
   */
  set(name: string, raw: FlagValue): void {
    const state = this.flags.get(name)
    if (!state) throw new UnknownFlagError(name)

    state.value = state.definition.kind === "boolean" ? this.toBool(name, raw) : String(raw)
    state.changed = true
  }

  lookup(name: string): FlagState | undefined {
    const state = this.flags.get(name)

    return state && { ...state }
  }

  has(name: string): boolean {
    return this.flags.has(name)
  }

  changed(name: string): boolean {
    return this.flags.get(name)?.changed ?? false
  }

  getBool(name: string): boolean {
    return this.flags.get(name)?.value === true
  }

  getString(name: string): string {
    const value = this.flags.get(name)?.value

    return typeof value === "string" ? value : ""
  }

  definitions(): FlagDefinition[] {
    return [...this.flags.values()].map((state) => state.definition)
  }

  /** Calls `fn` for every flag the user set. */
  visit(fn: (flag: FlagState) => void): void {
    for (const state of this.flags.values()) {
      if (state.changed) fn({ ...state })
    }
  }

  /** Calls `fn` for every declared flag. */
  visitAll(fn: (flag: FlagState) => void): void {
    for (const state of this.flags.values()) {
      fn({ ...state })
    }
  }

  private toBool(name: string, raw: FlagValue): boolean {
    if (typeof raw === "boolean") return raw

    const parsed = parseBool(raw)
    if (parsed === undefined) throw new InvalidFlagValueError(name, raw)

    return parsed
  }
}
