import { normalizeKey } from "../../core/keys"
import type { ConfigSource } from "../../ports/source"
import type { ConfigValue } from "../../ports/value"

export type EnvSourceOptions = {
  /**
   * Environment to read. The record is read on every lookup, so later
   * changes to it are visible without binding again.
   *
   * @default process.env
   */
  env?: Record<string, string | undefined>
}

/**
 * Environment variables bound explicitly, one variable per config key.
 *
 * Unset and empty variables bind nothing, letting the lookup fall through to
 * lower layers.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>
  private readonly bindings = new Map<string, string>()

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  /**
   * Binds `key` to `variable`. Binding a key again replaces its variable.
   */
  bind(key: string, variable: string): void {
    this.bindings.set(normalizeKey(key), variable)
  }

  variableFor(key: string): string | undefined {
    return this.bindings.get(normalizeKey(key))
  }

  lookup(key: string): ConfigValue | undefined {
    const variable = this.bindings.get(normalizeKey(key))
    if (variable === undefined) return undefined

    const value = this.env[variable]

    return value === undefined || value === "" ? undefined : value
  }

  keys(): string[] {
    return [...this.bindings.keys()].filter((key) => this.lookup(key) !== undefined)
  }
}
