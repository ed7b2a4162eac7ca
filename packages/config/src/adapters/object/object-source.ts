import { flattenDocument, normalizeKey, type ConfigDocument } from "../../core/keys"
import type { ConfigSource } from "../../ports/source"
import type { ConfigValue } from "../../ports/value"

/**
 * In-memory bindings. Holds built-in defaults or programmatic overrides.
 */
export class ObjectSource implements ConfigSource {
  private readonly data: Map<string, ConfigValue>

  constructor(
    initial: ConfigDocument = {},
    readonly name: string = "object",
  ) {
    this.data = new Map(Object.entries(flattenDocument(initial)))
  }

  /**
   * Binds `key` to `value`, replacing a previous binding of the same key.
   */
  set(key: string, value: ConfigValue): void {
    this.data.set(normalizeKey(key), typeof value === "string" ? value : [...value])
  }

  lookup(key: string): ConfigValue | undefined {
    return this.data.get(normalizeKey(key))
  }

  keys(): string[] {
    return [...this.data.keys()]
  }
}
