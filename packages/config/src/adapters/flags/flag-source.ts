import { normalizeKey } from "../../core/keys"
import type { FlagSet } from "../../core/flag-set"
import type { FlagState } from "../../ports/flags"
import type { ConfigSource } from "../../ports/source"
import type { ConfigValue } from "../../ports/value"

/**
 * Exposes the flags the user set as the top configuration layer.
 *
 * Untouched flags bind nothing; otherwise every flag's default would shadow
 * the file and the environment.
 */
export class FlagSource implements ConfigSource {
  readonly name = "flags"

  constructor(private readonly flags: FlagSet) {}

  lookup(key: string): ConfigValue | undefined {
    const wanted = normalizeKey(key)
    let found: ConfigValue | undefined

    this.flags.visit((flag) => {
      if (keyOf(flag) === wanted) found = String(flag.value)
    })

    return found
  }

  keys(): string[] {
    const keys: string[] = []

    this.flags.visit((flag) => keys.push(keyOf(flag)))

    return keys
  }
}

function keyOf(flag: FlagState): string {
  return normalizeKey(flag.definition.key ?? flag.definition.name)
}
