import type { ConfigView } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import type { ConfigBindings, ConfigValue } from "../ports/value"
import { toBool, toStringList, toStringValue } from "./cast"
import { normalizeKey } from "./keys"

type Resolved = {
  value: ConfigValue
  source: string
}

/**
 * Stacks sources lowest precedence first and resolves each key by asking
 * them from the top down. Nothing is merged ahead of time, so a source that
 * does not bind a key never hides one below it, and live sources are read
 * at lookup time.
 */
export class LayeredConfig implements ConfigView {
  private readonly layers: readonly ConfigSource[]

  constructor(layers: readonly ConfigSource[]) {
    this.layers = Object.freeze([...layers])
  }

  get(key: string): ConfigValue | undefined {
    return this.resolve(key)?.value
  }

  getString(key: string): string {
    return toStringValue(this.get(key))
  }

  getStringList(key: string): string[] {
    return toStringList(this.get(key))
  }

  getBool(key: string): boolean {
    return toBool(this.get(key))
  }

  isSet(key: string): boolean {
    return this.resolve(key) !== undefined
  }

  explain(key: string): string | undefined {
    return this.resolve(key)?.source
  }

  sourcesUsed(): string[] {
    const used = new Set(this.keys().map((key) => this.explain(key)))

    return this.layers.map((layer) => layer.name).filter((name) => used.has(name))
  }

  keys(): string[] {
    const all = new Set<string>()

    for (const layer of this.layers) {
      for (const key of layer.keys()) all.add(normalizeKey(key))
    }

    return [...all].sort()
  }

  settings(): ConfigBindings {
    const out: [string, ConfigValue][] = []

    for (const key of this.keys()) {
      const value = this.get(key)
      if (value !== undefined) out.push([key, value])
    }

    return Object.fromEntries(out)
  }

  section(prefix: string): ConfigBindings {
    const head = `${normalizeKey(prefix)}.`

    return Object.fromEntries(
      Object.entries(this.settings())
        .filter(([key]) => key.startsWith(head))
        .map(([key, value]) => [key.slice(head.length), value]),
    )
  }

  private resolve(key: string): Resolved | undefined {
    const normalized = normalizeKey(key)

    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i]
      const value = layer?.lookup(normalized)

      if (layer && value !== undefined) return { value, source: layer.name }
    }

    return undefined
  }
}
