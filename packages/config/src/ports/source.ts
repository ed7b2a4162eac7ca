import type { ConfigValue } from "./value"

/**
 * One ranked layer of configuration bindings.
 *
 * A ConfigSource only answers lookups. It does not merge, coerce or validate;
 * precedence between sources is decided by the view that stacks them.
 *
 * Keys passed to `lookup` are already normalized (trimmed, lower case).
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "defaults", "file:/home/u/.noti.yaml", "env", "flags"
   */
  readonly name: string

  /**
   * Value bound to `key` by this layer, or undefined when the layer does not
   * bind it. Sources backed by live state (the environment) read it here.
   */
  lookup(key: string): ConfigValue | undefined

  /**
   * Keys this layer currently binds.
   */
  keys(): string[]
}
