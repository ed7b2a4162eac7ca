/**
 * A resolved configuration value. Multi-valued settings (such as the list of
 * default services) are ordered string sequences; everything else is a string.
 */
export type ConfigValue = string | readonly string[]

/**
 * Flat key → value bindings. Keys are dotted paths in lower case.
 */
export type ConfigBindings = Record<string, ConfigValue>
