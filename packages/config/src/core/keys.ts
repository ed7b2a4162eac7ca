import type { ConfigBindings, ConfigValue } from "../ports/value"

export function normalizeKey(key: string): string {
  return key.trim().toLowerCase()
}

export type DocumentScalar = string | number | boolean

export type ConfigDocument = {
  [key: string]: DocumentScalar | DocumentScalar[] | ConfigDocument | null
}

function isDocument(value: unknown): value is ConfigDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Flattens nested sections into dotted, lower-case keys.
 *
 * `{ nsuser: { soundName: "Ping" } }` becomes `{ "nsuser.soundname": "Ping" }`.
 * Null entries bind nothing. Keys such as `constructor` or `__proto__`
 * become ordinary own entries.
 */
export function flattenDocument(doc: ConfigDocument, prefix = ""): ConfigBindings {
  return Object.fromEntries(flattenEntries(doc, prefix))
}

function flattenEntries(doc: ConfigDocument, prefix: string): [string, ConfigValue][] {
  const out: [string, ConfigValue][] = []

  for (const [rawKey, value] of Object.entries(doc)) {
    const key = normalizeKey(prefix ? `${prefix}.${rawKey}` : rawKey)

    if (value === null) continue

    if (Array.isArray(value)) {
      out.push([key, value.map(String)])
    } else if (isDocument(value)) {
      out.push(...flattenEntries(value, key))
    } else {
      out.push([key, String(value)])
    }
  }

  return out
}
