import type { ConfigValue } from "../ports/value"

const truthy = new Set(["1", "t", "true"])
const falsy = new Set(["0", "f", "false"])

export function parseBool(raw: string): boolean | undefined {
  const value = raw.trim().toLowerCase()

  if (truthy.has(value)) return true
  if (falsy.has(value)) return false

  return undefined
}

export function toStringValue(value: ConfigValue | undefined): string {
  if (value === undefined) return ""
  if (typeof value === "string") return value

  return value.join(",")
}

export function toStringList(value: ConfigValue | undefined): string[] {
  if (value === undefined) return []
  if (typeof value !== "string") return [...value]

  return value.split(/[\s,]+/).filter((item) => item.length > 0)
}

export function toBool(value: ConfigValue | undefined): boolean {
  if (typeof value !== "string") return false

  return parseBool(value) ?? false
}
