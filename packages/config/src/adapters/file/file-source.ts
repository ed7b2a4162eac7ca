import fs from "node:fs/promises"
import path from "node:path"
import { parse as parseYaml } from "yaml"
import { z } from "zod"
import { ConfigNotFoundError, ConfigParseError } from "../../core/errors"
import { flattenDocument, normalizeKey } from "../../core/keys"
import type { ConfigSource } from "../../ports/source"
import type { ConfigBindings, ConfigValue } from "../../ports/value"
import { configDocumentSchema } from "./document-schema"

export type FileFormat = "yaml" | "json"

const formatByExtension: Record<string, FileFormat> = {
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
}

/**
 * Options for creating a file configuration source.
 */
export type FileSourceOptions = {
  /**
   * File name without extension looked for in each search path.
   *
   * @example ".noti"
   */
  configName: string

  /**
   * Extensions tried in order within each search path.
   *
   * @default [".yaml", ".yml", ".json"]
   */
  extensions?: string[]

  /**
   * Directories searched in order. More can be appended with `addSearchPath`.
   */
  searchPaths?: string[]

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * The config file layer.
 *
 * `load()` binds the first candidate found across the search paths. Finding
 * nothing leaves the layer empty; finding a file that does not parse throws
 * `ConfigParseError`.
 */
export class FileSource implements ConfigSource {
  private readonly searchPaths: string[]
  private readonly extensions: string[]
  private explicitFile = ""
  private usedFile = ""
  private data: ConfigBindings = {}

  constructor(private readonly opts: FileSourceOptions) {
    this.searchPaths = [...(opts.searchPaths ?? [])]
    this.extensions = opts.extensions ?? Object.keys(formatByExtension)
  }

  get name(): string {
    return this.usedFile ? `file:${this.usedFile}` : "file"
  }

  addSearchPath(dir: string): void {
    this.searchPaths.push(dir)
  }

  /**
   * Load exactly `file` instead of searching. A missing file is then an error.
   */
  setConfigFile(file: string): void {
    this.explicitFile = file
  }

  /** Path of the file loaded, or "" when none was. */
  configFileUsed(): string {
    return this.usedFile
  }

  /**
   * Locates and reads the config file, replacing any previous bindings.
   *
   * @returns the path loaded, or "" when no candidate exists
   */
  async load(): Promise<string> {
    const file = this.explicitFile ? this.resolve(this.explicitFile) : await this.locate()

    if (!file) {
      this.usedFile = ""
      this.data = {}
      return ""
    }

    let content: string

    try {
      content = await fs.readFile(file, "utf-8")
    } catch (err) {
      if (this.explicitFile && (err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ConfigNotFoundError(file, err)
      }
      throw err
    }

    this.data = this.parse(content, formatOf(file), file)
    this.usedFile = file

    return file
  }

  /**
   * Replaces the layer's bindings with `content`. Empty content empties it.
   */
  readString(content: string, format: FileFormat = "yaml"): void {
    this.data = this.parse(content, format, this.usedFile)
  }

  lookup(key: string): ConfigValue | undefined {
    const normalized = normalizeKey(key)

    return Object.hasOwn(this.data, normalized) ? this.data[normalized] : undefined
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  private resolve(file: string): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), file)
  }

  private async locate(): Promise<string> {
    for (const dir of this.searchPaths) {
      for (const ext of this.extensions) {
        const candidate = this.resolve(path.join(dir, `${this.opts.configName}${ext}`))

        if (await isFile(candidate)) return candidate
      }
    }

    return ""
  }

  private parse(content: string, format: FileFormat, file: string): ConfigBindings {
    if (content.trim() === "") return {}

    let raw: unknown

    try {
      raw = format === "json" ? JSON.parse(content) : parseYaml(content)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ConfigParseError(file, reason, err)
    }

    if (raw === null || raw === undefined) return {}

    const result = configDocumentSchema.safeParse(raw)

    if (!result.success) {
      throw new ConfigParseError(file, z.prettifyError(result.error), result.error)
    }

    return flattenDocument(result.data)
  }
}

function formatOf(file: string): FileFormat {
  return formatByExtension[path.extname(file).toLowerCase()] ?? "yaml"
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile()
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code
    if (code === "ENOENT" || code === "ENOTDIR") return false
    throw err
  }
}
