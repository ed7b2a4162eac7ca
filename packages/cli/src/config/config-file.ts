import path from "node:path"
import type { FileSource } from "@noti/config"

export const configName = ".noti"

/**
 * Directories searched for `.noti.yaml` (or `.yml` / `.json`), in order.
 * Locations built from unset variables are skipped.
 */
export function defaultSearchPaths(env: Record<string, string | undefined>): string[] {
  const paths = ["."]

  if (env.XDG_CONFIG_HOME) paths.push(path.join(env.XDG_CONFIG_HOME, "noti"))
  if (env.HOME) paths.push(path.join(env.HOME, ".config", "noti"), env.HOME)

  return paths
}

/**
 * Appends the default locations after any already on `file` and loads it.
 *
 * @returns the path loaded, or "" when there is no config file
 */
export async function setupConfigFile(
  file: FileSource,
  env: Record<string, string | undefined>,
): Promise<string> {
  for (const dir of defaultSearchPaths(env)) {
    file.addSearchPath(dir)
  }

  return file.load()
}
