import {
  type ConfigView,
  EnvSource,
  FileSource,
  type FlagSet,
  FlagSource,
  LayeredConfig,
  ObjectSource,
} from "@noti/config"
import { configName, setupConfigFile } from "./config-file"
import { setNotiDefaults } from "./defaults"
import { bindNotiEnv } from "./env-bindings"

export type ConfigureAppOptions = {
  /** Flags as declared by `defineFlags`; may be set before or after configuring */
  flags: FlagSet

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Directories searched before the default locations */
  searchPaths?: string[]

  /** Base for relative search paths and `--config` */
  cwd?: string
}

/**
 * The resolved configuration and the layers behind it.
 *
 * `view` is what the rest of the program reads. The layers are exposed for
 * diagnostics and for reloading the file layer.
 */
export type AppConfig = {
  view: ConfigView
  defaults: ObjectSource
  file: FileSource
  env: EnvSource
  flags: FlagSet
}

/**
 * Stacks defaults < config file < environment < flags.
 *
 * @throws ConfigParseError when the config file found cannot be parsed
 * @throws ConfigNotFoundError when `--config` names a missing file
 */
export async function configureApp(options: ConfigureAppOptions): Promise<AppConfig> {
  const env = options.env ?? process.env
  const { flags } = options

  const defaults = new ObjectSource({}, "defaults")
  setNotiDefaults(defaults)

  const file = new FileSource({
    configName,
    searchPaths: options.searchPaths ?? [],
    ...(options.cwd !== undefined && { cwd: options.cwd }),
  })

  const explicit = flags.getString("config")
  if (flags.changed("config") && explicit) file.setConfigFile(explicit)

  await setupConfigFile(file, env)

  const envSource = new EnvSource({ env })
  bindNotiEnv(envSource)

  const view = new LayeredConfig([defaults, file, envSource, new FlagSource(flags)])

  return { view, defaults, file, env: envSource, flags }
}
