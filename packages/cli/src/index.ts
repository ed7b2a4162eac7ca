export { enabledServices, unknownDefaultServices } from "./activation/enabled-services"
export { createCliLogger } from "./cli/logger"
export { createProgram, parseFlags, type ProgramOutput, version } from "./cli/program"
export { formatDuration, run, type RunDeps } from "./cli/run"
export { runUtility, UtilityError } from "./cli/run-utility"
export { configName, defaultSearchPaths, setupConfigFile } from "./config/config-file"
export { type AppConfig, configureApp, type ConfigureAppOptions } from "./config/configure-app"
export { baseDefaults, defaultServices, defaultsKey, setNotiDefaults } from "./config/defaults"
export { bindNotiEnv, keyEnvBindings } from "./config/env-bindings"
export { defineFlags } from "./config/flags"
export { dispatchNotifications } from "./notifications/dispatch"
export { getNotifications } from "./notifications/get-notifications"
export {
  DispatchError,
  type DispatchReport,
  type Notification,
  type NotificationContent,
  type Notifier,
} from "./notifications/notification"
export { type LineWriter, StreamNotifier } from "./notifications/stream-notifier"
export { isServiceName, type ServiceName, serviceNames, services, type ServiceSpec } from "./services"
