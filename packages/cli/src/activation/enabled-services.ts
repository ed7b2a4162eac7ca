import type { ConfigView, FlagSet } from "@noti/config"
import { defaultServices, defaultsKey } from "../config/defaults"
import { isServiceName, type ServiceName } from "../services"

/**
 * Services to notify for this run.
 *
 * 1. Service flags the user set to true, if any. Other flags never count,
 *    and a service flag set to false alone does not trigger this branch.
 * 2. Otherwise the `defaults` key as resolved through the layers, keeping
 *    only known service names.
 * 3. Otherwise the built-in default services.
 */
export function enabledServices(view: ConfigView, flags: FlagSet): Set<ServiceName> {
  const selected = new Set<ServiceName>()

  flags.visit(({ definition, value }) => {
    if (isServiceName(definition.name) && value === true) selected.add(definition.name)
  })

  if (selected.size > 0) return selected

  const configured = view.getStringList(defaultsKey).filter(isServiceName)
  if (configured.length > 0) return new Set(configured)

  return new Set(defaultServices)
}

/**
 * Names under `defaults` that are not services; `enabledServices` skips them.
 */
export function unknownDefaultServices(view: ConfigView): string[] {
  return view.getStringList(defaultsKey).filter((name) => !isServiceName(name))
}
