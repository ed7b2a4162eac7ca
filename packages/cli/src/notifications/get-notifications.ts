import type { ConfigBindings, ConfigView } from "@noti/config"
import { serviceNames, services, type ServiceName } from "../services"
import type { Notification, NotificationContent } from "./notification"

function settingsFor(view: ConfigView, service: ServiceName): ConfigBindings {
  const settings: ConfigBindings = {}

  for (const section of services[service].sections) {
    for (const [key, value] of Object.entries(view.section(section))) {
      settings[`${section}.${key}`] = value
    }
  }

  return settings
}

/**
 * One notification per active service, in the fixed service order.
 */
export function getNotifications(
  view: ConfigView,
  active: ReadonlySet<ServiceName>,
  content: NotificationContent,
): Notification[] {
  return serviceNames
    .filter((service) => active.has(service))
    .map((service) => ({ service, ...content, settings: settingsFor(view, service) }))
}
