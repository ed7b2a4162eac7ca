import type { ConfigBindings, ConfigView } from "@noti/config"
import { BaseError } from "@noti/errors"
import type { ServiceName } from "../services"

export type NotificationContent = {
  title: string
  message: string
}

export type Notification = NotificationContent & {
  service: ServiceName

  /** The service's own settings by full key, e.g. `slack.token`, `say.voice` */
  settings: ConfigBindings
}

/**
 * Sends one notification through one backend.
 *
 * Implementations read `view` and never write to it. A rejection is
 * reported for that service only.
 */
export interface Notifier {
  send(notification: Notification, view: ConfigView): Promise<void>
}

export class DispatchError extends BaseError<"dispatch_failed"> {
  constructor(readonly service: ServiceName, cause: unknown) {
    super(`Failed to send ${service} notification`, {
      code: "dispatch_failed",
      context: { service },
      cause,
      isRetryable: true,
    })
  }
}

export type DispatchReport = {
  sent: ServiceName[]
  failed: DispatchError[]
}
