import type { ConfigView } from "@noti/config"
import type { Logger } from "@noti/logger"
import type { ServiceName } from "../services"
import { DispatchError, type DispatchReport, type Notification, type Notifier } from "./notification"

/**
 * Sends every notification concurrently. Never rejects: a failing backend
 * becomes a `DispatchError` in the report while the others still run.
 */
export async function dispatchNotifications(
  notifications: readonly Notification[],
  view: ConfigView,
  notifier: Notifier,
  logger: Logger,
): Promise<DispatchReport> {
  const results = await Promise.allSettled(
    notifications.map(async (notification) => notifier.send(notification, view)),
  )

  const sent: ServiceName[] = []
  const failed: DispatchError[] = []

  results.forEach((result, i) => {
    const notification = notifications[i]
    if (!notification) return

    const { service } = notification

    if (result.status === "fulfilled") {
      sent.push(service)
      logger.debug("Notification sent", { service })
      return
    }

    const err = new DispatchError(service, result.reason)
    failed.push(err)
    logger.error("Notification failed", { service, err })
  })

  return { sent, failed }
}
