import type { Notification, Notifier } from "./notification"

export type LineWriter = {
  write(chunk: string): unknown
}

/**
 * Writes `<service>: <title>: <message>` lines, one per notification.
 */
export class StreamNotifier implements Notifier {
  constructor(private readonly out: LineWriter) {}

  async send(notification: Notification): Promise<void> {
    const { service, title, message } = notification

    this.out.write(`${service}: ${title}: ${message}\n`)
  }
}
