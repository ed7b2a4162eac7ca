#!/usr/bin/env tsx
import { run } from "./cli/run"
import { StreamNotifier } from "./notifications/stream-notifier"

process.exitCode = await run(process.argv.slice(2), {
  notifier: new StreamNotifier(process.stdout),
})
