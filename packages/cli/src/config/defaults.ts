import type { ConfigValue, ObjectSource } from "@noti/config"
import type { ServiceName } from "../services"

/** Config key selecting the services used when no service flag is set. */
export const defaultsKey = "defaults"

export const defaultServices: readonly ServiceName[] = ["banner"]

/**
 * Built-in value of every recognized config key.
 */
export const baseDefaults: Readonly<Record<string, ConfigValue>> = {
  "nsuser.soundName": "Ping",
  "nsuser.soundNameFail": "Basso",
  "say.voice": "Alex",
  "espeak.voiceName": "english",
  "speechsynthesizer.voice": "Microsoft David Desktop",
  "bearychat.incomingHookURI": "",
  "hipchat.accessToken": "",
  "hipchat.room": "",
  "pushbullet.accessToken": "",
  "pushbullet.deviceIden": "",
  "pushover.apiToken": "",
  "pushover.userKey": "",
  "pushsafer.key": "",
  "simplepush.key": "",
  "simplepush.event": "",
  "slack.token": "",
  "slack.channel": "",
  "slack.username": "noti",
  "telegram.token": "",
  "telegram.chatId": "",
  [defaultsKey]: defaultServices,
}

export function setNotiDefaults(source: ObjectSource): void {
  for (const [key, value] of Object.entries(baseDefaults)) {
    source.set(key, value)
  }
}
