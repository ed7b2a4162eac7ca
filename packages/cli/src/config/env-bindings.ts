import type { EnvSource } from "@noti/config"
import { defaultsKey } from "./defaults"

/**
 * Environment variable read for each config key.
 */
export const keyEnvBindings: Readonly<Record<string, string>> = {
  "nsuser.soundName": "NOTI_NSUSER_SOUNDNAME",
  "nsuser.soundNameFail": "NOTI_NSUSER_SOUNDNAMEFAIL",
  "say.voice": "NOTI_SAY_VOICE",
  "espeak.voiceName": "NOTI_ESPEAK_VOICENAME",
  "speechsynthesizer.voice": "NOTI_SPEECHSYNTHESIZER_VOICE",
  "bearychat.incomingHookURI": "NOTI_BEARYCHAT_INCOMINGHOOKURI",
  "hipchat.accessToken": "NOTI_HIPCHAT_ACCESSTOKEN",
  "hipchat.room": "NOTI_HIPCHAT_ROOM",
  "pushbullet.accessToken": "NOTI_PUSHBULLET_ACCESSTOKEN",
  "pushbullet.deviceIden": "NOTI_PUSHBULLET_DEVICEIDEN",
  "pushover.apiToken": "NOTI_PUSHOVER_APITOKEN",
  "pushover.userKey": "NOTI_PUSHOVER_USERKEY",
  "pushsafer.key": "NOTI_PUSHSAFER_KEY",
  "simplepush.key": "NOTI_SIMPLEPUSH_KEY",
  "simplepush.event": "NOTI_SIMPLEPUSH_EVENT",
  "slack.token": "NOTI_SLACK_TOKEN",
  "slack.channel": "NOTI_SLACK_CHANNEL",
  "slack.username": "NOTI_SLACK_USERNAME",
  "telegram.token": "NOTI_TELEGRAM_TOKEN",
  "telegram.chatId": "NOTI_TELEGRAM_CHATID",
  [defaultsKey]: "NOTI_DEFAULT",
}

export function bindNotiEnv(source: EnvSource): void {
  for (const [key, variable] of Object.entries(keyEnvBindings)) {
    source.bind(key, variable)
  }
}
