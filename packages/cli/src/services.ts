export const serviceNames = [
  "banner",
  "bearychat",
  "hipchat",
  "pushbullet",
  "pushover",
  "pushsafer",
  "simplepush",
  "slack",
  "speech",
  "telegram",
] as const

export type ServiceName = (typeof serviceNames)[number]

export type ServiceSpec = Readonly<{
  short: string
  usage: string
  /** Config sections holding the service's settings */
  sections: readonly string[]
}>

export const services: Readonly<Record<ServiceName, ServiceSpec>> = {
  banner: { short: "b", usage: "Trigger a banner notification", sections: ["nsuser"] },
  bearychat: { short: "c", usage: "Trigger a BearyChat notification", sections: ["bearychat"] },
  hipchat: { short: "i", usage: "Trigger a HipChat notification", sections: ["hipchat"] },
  pushbullet: { short: "p", usage: "Trigger a Pushbullet notification", sections: ["pushbullet"] },
  pushover: { short: "o", usage: "Trigger a Pushover notification", sections: ["pushover"] },
  pushsafer: { short: "u", usage: "Trigger a Pushsafer notification", sections: ["pushsafer"] },
  simplepush: { short: "l", usage: "Trigger a Simplepush notification", sections: ["simplepush"] },
  slack: { short: "k", usage: "Trigger a Slack notification", sections: ["slack"] },
  speech: {
    short: "s",
    usage: "Trigger a speech notification",
    sections: ["say", "espeak", "speechsynthesizer"],
  },
  telegram: { short: "g", usage: "Trigger a Telegram notification", sections: ["telegram"] },
}

export function isServiceName(value: string): value is ServiceName {
  return serviceNames.some((name) => name === value)
}
