import { flattenDocument, normalizeKey } from "../keys"

describe("normalizeKey", () => {
  it("trims and lower-cases", () => {
    expect(normalizeKey(" NSUser.SoundName ")).toBe("nsuser.soundname")
  })
})

describe("flattenDocument", () => {
  it("joins nested sections with dots", () => {
    expect(
      flattenDocument({
        nsuser: { soundName: "Ping" },
        a: { b: { c: 1 } },
        defaults: ["banner", "slack"],
        verbose: false,
        empty: null,
      }),
    ).toEqual({
      "nsuser.soundname": "Ping",
      "a.b.c": "1",
      defaults: ["banner", "slack"],
      verbose: "false",
    })
  })

  it("applies a prefix", () => {
    expect(flattenDocument({ token: "x" }, "Slack")).toEqual({ "slack.token": "x" })
  })
})
