import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("flattens nested sections into dotted lower-case keys", () => {
    const source = new ObjectSource({ nsuser: { soundName: "Ping", soundNameFail: "Basso" } })

    expect(source.keys().sort()).toEqual(["nsuser.soundname", "nsuser.soundnamefail"])
    expect(source.lookup("nsuser.soundName")).toBe("Ping")
  })

  it("set() adds bindings without removing others", () => {
    const source = new ObjectSource({ a: "1" })

    source.set("slack.Channel", "#ops")

    expect(source.lookup("a")).toBe("1")
    expect(source.lookup("slack.channel")).toBe("#ops")
  })

  it("set() copies list values", () => {
    const list = ["banner"]
    const source = new ObjectSource()

    source.set("defaults", list)
    list.push("slack")

    expect(source.lookup("defaults")).toEqual(["banner"])
  })

  it("renders numbers and booleans as strings", () => {
    const source = new ObjectSource({ retries: 3, quiet: true })

    expect(source.lookup("retries")).toBe("3")
    expect(source.lookup("quiet")).toBe("true")
  })

  it("uses the given name", () => {
    expect(new ObjectSource({}, "defaults").name).toBe("defaults")
    expect(new ObjectSource().name).toBe("object")
  })
})
