import { ObjectSource } from "@noti/config"
import { baseDefaults, defaultServices, defaultsKey, setNotiDefaults } from "../defaults"

describe("baseDefaults", () => {
  it("binds every recognized key", () => {
    expect(Object.keys(baseDefaults)).toHaveLength(21)
  })

  it("selects the banner service by default", () => {
    expect(baseDefaults[defaultsKey]).toEqual(["banner"])
    expect(defaultServices).toEqual(["banner"])
  })
})

describe("setNotiDefaults", () => {
  it("installs every default into the layer", () => {
    const source = new ObjectSource({}, "defaults")

    setNotiDefaults(source)

    expect(source.keys()).toHaveLength(21)
    expect(source.lookup("nsuser.soundName")).toBe("Ping")
    expect(source.lookup("slack.username")).toBe("noti")
    expect(source.lookup("defaults")).toEqual(["banner"])
  })

  it("keeps bindings it does not know about", () => {
    const source = new ObjectSource({ extra: "kept" }, "defaults")

    setNotiDefaults(source)

    expect(source.lookup("extra")).toBe("kept")
    expect(source.keys()).toHaveLength(22)
  })
})
