import { FlagSet } from "../../../core/flag-set"
import { FlagSource } from "../flag-source"

describe("FlagSource behavior", () => {
  const makeFlags = () =>
    new FlagSet("test")
      .define({ name: "slack", kind: "boolean", usage: "" })
      .define({ name: "title", kind: "string", usage: "", default: "noti" })

  it("binds nothing for flags left at their default", () => {
    const source = new FlagSource(makeFlags())

    expect(source.lookup("title")).toBeUndefined()
    expect(source.lookup("slack")).toBeUndefined()
    expect(source.keys()).toEqual([])
  })

  it("reflects flags set after the source was created", () => {
    const flags = makeFlags()
    const source = new FlagSource(flags)

    flags.set("slack", "false")

    expect(source.lookup("slack")).toBe("false")
  })
})
