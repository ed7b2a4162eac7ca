import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { ConfigNotFoundError, ConfigParseError, FlagSet } from "@noti/config"
import { configureApp } from "../configure-app"
import { defineFlags } from "../flags"

const testdata = fileURLToPath(new URL("../../../testdata", import.meta.url))

describe("configureApp", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "noti-configure-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  function makeFlags() {
    const flags = new FlagSet("noti")
    defineFlags(flags)
    return flags
  }

  it("reads built-in defaults when nothing else is configured", async () => {
    const { view, file } = await configureApp({ flags: makeFlags(), env: {}, cwd })

    expect(file.configFileUsed()).toBe("")
    expect(view.getString("nsuser.soundName")).toBe("Ping")
    expect(view.getStringList("defaults")).toEqual(["banner"])
    expect(view.sourcesUsed()).toEqual(["defaults"])
  })

  it("lets the config file override defaults", async () => {
    const { view, file } = await configureApp({
      flags: makeFlags(),
      env: {},
      searchPaths: [testdata],
      cwd,
    })

    expect(path.basename(path.dirname(file.configFileUsed()))).toBe("testdata")
    expect(view.getString("nsuser.soundName")).toBe("testdata")
    expect(view.explain("nsuser.soundName")).toBe(`file:${file.configFileUsed()}`)
    expect(view.getString("say.voice")).toBe("Alex")
  })

  it("lets the environment override the config file", async () => {
    const { view } = await configureApp({
      flags: makeFlags(),
      env: { NOTI_NSUSER_SOUNDNAME: "Glass" },
      searchPaths: [testdata],
      cwd,
    })

    expect(view.getString("nsuser.soundName")).toBe("Glass")
    expect(view.explain("nsuser.soundName")).toBe("env")
  })

  it("falls back to defaults after the file layer is replaced with nothing", async () => {
    const { view, file } = await configureApp({
      flags: makeFlags(),
      env: {},
      searchPaths: [testdata],
      cwd,
    })

    file.readString("")

    expect(view.getString("nsuser.soundName")).toBe("Ping")
  })

  it("sees flags set after configuring", async () => {
    const flags = makeFlags()
    const { view } = await configureApp({ flags, env: {}, cwd })

    flags.set("title", "deploy")

    expect(view.getString("title")).toBe("deploy")
    expect(view.explain("title")).toBe("flags")
  })

  it("loads exactly the file named by --config", async () => {
    await fs.writeFile(path.join(cwd, "custom.json"), '{"slack": {"channel": "#ops"}}')
    const flags = makeFlags()
    flags.set("config", "custom.json")

    const { view, file } = await configureApp({
      flags,
      env: {},
      searchPaths: [testdata],
      cwd,
    })

    expect(file.configFileUsed()).toBe(path.join(cwd, "custom.json"))
    expect(view.getString("slack.channel")).toBe("#ops")
    expect(view.getString("nsuser.soundName")).toBe("Ping")
  })

  it("rejects a --config file that does not exist", async () => {
    const flags = makeFlags()
    flags.set("config", "missing.yaml")

    await expect(configureApp({ flags, env: {}, cwd })).rejects.toBeInstanceOf(
      ConfigNotFoundError,
    )
  })

  it("rejects a config file that does not parse", async () => {
    await fs.writeFile(path.join(cwd, ".noti.yaml"), "- banner\n- slack\n")

    await expect(configureApp({ flags: makeFlags(), env: {}, cwd })).rejects.toBeInstanceOf(
      ConfigParseError,
    )
  })
})
