import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { FileSource } from "@noti/config"
import { configName, defaultSearchPaths, setupConfigFile } from "../config-file"

const testdata = fileURLToPath(new URL("../../../testdata", import.meta.url))

describe("defaultSearchPaths", () => {
  it("starts with the working directory", () => {
    expect(defaultSearchPaths({})).toEqual(["."])
  })

  it("adds XDG and home locations in order", () => {
    expect(defaultSearchPaths({ XDG_CONFIG_HOME: "/xdg", HOME: "/home/me" })).toEqual([
      ".",
      path.join("/xdg", "noti"),
      path.join("/home/me", ".config", "noti"),
      "/home/me",
    ])
  })

  it("skips locations whose variable is unset", () => {
    expect(defaultSearchPaths({ HOME: "/home/me" })).toEqual([
      ".",
      path.join("/home/me", ".config", "noti"),
      "/home/me",
    ])
  })
})

describe("setupConfigFile", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "noti-config-file-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("finds the file in a search path given before the defaults", async () => {
    const file = new FileSource({ configName, searchPaths: [testdata], cwd })

    const used = await setupConfigFile(file, {})

    expect(path.basename(path.dirname(used))).toBe("testdata")
    expect(file.configFileUsed()).toBe(used)
    expect(file.keys()).toHaveLength(1)
    expect(file.lookup("nsuser.soundName")).toBe("testdata")
  })

  it("searches HOME after the working directory", async () => {
    const work = path.join(cwd, "work")
    await fs.mkdir(work)
    await fs.writeFile(path.join(cwd, ".noti.yml"), "slack:\n  channel: '#home'\n")
    const file = new FileSource({ configName, cwd: work })

    const used = await setupConfigFile(file, { HOME: cwd })

    expect(used).toBe(path.join(cwd, ".noti.yml"))
    expect(file.lookup("slack.channel")).toBe("#home")
  })

  it("leaves the layer empty when there is no file", async () => {
    const file = new FileSource({ configName, cwd })

    await expect(setupConfigFile(file, {})).resolves.toBe("")
    expect(file.keys()).toEqual([])
  })
})
