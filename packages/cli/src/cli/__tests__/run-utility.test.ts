import { runUtility, UtilityError } from "../run-utility"

describe("runUtility", () => {
  it("resolves with the exit code of the utility", async () => {
    await expect(runUtility(process.execPath, ["-e", "process.exit(3)"])).resolves.toBe(3)
  })

  it("resolves with 0 on success", async () => {
    await expect(runUtility(process.execPath, ["-e", ""])).resolves.toBe(0)
  })

  it("rejects when the utility cannot be started", async () => {
    await expect(runUtility("noti-test-no-such-command", [])).rejects.toBeInstanceOf(UtilityError)
  })
})
