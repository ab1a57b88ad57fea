import pino from "pino"
import { logLevelNames } from "../log-level"

describe("logLevelNames", () => {
  it("lists levels from least to most severe", () => {
    expect(logLevelNames).toEqual(["trace", "debug", "info", "warn", "error", "fatal"])
  })

  it("matches pino's level labels", () => {
    const values = logLevelNames.map((name) => pino.levels.values[name])

    expect(values).toEqual([10, 20, 30, 40, 50, 60])
  })
})
