import { Writable } from "node:stream"
import { BaseError } from "@cachesim/errors"
import { describe, expect, it } from "vitest"

import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "cache-simulator" },
    )

    logger.info("cache created", { policy: "lfu", capacity: 3 })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "cache created",
      service: "cache-simulator",
      policy: "lfu",
      capacity: 3,
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("child() inherits the sink and level of its parent", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "svc" })
    const child = base.child({ policy: "mru" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      service: "svc",
      policy: "mru",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = createPinoLogger({ destination }, { level: "info" })

    const cause = new Error("root")
    logger.fatal("simulator crashed", {
      err: new BaseError("wrapped", { code: "cli_failure", cause }),
    })

    const payload = parseLine(lines[0])
    const err = payload.err

    expect(err).toMatchObject({ type: "BaseError", code: "cli_failure" })
    expect(JSON.stringify(err)).toContain("root")
  })
})
