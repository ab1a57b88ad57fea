import type { Logger } from "@cachesim/logger"
import { mock } from "vitest-mock-extended"
import type { Command } from "../../model/command"
import { CacheSession } from "../cache-session"

function run(session: CacheSession, commands: Command[]): string[] {
  return commands.flatMap((command) => session.execute(command).lines)
}

describe("CacheSession", () => {
  it("renders gets, puts and the cache state for LRU", () => {
    const session = new CacheSession({ policy: "lru", capacity: 2 })

    expect(
      run(session, [
        { kind: "put", key: 1, value: "a" },
        { kind: "put", key: 2, value: "b" },
        { kind: "get", key: 1 },
        { kind: "put", key: 3, value: "c" },
        { kind: "get", key: 2 },
        { kind: "display" },
      ]),
    ).toStrictEqual([
      "Inserted/Updated: 1 -> a",
      "Inserted/Updated: 2 -> b",
      "Cache Hit: 1 -> a",
      "Evicted: 2 -> b",
      "Inserted/Updated: 3 -> c",
      "Cache Miss for key: 2",
      "Cache State: 3:c 1:a",
    ])
  })

  it("evicts the newest write under MRU", () => {
    const session = new CacheSession({ policy: "mru", capacity: 2 })

    expect(
      run(session, [
        { kind: "put", key: 1, value: "a" },
        { kind: "put", key: 2, value: "b" },
        { kind: "put", key: 3, value: "c" },
        { kind: "display" },
      ]),
    ).toStrictEqual([
      "Inserted/Updated: 1 -> a",
      "Inserted/Updated: 2 -> b",
      "Evicted: 2 -> b",
      "Inserted/Updated: 3 -> c",
      "Cache State: 3:c 1:a",
    ])
  })

  it("shows frequencies under LFU", () => {
    const session = new CacheSession({ policy: "lfu", capacity: 2 })

    expect(
      run(session, [
        { kind: "put", key: 1, value: "a" },
        { kind: "put", key: 2, value: "b" },
        { kind: "get", key: 1 },
        { kind: "get", key: 1 },
        { kind: "put", key: 3, value: "c" },
        { kind: "display" },
      ]),
    ).toStrictEqual([
      "Inserted/Updated: 1 -> a",
      "Inserted/Updated: 2 -> b",
      "Cache Hit: 1 -> a",
      "Cache Hit: 1 -> a",
      "Evicted: 2 -> b",
      "Inserted/Updated: 3 -> c",
      "Cache State: 1:a(f=3) 3:c(f=1)",
    ])
  })

  it("reports stats from the cache events", () => {
    const session = new CacheSession({ policy: "lru", capacity: 1 })

    run(session, [
      { kind: "get", key: 1 },
      { kind: "put", key: 1, value: "a" },
      { kind: "get", key: 1 },
      { kind: "put", key: 2, value: "b" },
    ])

    expect(session.execute({ kind: "stats" })).toStrictEqual({
      lines: ["Stats: hits=1 misses=1 evictions=1 size=1/1"],
      done: false,
    })
  })

  it("drops puts at capacity 0", () => {
    const session = new CacheSession({ policy: "lfu", capacity: 0 })

    expect(run(session, [{ kind: "put", key: 1, value: "a" }, { kind: "display" }])).toStrictEqual([
      "Not stored (capacity 0): 1 -> a",
      "Cache State:",
    ])
  })

  it("ends on exit", () => {
    const session = new CacheSession({ policy: "lru", capacity: 1 })

    expect(session.execute({ kind: "exit" })).toStrictEqual({ lines: ["Exiting..."], done: true })
  })

  it("passes the logger to the cache and logs each command", () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)

    const session = new CacheSession({ policy: "mru", capacity: 2 }, { logger })

    session.execute({ kind: "display" })

    expect(logger.child).toHaveBeenCalledWith({ module: "simulator" })
    expect(logger.child).toHaveBeenCalledWith({ module: "cache", policy: "mru", capacity: 2 })
    expect(logger.debug).toHaveBeenCalledWith("command received", { command: "display" })
  })
})
