import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@cachesim/config"
import { loadSimulatorConfig, mapEnvToConfig } from "../load-simulator-config"

describe("loadSimulatorConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "cachesim-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("applies defaults and leaves policy and capacity unset", async () => {
    const config = await loadSimulatorConfig({ env: {}, cwd })

    expect(config).toStrictEqual({
      cache: {},
      logging: { level: "warn", prettify: false, serviceName: "cache-simulator" },
    })
  })

  it("reads prefixed env keys and ignores the rest", async () => {
    const config = await loadSimulatorConfig({
      env: {
        CACHESIM_POLICY: "LFU",
        CACHESIM_CAPACITY: "4",
        CACHESIM_LOG_PRETTY: "true",
        LOG_LEVEL: "trace",
      },
      cwd,
    })

    expect(config).toStrictEqual({
      cache: { policy: "lfu", capacity: 4 },
      logging: { level: "warn", prettify: true, serviceName: "cache-simulator" },
    })
  })

  it("layers .env, then env, then flags", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "CACHESIM_POLICY=mru\nCACHESIM_CAPACITY=2\nCACHESIM_SERVICE_NAME=from-dotenv",
    )

    const config = await loadSimulatorConfig({
      env: { CACHESIM_CAPACITY: "8", CACHESIM_LOG_LEVEL: "debug" },
      flags: { POLICY: "lru", CAPACITY: undefined },
      cwd,
    })

    expect(config).toStrictEqual({
      cache: { policy: "lru", capacity: 8 },
      logging: { level: "debug", prettify: false, serviceName: "from-dotenv" },
    })
  })

  it.each([
    ["CACHESIM_CAPACITY", "0"],
    ["CACHESIM_CAPACITY", "two"],
    ["CACHESIM_POLICY", "fifo"],
    ["CACHESIM_LOG_LEVEL", "loud"],
    ["CACHESIM_LOG_PRETTY", "maybe"],
  ])("rejects %s=%s", async (key, value) => {
    await expect(loadSimulatorConfig({ env: { [key]: value }, cwd })).rejects.toBeInstanceOf(
      ConfigError,
    )
  })
})

describe("mapEnvToConfig", () => {
  it("omits unset cache presets", () => {
    expect(
      mapEnvToConfig({
        LOG_LEVEL: "info",
        LOG_PRETTY: false,
        SERVICE_NAME: "svc",
      }),
    ).toStrictEqual({
      cache: {},
      logging: { level: "info", prettify: false, serviceName: "svc" },
    })
  })
})
