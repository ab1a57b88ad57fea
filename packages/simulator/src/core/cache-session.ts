import { type CacheEvictionPolicy, createCache, type PolicyCache } from "@cachesim/cache"
import { createNullLogger, type Logger } from "@cachesim/logger"
import type { CacheKey, CacheValue, Command, CommandResult } from "../model/command"
import { formatCacheState, formatHit, formatMiss, formatPut, formatStats } from "./format"
import { SessionStats } from "./session-stats"

export type CacheSessionOptions = {
  policy: CacheEvictionPolicy
  capacity: number
}

export type CacheSessionDeps = {
  logger?: Logger
}

/**
 * Runs commands against one cache and renders each outcome as text lines.
 */
export class CacheSession {
  readonly cache: PolicyCache<CacheKey, CacheValue>

  private readonly stats = new SessionStats()
  private readonly logger: Logger

  constructor(opts: CacheSessionOptions, deps: CacheSessionDeps = {}) {
    const logger = deps.logger ?? createNullLogger()

    this.logger = logger.child({ module: "simulator" })
    this.cache = createCache<CacheKey, CacheValue>(
      opts.policy,
      { capacity: opts.capacity },
      { logger, observer: this.stats },
    )
  }

  execute(command: Command): CommandResult {
    this.logger.debug("command received", { command: command.kind })

    switch (command.kind) {
      case "get": {
        const result = this.cache.get(command.key)
        const line =
          result.kind === "hit" ? formatHit(command.key, result.value) : formatMiss(command.key)

        return { lines: [line], done: false }
      }
      case "put": {
        const result = this.cache.put(command.key, command.value)

        return { lines: formatPut(command.key, command.value, result), done: false }
      }
      case "display":
        return { lines: [formatCacheState(this.cache.displayCache())], done: false }
      case "stats":
        return {
          lines: [formatStats(this.stats.snapshot(), this.cache.size(), this.cache.capacity)],
          done: false,
        }
      case "exit":
        return { lines: ["Exiting..."], done: true }
    }
  }
}
