import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of emitting JSON lines.
   */
  prettify?: boolean
}
