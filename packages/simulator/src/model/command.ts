export type CacheKey = number
export type CacheValue = string

export type GetCommand = { kind: "get"; key: CacheKey }
export type PutCommand = { kind: "put"; key: CacheKey; value: CacheValue }
export type DisplayCommand = { kind: "display" }
export type StatsCommand = { kind: "stats" }
export type ExitCommand = { kind: "exit" }

/**
 * One user action against the simulated cache.
 */
export type Command = GetCommand | PutCommand | DisplayCommand | StatsCommand | ExitCommand

export type CommandKind = Command["kind"]

/**
 * Rendered outcome of a command. `done` is set once the session should end.
 */
export type CommandResult = {
  lines: string[]
  done: boolean
}
