export { runSimulator, type RunSimulatorOptions } from "./cli/run-simulator"
export { parseFlags } from "./cli/flags"
export {
  type LoadSimulatorConfigOptions,
  loadSimulatorConfig,
  mapEnvToConfig,
} from "./config/load-simulator-config"
export { ENV_PREFIX, type EnvConfig, envSchema, type SimulatorConfig } from "./config/schema"
export { CacheSession, type CacheSessionDeps, type CacheSessionOptions } from "./core/cache-session"
export {
  formatCacheState,
  formatEntry,
  formatHit,
  formatMiss,
  formatPut,
  formatStats,
} from "./core/format"
export {
  type MenuOption,
  menuOptions,
  parseCapacity,
  parseKey,
  parseMenuOption,
  parsePolicyChoice,
  parseValue,
} from "./core/parse-input"
export { SessionStats, type SessionStatsSnapshot } from "./core/session-stats"
export type * from "./model/command"
export { SimulatorError, type SimulatorErrorCode } from "./model/simulator.errors"
