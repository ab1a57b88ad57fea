import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@cachesim/config"
import { ENV_PREFIX, type EnvConfig, envSchema, type SimulatorConfig } from "./schema"

export type LoadSimulatorConfigOptions = {
  env?: NodeJS.ProcessEnv
  /**
   * Values from command-line flags, keyed like the unprefixed env keys.
   * Applied last.
   */
  flags?: Record<string, string | undefined>
  cwd?: string
}

export function mapEnvToConfig(env: EnvConfig): SimulatorConfig {
  return {
    cache: {
      ...(env.POLICY !== undefined && { policy: env.POLICY }),
      ...(env.CAPACITY !== undefined && { capacity: env.CAPACITY }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

export async function loadSimulatorConfig(
  options: LoadSimulatorConfigOptions = {},
): Promise<SimulatorConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: ENV_PREFIX,
      cwd: options.cwd ?? process.cwd(),
    }),
    new EnvSource({ env: options.env ?? process.env, prefix: ENV_PREFIX }),
    new ObjectSource(options.flags ?? {}, "cli"),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
