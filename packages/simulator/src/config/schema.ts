import { type CacheEvictionPolicy, cacheEvictionPolicies } from "@cachesim/cache"
import { type LogLevelName, logLevelNames } from "@cachesim/logger"
import { z } from "zod"

export const ENV_PREFIX = "CACHESIM_"

export const envSchema = z.object({
  POLICY: z.string().trim().toLowerCase().pipe(z.enum(cacheEvictionPolicies)).optional(),
  CAPACITY: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().default("cache-simulator"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type SimulatorConfig = {
  cache: {
    /** Skips the policy prompt when set. */
    policy?: CacheEvictionPolicy
    /** Skips the capacity prompt when set. */
    capacity?: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
