import { BaseError } from "@cachesim/errors"

export type ConfigErrorCode = "config_invalid" | "config_unreadable"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, keys: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { keys },
    })
  }

  static unreadable(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source "${source}" could not be read`, {
      code: "config_unreadable",
      context: { source },
      cause,
    })
  }
}
