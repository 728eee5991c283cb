import { BaseError } from "@keel/errors"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(input: { details: string; sources: string[] }): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${input.details}`, {
      code: "config_invalid",
      context: { sources: input.sources },
    })
  }
}
