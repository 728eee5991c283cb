import { EnvSource, loadConfig, ObjectSource } from "@keel/config"
import { type EnvConfig, envSchema, type ReplacerAppConfig } from "./schema"

export function mapEnvToConfig(env: EnvConfig): ReplacerAppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    replacer: {
      numFrames: env.REPLACER_NUM_FRAMES,
      k: env.REPLACER_K,
    },
  }
}

/**
 * Read replacer settings from the environment. `overrides` uses the same
 * keys as the environment and wins over it.
 */
export async function loadReplacerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof EnvConfig, unknown>> = {},
): Promise<ReplacerAppConfig> {
  const result = await loadConfig({
    schema: envSchema,
    sources: [new EnvSource({ env }), new ObjectSource(overrides)],
  })

  return mapEnvToConfig(result.value)
}
