import { type Logger, PinoLogger, type PinoLoggerDeps } from "@keel/logger"
import type { ReplacerAppConfig } from "./config/schema"
import { LruKReplacer } from "./core/lru-k-replacer"

export type CreateReplacerDeps = PinoLoggerDeps & {
  /** Used instead of building a pino logger from the config. */
  logger?: Logger
}

export function createReplacer(
  config: ReplacerAppConfig,
  deps: CreateReplacerDeps = {},
): LruKReplacer {
  const { logger, ...pinoDeps } = deps

  const base =
    logger ??
    new PinoLogger(
      pinoDeps,
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName, env: config.app.env },
    )

  return new LruKReplacer(config.replacer, {
    logger: base.child({ module: "buffer", component: "lru-k-replacer" }),
  })
}
