import { type LogLevelName, logLevelNames } from "@keel/logger"
import { z } from "zod"
import type { LruKReplacerOptions } from "../ports/replacer-options"

const flag = z.union([z.boolean(), z.stringbool()])

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("keel"),

  REPLACER_NUM_FRAMES: z.coerce.number().int().positive().default(64),
  REPLACER_K: z.coerce.number().int().positive().default(2),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type ReplacerAppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  replacer: LruKReplacerOptions
}
