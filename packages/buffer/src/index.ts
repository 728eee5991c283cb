export { loadReplacerConfig, mapEnvToConfig } from "./config/load-replacer-config"
export { type EnvConfig, envSchema, type ReplacerAppConfig } from "./config/schema"
export { type CreateReplacerDeps, createReplacer } from "./create-replacer"
export { LruKReplacer, type LruKReplacerDeps } from "./core/lru-k-replacer"
export { ReplacerError, type ReplacerErrorCode } from "./core/replacer-error"
export { type AccessType, accessTypes } from "./ports/access-type"
export type { FrameId, Replacer, Timestamp } from "./ports/replacer"
export type { LruKReplacerOptions } from "./ports/replacer-options"
