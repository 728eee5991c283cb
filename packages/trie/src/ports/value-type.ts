import type { ZodType } from "zod"

/**
 * Runtime token for the type of a stored value.
 *
 * A value is only read back through the same token it was written with, so
 * the token doubles as the type tag of the node holding the value.
 */
export type ValueType<T> = {
  readonly name: string

  /** Validates values on write. Must not transform its input. */
  readonly schema: ZodType<T>

  is(value: unknown): value is T
}
