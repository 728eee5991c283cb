import { type ZodType, z } from "zod"
import type { ValueType } from "../ports/value-type"

export function defineValueType<T>(name: string, schema: ZodType<T>): ValueType<T> {
  return Object.freeze({
    name,
    schema,
    is: (value: unknown): value is T => schema.safeParse(value).success,
  })
}

export function isSameValueType(a: ValueType<unknown>, b: ValueType<unknown>): boolean {
  return a === b
}

const UINT64_MAX = 2n ** 64n - 1n

export const ValueTypes = {
  uint32: defineValueType("uint32", z.number().int().min(0).max(0xffff_ffff)),
  uint64: defineValueType("uint64", z.bigint().min(0n).max(UINT64_MAX)),
  string: defineValueType("string", z.string()),
  number: defineValueType("number", z.number()),
  boolean: defineValueType("boolean", z.boolean()),
} as const
