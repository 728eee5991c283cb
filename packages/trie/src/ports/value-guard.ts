import type { Trie } from "../core/trie"

/** A value read from a store, together with the version it was read from. */
export type ValueGuard<T> = {
  readonly value: T
  readonly snapshot: Trie
}
