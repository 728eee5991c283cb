import type { ValueGuard } from "../ports/value-guard"
import type { ValueType } from "../ports/value-type"
import { Trie } from "./trie"
import { TrieError } from "./trie-error"

export type TrieStoreOptions = {
  /** Prior versions kept for `undo()`. Default: 0 */
  maxVersions?: number
}

/**
 * Single current version of a trie with a single writer.
 *
 * Readers get the snapshot their value came from, so a later write never
 * changes what they hold.
 */
export class TrieStore {
  private current: Trie
  private readonly history: Trie[] = []
  private readonly maxVersions: number

  constructor(opts: TrieStoreOptions = {}, initial: Trie = new Trie()) {
    const maxVersions = opts.maxVersions ?? 0

    if (!Number.isInteger(maxVersions) || maxVersions < 0) {
      throw TrieError.invalidStoreConfig({ maxVersions })
    }

    this.maxVersions = maxVersions
    this.current = initial
  }

  get<T>(key: string, type: ValueType<T>): ValueGuard<T> | undefined {
    const snapshot = this.current
    const value = snapshot.get(key, type)

    return value === undefined ? undefined : { value, snapshot }
  }

  put<T>(key: string, value: T, type: ValueType<T>): void {
    this.commit(this.current.put(key, value, type))
  }

  remove(key: string): void {
    const next = this.current.remove(key)

    if (next !== this.current) this.commit(next)
  }

  snapshot(): Trie {
    return this.current
  }

  /** Retained prior versions, oldest first. */
  versions(): readonly Trie[] {
    return [...this.history]
  }

  undo(): boolean {
    const previous = this.history.pop()

    if (!previous) return false

    this.current = previous

    return true
  }

  private commit(next: Trie): void {
    if (this.maxVersions > 0) {
      this.history.push(this.current)
      if (this.history.length > this.maxVersions) this.history.shift()
    }

    this.current = next
  }
}
