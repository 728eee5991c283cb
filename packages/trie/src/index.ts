export { Trie } from "./core/trie"
export { TrieError, type TrieErrorCode } from "./core/trie-error"
export { type TrieChildren, TrieNode, TrieNodeWithValue } from "./core/trie-node"
export { TrieStore, type TrieStoreOptions } from "./core/trie-store"
export { defineValueType, isSameValueType, ValueTypes } from "./core/value-types"
export type { ValueGuard } from "./ports/value-guard"
export type { ValueType } from "./ports/value-type"
