import type { ValueType } from "../ports/value-type"
import { isSameValueType } from "./value-types"

export type TrieChildren = ReadonlyMap<string, TrieNode>

const noChildren: TrieChildren = new Map()

/**
 * Immutable trie node. Children are keyed by a single code point.
 *
 * Nodes are never changed once built; a write produces copies of the nodes
 * on its path and shares everything else with the previous version.
 */
export class TrieNode {
  readonly children: TrieChildren

  constructor(children: TrieChildren = noChildren) {
    this.children = children

    if (new.target === TrieNode) Object.freeze(this)
  }

  get isValueNode(): boolean {
    return false
  }

  /** Copy of this node, of the same kind, with `children` in place of its own. */
  withChildren(children: TrieChildren): TrieNode {
    return new TrieNode(children)
  }

  /** The stored value when it was written through `type`. */
  readValue<T>(_type: ValueType<T>): T | undefined {
    return undefined
  }
}

export class TrieNodeWithValue<V> extends TrieNode {
  readonly value: V
  readonly valueType: ValueType<V>

  constructor(value: V, valueType: ValueType<V>, children?: TrieChildren) {
    super(children)

    this.value = value
    this.valueType = valueType

    Object.freeze(this)
  }

  override get isValueNode(): boolean {
    return true
  }

  override withChildren(children: TrieChildren): TrieNode {
    return new TrieNodeWithValue(this.value, this.valueType, children)
  }

  override readValue<T>(type: ValueType<T>): T | undefined {
    if (!isSameValueType(type, this.valueType)) return undefined

    const value: unknown = this.value

    return type.is(value) ? value : undefined
  }
}
