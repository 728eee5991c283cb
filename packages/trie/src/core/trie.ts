import { z } from "zod"
import type { ValueType } from "../ports/value-type"
import { TrieError } from "./trie-error"
import { TrieNode, TrieNodeWithValue } from "./trie-node"

/**
 * Persistent copy-on-write trie.
 *
 * `put` and `remove` return a new `Trie` and leave the receiver untouched;
 * old and new versions share every subtree off the written path.
 */
export class Trie {
  private readonly rootNode: TrieNode | undefined

  constructor(root?: TrieNode) {
    this.rootNode = root
  }

  get root(): TrieNode | undefined {
    return this.rootNode
  }

  isEmpty(): boolean {
    return this.rootNode === undefined
  }

  /**
   * Value stored under `key`, or `undefined` when the key is absent or was
   * written with another value type.
   */
  get<T>(key: string, type: ValueType<T>): T | undefined {
    return this.find(key)?.readValue(type)
  }

  put<T>(key: string, value: T, type: ValueType<T>): Trie {
    const parsed = type.schema.safeParse(value)

    if (!parsed.success) {
      throw TrieError.invalidValue({
        key,
        valueType: type.name,
        details: z.prettifyError(parsed.error),
      })
    }

    return new Trie(putAt(this.rootNode, Array.from(key), 0, value, type))
  }

  remove(key: string): Trie {
    const target = this.find(key)

    if (!this.rootNode || !target?.isValueNode) return this

    return new Trie(removeAt(this.rootNode, Array.from(key), 0))
  }

  private find(key: string): TrieNode | undefined {
    let node = this.rootNode

    for (const ch of key) {
      if (!node) return undefined
      node = node.children.get(ch)
    }

    return node
  }
}

function putAt<T>(
  node: TrieNode | undefined,
  chars: readonly string[],
  depth: number,
  value: T,
  type: ValueType<T>,
): TrieNode {
  const children = node?.children
  const ch = chars[depth]

  if (ch === undefined) return new TrieNodeWithValue(value, type, children)

  const next = new Map<string, TrieNode>(children)
  next.set(ch, putAt(children?.get(ch), chars, depth + 1, value, type))

  return node ? node.withChildren(next) : new TrieNode(next)
}

/** Only called on a path that ends in a value node. */
function removeAt(node: TrieNode, chars: readonly string[], depth: number): TrieNode | undefined {
  const ch = chars[depth]

  if (ch === undefined) {
    return node.children.size > 0 ? new TrieNode(node.children) : undefined
  }

  const child = node.children.get(ch)

  if (!child) return node

  const replacement = removeAt(child, chars, depth + 1)
  const next = new Map<string, TrieNode>(node.children)

  if (replacement) {
    next.set(ch, replacement)
  } else {
    next.delete(ch)
  }

  if (next.size === 0 && !node.isValueNode) return undefined

  return node.withChildren(next)
}
