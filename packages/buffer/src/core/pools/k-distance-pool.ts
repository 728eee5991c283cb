import createRBTree, { type Tree } from "functional-red-black-tree"
import type { FrameId, Timestamp } from "../../ports/replacer"
import type { VictimPool } from "./victim-pool"

type PoolKey = {
  rank: Timestamp
  seq: number
}

function compareKeys(a: PoolKey, b: PoolKey): number {
  return a.rank - b.rank || a.seq - b.seq
}

/**
 * Frames ordered ascending by rank, the backward k-distance: the timestamp
 * of the k-th most recent access. Equal ranks keep insertion order.
 */
export class KDistancePool implements VictimPool {
  private tree: Tree<PoolKey, FrameId> = createRBTree<PoolKey, FrameId>(compareKeys)
  private readonly keys = new Map<FrameId, PoolKey>()
  private seq = 0

  add(frameId: FrameId, rank: Timestamp): void {
    this.delete(frameId)

    const key: PoolKey = { rank, seq: this.seq++ }

    this.tree = this.tree.insert(key, frameId)
    this.keys.set(frameId, key)
  }

  delete(frameId: FrameId): boolean {
    const key = this.keys.get(frameId)

    if (key === undefined) return false

    this.tree = this.tree.remove(key)
    this.keys.delete(frameId)

    return true
  }

  has(frameId: FrameId): boolean {
    return this.keys.has(frameId)
  }

  size(): number {
    return this.keys.size
  }

  victim(isEvictable: (frameId: FrameId) => boolean): FrameId | undefined {
    for (const it = this.tree.begin; it.valid; it.next()) {
      const frameId = it.value

      if (frameId !== undefined && isEvictable(frameId)) return frameId
    }

    return undefined
  }

  frames(): FrameId[] {
    return [...this.tree.values]
  }
}
