import type { FrameId, Timestamp } from "../../ports/replacer"
import type { VictimPool } from "./victim-pool"

/**
 * Frames in the order they entered the pool; the earliest arrival is the
 * first victim. The rank is only kept for inspection.
 */
export class InsertionOrderPool implements VictimPool {
  private readonly map = new Map<FrameId, Timestamp>()

  add(frameId: FrameId, rank: Timestamp): void {
    if (this.map.has(frameId)) this.map.delete(frameId)

    this.map.set(frameId, rank)
  }

  delete(frameId: FrameId): boolean {
    return this.map.delete(frameId)
  }

  has(frameId: FrameId): boolean {
    return this.map.has(frameId)
  }

  size(): number {
    return this.map.size
  }

  victim(isEvictable: (frameId: FrameId) => boolean): FrameId | undefined {
    for (const frameId of this.map.keys()) {
      if (isEvictable(frameId)) return frameId
    }

    return undefined
  }

  frames(): FrameId[] {
    return [...this.map.keys()]
  }
}
