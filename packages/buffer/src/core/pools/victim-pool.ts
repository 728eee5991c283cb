import type { FrameId, Timestamp } from "../../ports/replacer"

/**
 * Ordered set of eviction candidates used internally by the LRU-K replacer.
 *
 * Each frame carries a rank (an access timestamp). Implementations decide
 * how the rank maps to eviction order.
 */
export interface VictimPool {
  /**
   * Insert `frameId` with the given rank. A frame that is already present
   * is re-positioned.
   */
  add(frameId: FrameId, rank: Timestamp): void

  /**
   * Remove the frame from the pool.
   *
   * Returns true if the frame was present.
   */
  delete(frameId: FrameId): boolean

  has(frameId: FrameId): boolean

  size(): number

  /**
   * Return the first frame in eviction order for which `isEvictable` holds,
   * or `undefined`. Does not remove it.
   */
  victim(isEvictable: (frameId: FrameId) => boolean): FrameId | undefined

  /** All frames in eviction order. */
  frames(): FrameId[]
}
