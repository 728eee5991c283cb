import type { AccessType } from "./access-type"

/** Identifier of one buffer-pool slot. */
export type FrameId = number

/** Logical access time: a counter advanced once per recorded access. */
export type Timestamp = number

/**
 * Decides which buffer frame to reclaim.
 *
 * Every operation is synchronous and runs as one critical section; no caller
 * can observe a partially applied update.
 */
export interface Replacer {
  /**
   * Record one access to `frameId` at the next logical timestamp.
   *
   * A frame seen for the first time becomes evictable. When the replacer
   * already tracks its maximum number of evictable frames, one victim is
   * evicted first to make room.
   *
   * @throws ReplacerError `frame_out_of_range` for an invalid frame id.
   */
  recordAccess(frameId: FrameId, accessType?: AccessType): void

  /**
   * Choose, forget and return one evictable frame, or `undefined` when no
   * frame can be evicted.
   */
  evict(): FrameId | undefined

  /**
   * Toggle whether a tracked frame may be chosen as a victim.
   * No-op for frames without recorded accesses.
   */
  setEvictable(frameId: FrameId, evictable: boolean): void

  /**
   * Forget a frame's access history without going through the policy.
   * No-op for frames without recorded accesses.
   *
   * @throws ReplacerError `frame_not_evictable` when the frame is pinned.
   */
  remove(frameId: FrameId): void

  /** Number of tracked frames that are currently evictable. */
  size(): number
}
