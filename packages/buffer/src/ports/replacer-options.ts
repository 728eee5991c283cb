export type LruKReplacerOptions = {
  /**
   * Maximum number of evictable frames tracked at once; at least 1. Frame
   * ids from 0 up to and including this value are accepted.
   */
  numFrames: number

  /**
   * Number of most recent accesses kept per frame. Frames with fewer than
   * `k` accesses are always evicted before frames with `k` or more.
   */
  k: number
}
