import { type Logger, NullLogger } from "@keel/logger"
import type { AccessType } from "../ports/access-type"
import type { FrameId, Replacer, Timestamp } from "../ports/replacer"
import type { LruKReplacerOptions } from "../ports/replacer-options"
import { Latch } from "./latch"
import { InsertionOrderPool } from "./pools/insertion-order-pool"
import { KDistancePool } from "./pools/k-distance-pool"
import type { VictimPool } from "./pools/victim-pool"
import { ReplacerError } from "./replacer-error"

export type LruKReplacerDeps = {
  logger?: Logger
}

type FrameRecord = {
  /** Most recent access timestamps, oldest first; at most `k` entries. */
  history: Timestamp[]
  accessCount: number
  evictable: boolean
}

/**
 * LRU-K replacement policy.
 *
 * Frames with fewer than `k` recorded accesses sit in a recent pool and are
 * evicted first, earliest arrival first. Frames with `k` or more accesses sit
 * in an aged pool ordered by backward k-distance, and the frame whose k-th
 * most recent access lies furthest in the past goes first.
 */
export class LruKReplacer implements Replacer {
  readonly numFrames: number
  readonly k: number

  private readonly latch = new Latch()
  private readonly records = new Map<FrameId, FrameRecord>()
  private readonly recent: VictimPool = new InsertionOrderPool()
  private readonly aged: VictimPool = new KDistancePool()
  private readonly logger: Logger

  private currentTimestamp: Timestamp = 0
  private evictableCount = 0

  public constructor(opts: LruKReplacerOptions, deps: LruKReplacerDeps = {}) {
    if (!isPositiveInteger(opts.numFrames) || !isPositiveInteger(opts.k)) {
      throw ReplacerError.invalidConfig(opts)
    }

    this.numFrames = opts.numFrames
    this.k = opts.k
    this.logger = deps.logger ?? new NullLogger()
  }

  recordAccess(frameId: FrameId, accessType: AccessType = "unknown"): void {
    this.latch.run(() => {
      this.assertInRange(frameId)

      const timestamp = ++this.currentTimestamp
      const record = this.trackedOrNew(frameId)

      record.history.push(timestamp)
      if (record.history.length > this.k) record.history.shift()
      record.accessCount += 1

      this.logger.trace("frame access recorded", { frameId, accessType, timestamp })

      if (record.accessCount === 1) this.admit(frameId, record, timestamp)

      if (record.accessCount >= this.k) {
        this.recent.delete(frameId)
        this.aged.add(frameId, record.history[0] ?? timestamp)
      }
    })
  }

  evict(): FrameId | undefined {
    return this.latch.run(() => this.evictHeld())
  }

  setEvictable(frameId: FrameId, evictable: boolean): void {
    this.latch.run(() => {
      this.assertInRange(frameId)

      const record = this.records.get(frameId)

      if (!record || record.evictable === evictable) return

      if (evictable) {
        this.makeRoom(frameId)
        this.evictableCount += 1
      } else {
        this.evictableCount -= 1
      }

      record.evictable = evictable
    })
  }

  remove(frameId: FrameId): void {
    this.latch.run(() => {
      this.assertInRange(frameId)

      const record = this.records.get(frameId)

      if (!record) return

      if (!record.evictable) throw ReplacerError.frameNotEvictable({ frameId })

      this.forget(frameId)

      this.logger.debug("frame removed", { frameId })
    })
  }

  size(): number {
    return this.latch.run(() => this.evictableCount)
  }

  private trackedOrNew(frameId: FrameId): FrameRecord {
    const existing = this.records.get(frameId)

    if (existing) return existing

    const record: FrameRecord = { history: [], accessCount: 0, evictable: false }
    this.records.set(frameId, record)

    return record
  }

  private admit(frameId: FrameId, record: FrameRecord, timestamp: Timestamp): void {
    this.makeRoom(frameId)

    record.evictable = true
    this.evictableCount += 1
    this.recent.add(frameId, timestamp)
  }

  /**
   * Keeps the evictable set within `numFrames` before `frameId` joins it.
   * A full set always holds at least one victim, since `numFrames >= 1`.
   */
  private makeRoom(frameId: FrameId): void {
    if (this.evictableCount < this.numFrames) return

    const victim = this.evictHeld()

    this.logger.debug("replacer full, evicted a frame to admit another", { frameId, victim })
  }

  /** Eviction on state the caller already holds the latch for. */
  private evictHeld(): FrameId | undefined {
    if (this.evictableCount === 0) return undefined

    const isEvictable = (id: FrameId) => this.records.get(id)?.evictable === true
    const victim = this.recent.victim(isEvictable) ?? this.aged.victim(isEvictable)

    if (victim === undefined) return undefined

    this.forget(victim)

    this.logger.debug("frame evicted", { frameId: victim })

    return victim
  }

  private forget(frameId: FrameId): void {
    if (!this.recent.delete(frameId)) this.aged.delete(frameId)

    this.records.delete(frameId)
    this.evictableCount -= 1
  }

  private assertInRange(frameId: FrameId): void {
    if (!Number.isInteger(frameId) || frameId < 0 || frameId > this.numFrames) {
      throw ReplacerError.frameOutOfRange({ frameId, numFrames: this.numFrames })
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0
}
