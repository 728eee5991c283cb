import { NullLogger } from "@keel/logger"
import { accessTypes } from "../../ports/access-type"
import { LruKReplacer } from "../lru-k-replacer"
import { ReplacerError } from "../replacer-error"

function drain(replacer: LruKReplacer): Array<number | undefined> {
  const victims: Array<number | undefined> = []

  let victim: number | undefined

  do {
    victim = replacer.evict()
    victims.push(victim)
  } while (victim !== undefined)

  return victims
}

function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof ReplacerError) return err.code
    throw err
  }

  return undefined
}

function captureReplacerError(fn: () => unknown): ReplacerError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ReplacerError) return err
    throw err
  }

  throw new Error("expected a ReplacerError")
}

/** Park-Miller generator, so the randomized run is reproducible. */
function lcg(seed: number): () => number {
  let state = seed

  return () => {
    state = (state * 48_271) % 2_147_483_647
    return state / 2_147_483_647
  }
}

describe("LruKReplacer (behavior)", () => {
  describe("construction", () => {
    it.each([
      { numFrames: 0, k: 2 },
      { numFrames: -1, k: 2 },
      { numFrames: 1.5, k: 2 },
      { numFrames: 7, k: 0 },
      { numFrames: 7, k: Number.NaN },
    ])("rejects numFrames=$numFrames k=$k", (opts) => {
      expect(errorCodeOf(() => new LruKReplacer(opts))).toBe("invalid_replacer_config")
    })

    it("starts empty", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      expect(replacer.size()).toBe(0)
      expect(replacer.evict()).toBeUndefined()
      expect(replacer.numFrames).toBe(7)
      expect(replacer.k).toBe(2)
    })
  })

  it("follows LRU-K order through a mixed sequence of accesses and pins", () => {
    const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

    for (const frameId of [1, 2, 3, 4, 5, 6]) replacer.recordAccess(frameId)
    for (const frameId of [1, 2, 3, 4, 5]) replacer.setEvictable(frameId, true)
    replacer.setEvictable(6, false)

    expect(replacer.size()).toBe(5)

    // frame 1 reaches k accesses and leaves the recent pool
    replacer.recordAccess(1)

    expect(replacer.evict()).toBe(2)
    expect(replacer.evict()).toBe(3)
    expect(replacer.evict()).toBe(4)
    expect(replacer.size()).toBe(2)

    replacer.recordAccess(3)
    replacer.recordAccess(4)
    replacer.recordAccess(5)
    replacer.recordAccess(4)
    replacer.setEvictable(3, true)
    replacer.setEvictable(4, true)

    expect(replacer.size()).toBe(4)

    expect(replacer.evict()).toBe(3)
    expect(replacer.size()).toBe(3)

    replacer.setEvictable(6, true)
    expect(replacer.size()).toBe(4)
    expect(replacer.evict()).toBe(6)
    expect(replacer.size()).toBe(3)

    replacer.setEvictable(1, false)
    expect(replacer.size()).toBe(2)
    expect(replacer.evict()).toBe(5)
    expect(replacer.size()).toBe(1)

    replacer.recordAccess(1)
    replacer.recordAccess(1)
    replacer.setEvictable(1, true)
    expect(replacer.size()).toBe(2)

    expect(replacer.evict()).toBe(4)
    expect(replacer.size()).toBe(1)
    expect(replacer.evict()).toBe(1)
    expect(replacer.size()).toBe(0)

    replacer.recordAccess(1)
    replacer.setEvictable(1, false)
    expect(replacer.size()).toBe(0)
    expect(replacer.evict()).toBeUndefined()

    replacer.setEvictable(1, true)
    expect(replacer.size()).toBe(1)
    expect(replacer.evict()).toBe(1)
    expect(replacer.size()).toBe(0)
    expect(replacer.evict()).toBeUndefined()
  })

  it("evicts frames with fewer than k accesses before any aged frame", () => {
    const replacer = new LruKReplacer({ numFrames: 7, k: 3 })

    for (let i = 0; i < 5; i++) replacer.recordAccess(2)
    replacer.recordAccess(1)
    replacer.recordAccess(1)

    expect(drain(replacer)).toEqual([1, 2, undefined])
  })

  it("evicts the aged frame with the oldest k-th most recent access first", () => {
    const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

    replacer.recordAccess(1)
    replacer.recordAccess(2)
    replacer.recordAccess(2)
    replacer.recordAccess(3)
    replacer.recordAccess(1)
    replacer.setEvictable(3, false)

    // frame 1: accesses at 1 and 5; frame 2: accesses at 2 and 3
    expect(drain(replacer)).toEqual([1, 2, undefined])
    expect(replacer.size()).toBe(0)
  })

  it("with k = 1 behaves as plain LRU", () => {
    const replacer = new LruKReplacer({ numFrames: 3, k: 1 })

    replacer.recordAccess(1)
    replacer.recordAccess(2)
    replacer.recordAccess(3)
    replacer.recordAccess(1)

    expect(drain(replacer)).toEqual([2, 3, 1, undefined])
  })

  it("evicts exactly one frame before admitting a new one when full", () => {
    const logger = new NullLogger()
    const debug = vi.spyOn(logger, "debug")
    const replacer = new LruKReplacer({ numFrames: 3, k: 2 }, { logger })

    replacer.recordAccess(0)
    replacer.recordAccess(1)
    replacer.recordAccess(2)
    expect(replacer.size()).toBe(3)

    replacer.recordAccess(3)

    expect(replacer.size()).toBe(3)
    expect(debug).toHaveBeenCalledWith("frame evicted", { frameId: 0 })
    expect(debug).toHaveBeenCalledWith("replacer full, evicted a frame to admit another", {
      frameId: 3,
      victim: 0,
    })
    expect(drain(replacer)).toEqual([1, 2, 3, undefined])
  })

  it("makes room when unpinning a frame into a full replacer", () => {
    const replacer = new LruKReplacer({ numFrames: 2, k: 2 })

    replacer.recordAccess(0)
    replacer.recordAccess(1)
    replacer.setEvictable(1, false)
    replacer.recordAccess(2)
    expect(replacer.size()).toBe(2)

    replacer.setEvictable(1, true)

    expect(replacer.size()).toBe(2)
    expect(drain(replacer)).toEqual([1, 2, undefined])
  })

  it("accepts the frame id equal to numFrames", () => {
    const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

    replacer.recordAccess(7)

    expect(replacer.size()).toBe(1)
    expect(replacer.evict()).toBe(7)
  })

  describe("setEvictable", () => {
    it("only changes size on an actual transition", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.recordAccess(1)
      expect(replacer.size()).toBe(1)

      replacer.setEvictable(1, true)
      expect(replacer.size()).toBe(1)

      replacer.setEvictable(1, false)
      replacer.setEvictable(1, false)
      expect(replacer.size()).toBe(0)

      replacer.setEvictable(1, true)
      expect(replacer.size()).toBe(1)
    })

    it("ignores untracked frames", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.setEvictable(2, true)
      replacer.setEvictable(2, false)

      expect(replacer.size()).toBe(0)
      expect(replacer.evict()).toBeUndefined()
    })

    it("rejects out-of-range frames", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      expect(errorCodeOf(() => replacer.setEvictable(8, true))).toBe("frame_out_of_range")
    })
  })

  describe("remove", () => {
    it("refuses to remove a pinned frame", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.recordAccess(1)
      replacer.recordAccess(2)
      replacer.setEvictable(1, false)

      expect(errorCodeOf(() => replacer.remove(1))).toBe("frame_not_evictable")
      expect(replacer.size()).toBe(1)

      replacer.remove(2)
      expect(replacer.size()).toBe(0)
    })

    it("is a no-op for untracked frames", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.recordAccess(1)
      replacer.remove(3)

      expect(replacer.size()).toBe(1)
    })

    it("clears the access history of the removed frame", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.recordAccess(1)
      replacer.recordAccess(1)
      replacer.recordAccess(2)
      replacer.recordAccess(2)

      replacer.remove(2)
      expect(replacer.size()).toBe(1)

      // back to a single access, so frame 2 is in the recent pool again
      replacer.recordAccess(2)

      expect(drain(replacer)).toEqual([2, 1, undefined])
    })

    it.each([8, -1, 1.5])("rejects frame id %s", (frameId) => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      expect(errorCodeOf(() => replacer.remove(frameId))).toBe("frame_out_of_range")
    })
  })

  describe("recordAccess", () => {
    it("rejects out-of-range frames with their id and the capacity", () => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      const err = captureReplacerError(() => replacer.recordAccess(8))

      expect(err.code).toBe("frame_out_of_range")
      expect(err.context).toEqual({ frameId: 8, numFrames: 7 })
      expect(err.isOperational).toBe(false)
      expect(err.isRetryable).toBe(false)
      expect(err.message).toBe("Frame 8 is outside the replacer range [0, 7]")
      expect(replacer.size()).toBe(0)
    })

    it.each(accessTypes)("accepts the %s access type without changing the policy", (accessType) => {
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 })

      replacer.recordAccess(1, accessType)
      replacer.recordAccess(2)

      expect(drain(replacer)).toEqual([1, 2, undefined])
    })

    it("logs the access type at trace level", () => {
      const logger = new NullLogger()
      const trace = vi.spyOn(logger, "trace")
      const replacer = new LruKReplacer({ numFrames: 7, k: 2 }, { logger })

      replacer.recordAccess(3, "scan")
      replacer.recordAccess(4)

      expect(trace).toHaveBeenNthCalledWith(1, "frame access recorded", {
        frameId: 3,
        accessType: "scan",
        timestamp: 1,
      })
      expect(trace).toHaveBeenNthCalledWith(2, "frame access recorded", {
        frameId: 4,
        accessType: "unknown",
        timestamp: 2,
      })
    })
  })

  it("rejects calls made back into the replacer while an operation runs", () => {
    const logger = new NullLogger()
    const replacer = new LruKReplacer({ numFrames: 7, k: 2 }, { logger })

    replacer.recordAccess(1)
    replacer.recordAccess(2)

    const debug = vi.spyOn(logger, "debug").mockImplementationOnce(() => {
      replacer.size()
    })

    expect(errorCodeOf(() => replacer.evict())).toBe("replacer_reentered")
    expect(debug).toHaveBeenCalledTimes(1)

    // the latch is released again and frame 1 was already evicted
    expect(replacer.size()).toBe(1)
    expect(replacer.evict()).toBe(2)
  })

  it("never tracks more evictable frames than its capacity", () => {
    const numFrames = 5
    const replacer = new LruKReplacer({ numFrames, k: 2 })
    const next = lcg(42)

    for (let step = 0; step < 2_000; step++) {
      const frameId = Math.floor(next() * (numFrames + 1))
      const op = Math.floor(next() * 4)

      if (op === 0) {
        replacer.recordAccess(frameId)
      } else if (op === 1) {
        replacer.setEvictable(frameId, next() < 0.7)
      } else if (op === 2) {
        const victim = replacer.evict()

        if (victim !== undefined) {
          expect(victim).toBeGreaterThanOrEqual(0)
          expect(victim).toBeLessThanOrEqual(numFrames)
        }
      } else {
        const code = errorCodeOf(() => replacer.remove(frameId))

        expect([undefined, "frame_not_evictable"]).toContain(code)
      }

      expect(replacer.size()).toBeLessThanOrEqual(numFrames)
      expect(replacer.size()).toBeGreaterThanOrEqual(0)
    }
  })
})
