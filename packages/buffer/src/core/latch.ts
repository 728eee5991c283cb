import { ReplacerError } from "./replacer-error"

/**
 * Exclusive latch around a replacer's state.
 *
 * Operations are synchronous, so holding the latch for the duration of `fn`
 * makes each one a critical section. A second `run` while the latch is held
 * can only come from re-entrant code (e.g. a logger calling back into the
 * replacer) and is rejected instead of observing half-applied state.
 */
export class Latch {
  private held = false

  run<T>(fn: () => T): T {
    if (this.held) throw ReplacerError.reentered()

    this.held = true

    try {
      return fn()
    } finally {
      this.held = false
    }
  }

  isHeld(): boolean {
    return this.held
  }
}
