import { BaseError } from "@keel/errors"
import type { FrameId } from "../ports/replacer"

export type ReplacerErrorCode =
  | "frame_out_of_range"
  | "frame_not_evictable"
  | "replacer_reentered"
  | "invalid_replacer_config"

export class ReplacerError extends BaseError<ReplacerErrorCode> {
  static frameOutOfRange(input: { frameId: FrameId; numFrames: number }): ReplacerError {
    return new ReplacerError(
      `Frame ${input.frameId} is outside the replacer range [0, ${input.numFrames}]`,
      {
        code: "frame_out_of_range",
        context: { frameId: input.frameId, numFrames: input.numFrames },
        isOperational: false,
      },
    )
  }

  static frameNotEvictable(input: { frameId: FrameId }): ReplacerError {
    return new ReplacerError(`Frame ${input.frameId} is pinned and cannot be removed`, {
      code: "frame_not_evictable",
      context: { frameId: input.frameId },
      isOperational: false,
    })
  }

  static reentered(): ReplacerError {
    return new ReplacerError("Replacer was re-entered while an operation was in progress", {
      code: "replacer_reentered",
      isOperational: false,
    })
  }

  static invalidConfig(input: { numFrames: number; k: number }): ReplacerError {
    return new ReplacerError(
      `Invalid replacer configuration: numFrames and k must be positive integers (numFrames=${input.numFrames}, k=${input.k})`,
      {
        code: "invalid_replacer_config",
        context: { numFrames: input.numFrames, k: input.k },
      },
    )
  }
}
