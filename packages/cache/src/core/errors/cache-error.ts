import { BaseError } from "@cachesim/errors"

export type CacheErrorCode = "invalid_capacity" | "unknown_policy" | "corrupt_state"

export class CacheError extends BaseError<CacheErrorCode> {
  static invalidCapacity(capacity: unknown): CacheError {
    return new CacheError("Cache capacity must be a non-negative integer", {
      code: "invalid_capacity",
      context: { capacity },
    })
  }

  static unknownPolicy(policy: unknown): CacheError {
    return new CacheError(`Unknown eviction policy: ${String(policy)}`, {
      code: "unknown_policy",
      context: { policy },
    })
  }

  static corruptState(detail: string, context: Record<string, unknown> = {}): CacheError {
    return new CacheError(`Cache state is corrupt: ${detail}`, {
      code: "corrupt_state",
      context,
      isOperational: false,
    })
  }
}
