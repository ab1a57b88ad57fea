import { CacheError } from "../errors/cache-error"

export function assertValidCapacity(capacity: number): number {
  if (!Number.isSafeInteger(capacity) || capacity < 0) {
    throw CacheError.invalidCapacity(capacity)
  }

  return capacity
}
