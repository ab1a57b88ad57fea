import {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
} from "../../ports/cache-eviction-policy"

export function isCacheEvictionPolicy(value: unknown): value is CacheEvictionPolicy {
  return cacheEvictionPolicies.some((policy) => policy === value)
}
