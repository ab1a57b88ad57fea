import { type CacheEvictionPolicy, isCacheEvictionPolicy } from "@cachesim/cache"
import { z } from "zod"
import type { CacheKey, CacheValue, CommandKind } from "../model/command"
import { SimulatorError } from "../model/simulator.errors"

const policyByMenuChoice: ReadonlyMap<string, CacheEvictionPolicy> = new Map<
  string,
  CacheEvictionPolicy
>([
  ["1", "lru"],
  ["2", "mru"],
  ["3", "lfu"],
])

/**
 * Menu entries in the order they are shown.
 */
export const menuOptions = [
  { option: "1", kind: "get", label: "Get from Cache" },
  { option: "2", kind: "put", label: "Put into Cache" },
  { option: "3", kind: "display", label: "Display Cache" },
  { option: "4", kind: "exit", label: "Exit" },
  { option: "5", kind: "stats", label: "Show Stats" },
] as const satisfies readonly { option: string; kind: CommandKind; label: string }[]

export type MenuOption = (typeof menuOptions)[number]

const integerSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.int())

const capacitySchema = integerSchema.pipe(z.number().positive())

const valueSchema = z
  .string()
  .trim()
  .regex(/^\S+$/)

export function parsePolicyChoice(input: string): CacheEvictionPolicy {
  const choice = input.trim().toLowerCase()

  if (isCacheEvictionPolicy(choice)) return choice

  const policy = policyByMenuChoice.get(choice)

  if (!policy) throw SimulatorError.invalidPolicy(input)

  return policy
}

export function parseCapacity(input: string): number {
  const result = capacitySchema.safeParse(input)

  if (!result.success) throw SimulatorError.invalidCapacity(input)

  return result.data
}

export function parseKey(input: string): CacheKey {
  const result = integerSchema.safeParse(input)

  if (!result.success) throw SimulatorError.invalidKey(input)

  return result.data
}

export function parseValue(input: string): CacheValue {
  const result = valueSchema.safeParse(input)

  if (!result.success) throw SimulatorError.invalidValue(input)

  return result.data
}

export function parseMenuOption(input: string): MenuOption {
  const trimmed = input.trim()
  const option = menuOptions.find((entry) => entry.option === trimmed)

  if (!option) throw SimulatorError.invalidOption(input)

  return option
}
