import { SimulatorError } from "../../model/simulator.errors"
import {
  parseCapacity,
  parseKey,
  parseMenuOption,
  parsePolicyChoice,
  parseValue,
} from "../parse-input"

function rejectionOf(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  return undefined
}

describe("parsePolicyChoice", () => {
  it.each([
    ["1", "lru"],
    ["2", "mru"],
    ["3", "lfu"],
    ["lru", "lru"],
    [" MRU ", "mru"],
    ["Lfu", "lfu"],
  ])("maps %j to %s", (input, policy) => {
    expect(parsePolicyChoice(input)).toBe(policy)
  })

  it.each(["0", "4", "fifo", "", "constructor"])("rejects %j", (input) => {
    const err = rejectionOf(() => parsePolicyChoice(input))

    expect(err).toBeInstanceOf(SimulatorError)
    expect(err).toMatchObject({ code: "invalid_policy", context: { input } })
  })
})

describe("parseCapacity", () => {
  it.each([
    ["1", 1],
    [" 42 ", 42],
    ["+3", 3],
  ])("parses %j as %d", (input, capacity) => {
    expect(parseCapacity(input)).toBe(capacity)
  })

  it.each(["0", "-2", "2.5", "abc", "", "1e3", "99999999999999999999"])("rejects %j", (input) => {
    expect(rejectionOf(() => parseCapacity(input))).toMatchObject({ code: "invalid_capacity" })
  })
})

describe("parseKey", () => {
  it.each([
    ["7", 7],
    ["-12", -12],
    [" 0 ", 0],
  ])("parses %j as %d", (input, key) => {
    expect(parseKey(input)).toBe(key)
  })

  it.each(["", "x", "1.5", "1 2"])("rejects %j", (input) => {
    expect(rejectionOf(() => parseKey(input))).toMatchObject({ code: "invalid_key" })
  })
})

describe("parseValue", () => {
  it("trims surrounding whitespace", () => {
    expect(parseValue("  apple ")).toBe("apple")
  })

  it.each(["", "   ", "two words"])("rejects %j", (input) => {
    expect(rejectionOf(() => parseValue(input))).toMatchObject({ code: "invalid_value" })
  })
})

describe("parseMenuOption", () => {
  it.each([
    ["1", "get"],
    ["2", "put"],
    ["3", "display"],
    ["4", "exit"],
    [" 5 ", "stats"],
  ])("maps %j to %s", (input, kind) => {
    expect(parseMenuOption(input).kind).toBe(kind)
  })

  it.each(["0", "6", "get", ""])("rejects %j", (input) => {
    expect(rejectionOf(() => parseMenuOption(input))).toMatchObject({
      code: "invalid_option",
      context: { input },
    })
  })
})
