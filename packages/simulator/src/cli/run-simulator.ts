import type { CacheEvictionPolicy } from "@cachesim/cache"
import { createNullLogger, type Logger } from "@cachesim/logger"
import type { SimulatorConfig } from "../config/schema"
import { CacheSession } from "../core/cache-session"
import {
  menuOptions,
  parseCapacity,
  parseKey,
  parseMenuOption,
  parsePolicyChoice,
  parseValue,
} from "../core/parse-input"
import type { Command } from "../model/command"
import { SimulatorError, type SimulatorErrorCode } from "../model/simulator.errors"
import { LinePrompter } from "./line-prompter"

export type RunSimulatorOptions = {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  config: SimulatorConfig
  logger?: Logger
}

const policyMenu = [
  "Choose Cache Policy:",
  "1. LRU (Least Recently Used)",
  "2. MRU (Most Recently Used)",
  "3. LFU (Least Frequently Used)",
]

const invalidInputMessages: Record<SimulatorErrorCode, string> = {
  invalid_policy: "Invalid choice!",
  invalid_capacity: "Invalid capacity!",
  invalid_key: "Invalid key!",
  invalid_value: "Invalid value!",
  invalid_option: "Invalid option!",
}

/**
 * Interactive console session. Resolves to the process exit code.
 *
 * End of input ends the session with 0 wherever it happens.
 */
export async function runSimulator(opts: RunSimulatorOptions): Promise<number> {
  const logger = (opts.logger ?? createNullLogger()).child({ module: "cli" })
  const prompter = new LinePrompter(opts.input, opts.output)

  try {
    return await runSession(prompter, opts.config, logger)
  } finally {
    prompter.close()
  }
}

async function runSession(
  prompter: LinePrompter,
  config: SimulatorConfig,
  logger: Logger,
): Promise<number> {
  const policy = config.cache.policy ?? (await askPolicy(prompter, logger))

  if (policy === undefined) return 0

  if (policy instanceof SimulatorError) {
    prompter.print(invalidInputMessages[policy.code])

    return 0
  }

  const capacity = config.cache.capacity ?? (await askCapacity(prompter, logger))

  if (capacity === undefined) return 0

  const session = new CacheSession({ policy, capacity }, { logger })

  logger.info("session started", { policy, capacity })

  for (;;) {
    const command = await askCommand(prompter, logger)

    if (command === undefined) break
    if (command === null) continue

    const result = session.execute(command)

    for (const line of result.lines) prompter.print(line)

    if (result.done) break
  }

  logger.info("session ended", { policy, capacity })

  return 0
}

async function askPolicy(
  prompter: LinePrompter,
  logger: Logger,
): Promise<CacheEvictionPolicy | SimulatorError | undefined> {
  for (const line of policyMenu) prompter.print(line)

  const answer = await prompter.ask("Enter choice: ")

  if (answer === undefined) return undefined

  return attempt(() => parsePolicyChoice(answer), logger)
}

async function askCapacity(prompter: LinePrompter, logger: Logger): Promise<number | undefined> {
  for (;;) {
    const answer = await prompter.ask("Enter cache capacity: ")

    if (answer === undefined) return undefined

    const capacity = attempt(() => parseCapacity(answer), logger)

    if (!(capacity instanceof SimulatorError)) return capacity

    prompter.print(invalidInputMessages[capacity.code])
  }
}

/**
 * Reads one menu choice and its arguments. `null` means the input was
 * rejected and the menu should be shown again; `undefined` means end of input.
 */
async function askCommand(
  prompter: LinePrompter,
  logger: Logger,
): Promise<Command | null | undefined> {
  prompter.print("")
  for (const entry of menuOptions) prompter.print(`${entry.option}. ${entry.label}`)

  const answer = await prompter.ask("Choose option: ")

  if (answer === undefined) return undefined

  const option = attempt(() => parseMenuOption(answer), logger)

  if (option instanceof SimulatorError) return reject(prompter, option)

  switch (option.kind) {
    case "get": {
      const key = await askKey(prompter, logger)

      if (key === undefined) return undefined
      if (key instanceof SimulatorError) return reject(prompter, key)

      return { kind: "get", key }
    }
    case "put": {
      const key = await askKey(prompter, logger)

      if (key === undefined) return undefined
      if (key instanceof SimulatorError) return reject(prompter, key)

      const answer = await prompter.ask("Enter value: ")

      if (answer === undefined) return undefined

      const value = attempt(() => parseValue(answer), logger)

      if (value instanceof SimulatorError) return reject(prompter, value)

      return { kind: "put", key, value }
    }
    case "display":
      return { kind: "display" }
    case "stats":
      return { kind: "stats" }
    case "exit":
      return { kind: "exit" }
  }
}

async function askKey(
  prompter: LinePrompter,
  logger: Logger,
): Promise<number | SimulatorError | undefined> {
  const answer = await prompter.ask("Enter key: ")

  if (answer === undefined) return undefined

  return attempt(() => parseKey(answer), logger)
}

function reject(prompter: LinePrompter, err: SimulatorError): null {
  prompter.print(invalidInputMessages[err.code])

  return null
}

function attempt<T>(parse: () => T, logger: Logger): T | SimulatorError {
  try {
    return parse()
  } catch (err) {
    if (!(err instanceof SimulatorError)) throw err

    logger.debug("input rejected", { code: err.code, input: err.context.input })

    return err
  }
}
