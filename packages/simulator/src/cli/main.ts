import { toAppError } from "@cachesim/errors"
import { createPinoLogger } from "@cachesim/logger"
import { loadSimulatorConfig } from "../config/load-simulator-config"
import { parseFlags } from "./flags"
import { runSimulator } from "./run-simulator"

async function main(): Promise<void> {
  const config = await loadSimulatorConfig({ flags: parseFlags(process.argv.slice(2)) })

  const logger = createPinoLogger(
    { destination: process.stderr },
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName },
  )

  process.exitCode = await runSimulator({
    input: process.stdin,
    output: process.stdout,
    config,
    logger,
  })
}

main().catch((err: unknown) => {
  const logger = createPinoLogger({ destination: process.stderr })

  logger.fatal("simulator failed", { err: toAppError(err) })
  process.exitCode = 1
})
