/**
 * Bulk Dispatch
 * Command-line entry point.
 */

import { loadConfig } from "./config"
import { main } from "./cli/send"
import { ConfigurationError, errorMessage } from "./core/errors"
import { createLogger } from "./logger"

async function run(): Promise<number> {
  const config = loadConfig()
  const logger = createLogger(config.appName, config.logLevel)
  return main(process.argv.slice(2), config, logger)
}

void run()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    if (error instanceof ConfigurationError) {
      console.error(error.message)
      process.exitCode = 2
      return
    }
    console.error(errorMessage(error))
    process.exitCode = 1
  })
