#!/usr/bin/env node

process.removeAllListeners('warning')

import { loadConfig } from './config'
import { EXIT_FAILURE, EXIT_SIGNALS, exitCodeOf, failureDetails, preflightErrors, signalExitCode } from './exitCodes'
import { BootstrapRuntime, createContext } from './runtime/BootstrapRuntime'
import { getErrorInfo } from './utils/errors'
import { logger, flushLogs, setLogLevel } from './utils/logger'

function exit(code: number): never {
  flushLogs()
  process.exit(code)
}

/**
 * Main entry point for the bootstrap run
 */
async function main(): Promise<number> {
  const config = loadConfig()
  setLogLevel(config.logLevel)

  const problems = preflightErrors(config, process.getuid?.())
  if (problems.length > 0) {
    logger.error('Configuration validation failed')
    problems.forEach(problem => logger.error(`  - ${problem}`))
    return EXIT_FAILURE
  }

  for (const signal of EXIT_SIGNALS) {
    process.on(signal, () => {
      logger.warn(`Received ${signal}, aborting installation`)
      exit(signalExitCode(signal))
    })
  }

  logger.info('Configuration loaded and validated successfully', {
    packageName: config.packageName,
    fallbackVersions: config.fallbackVersions,
    mirrors: config.mirrors,
  })

  return exitCodeOf(
    async () => {
      await new BootstrapRuntime(createContext(config)).run()
    },
    error => {
      logger.error('Installation failed', getErrorInfo(error))
      failureDetails(error).forEach(line => logger.error(line))
    }
  )
}

main()
  .then(code => exit(code))
  .catch((error: unknown) => {
    logger.error('Unexpected error during startup', getErrorInfo(error))
    exit(EXIT_FAILURE)
  })
