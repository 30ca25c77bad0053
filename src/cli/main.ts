#!/usr/bin/env node
import { runCLI } from './index'
import { logger } from '../logger'

runCLI(process.argv.slice(2))
  .then(result => {
    process.exitCode = result.exitCode
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'unexpected failure')
    console.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  })
