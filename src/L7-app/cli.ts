#!/usr/bin/env node
import logger from '../L1-infra/logger/configLogger.js'
import { main } from './main.js'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    logger.error(`Unexpected failure: ${err instanceof Error ? err.stack ?? err.message : String(err)}`)
    process.exitCode = 1
  })
