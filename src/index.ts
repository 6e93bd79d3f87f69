#!/usr/bin/env node
import { main } from './cli'
import { logger } from './services'

/*
 * Main entrypoint
 */
main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((e: unknown) => {
    logger.error('Club night finder failed', { err: e })
    process.exitCode = 1
  })
