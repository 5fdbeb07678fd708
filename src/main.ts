#!/usr/bin/env node
/**
 * kmy2journal command-line entry point.
 */

import { run } from './cli.js'

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', err)
    process.exit(1)
  })
