#!/usr/bin/env node
/**
 * @watchpane/node - Executable entry point
 */

import { main } from './cli'

main().then(
  (code) => {
    process.exit(code)
  },
  (error: unknown) => {
    const message = error instanceof Error ? (error.stack ?? error.message) : String(error)
    process.stderr.write(`watchpane: ${message}\n`)
    process.exit(1)
  }
)
