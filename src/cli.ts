#!/usr/bin/env node
import { CommanderError } from 'commander'

import { describeError } from './episodes/errors.js'
import { runCli } from './run.js'

runCli(process.argv.slice(2), {
  env: process.env,
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
}).catch((error: unknown) => {
  // Commander already printed its own usage error.
  if (!(error instanceof CommanderError)) {
    process.stderr.write(`episplit: ${describeError(error)}\n`)
  }
  process.exitCode = 1
})
