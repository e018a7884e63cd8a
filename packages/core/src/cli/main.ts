#!/usr/bin/env node
import { hideBin } from 'yargs/helpers'
import { run } from './run'

run(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
