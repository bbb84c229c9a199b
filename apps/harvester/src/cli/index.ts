#!/usr/bin/env node
import '../env.js'
import { runCli } from './main.js'

runCli(process.argv.slice(2)).then(
  exitCode => process.exit(exitCode),
  (error: unknown) => {
    console.error(error)
    process.exit(1)
  }
)
