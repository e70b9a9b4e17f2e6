#!/usr/bin/env node

import { createProgram, getPackageJsonVersion, reportFatalError } from './program.js'

const version = await getPackageJsonVersion()

process.on('uncaughtException', (err) => {
  handleError(err)
})

process.on('unhandledRejection', (err) => {
  if (err instanceof Error) {
    handleError(err)
  } else throw err
})

function handleError(err: Error) {
  const exitCode = reportFatalError(err, version)
  if (exitCode === undefined) {
    throw err
  }
  process.exit(exitCode)
}

await createProgram(version).parseAsync()
