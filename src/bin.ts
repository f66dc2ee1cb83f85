#!/usr/bin/env node
import { createProgram, exitCodeFor } from './cli/index.js'

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('[spellsweep]', error instanceof Error ? error.message : error)
    process.exitCode = exitCodeFor(error)
  })
