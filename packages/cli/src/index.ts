#!/usr/bin/env tsx

import { loadEnvFiles } from './lib/env-loader'
import { createProgram } from './program'

// Config is read when a command runs, so .env files only need to be in
// process.env before parsing. Variables exported in the shell win.
loadEnvFiles()

await createProgram().parseAsync(process.argv)
