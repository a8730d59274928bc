#!/usr/bin/env tsx
import { handleCliError } from './helpers.js'
import { main } from './index.js'

main().catch((error: unknown) => {
  handleCliError(error)
})
