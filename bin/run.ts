#!/usr/bin/env node

import { config } from 'dotenv'
import { runCli } from '../src/cli/cli'
import { logger } from '../src/logger'

config()

runCli().catch((error: unknown) => {
  logger.error('inferprobe failed:', error)
  process.exitCode = 1
})
