#!/usr/bin/env node
/**
 * bin/sysindex.ts — entry point for the `sysindex` command.
 */

import { program } from '../commands/index.js'
import { t } from '../output/theme.js'

try {
  await program.parseAsync()
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err)
  // eslint-disable-next-line no-console
  console.error(t.red(`error: ${message}`))
  process.exitCode = 1
}
