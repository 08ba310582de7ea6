/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 */

import { Command } from 'commander'
import { statusCommand } from './status.js'
import { installCommand } from './install.js'
import { logCommand } from './log.js'
import { DEFAULT_TIMEOUT_MS, parseTimeout } from './runtime.js'

const program = new Command()

program
  .name('sysindex')
  .description(
    'Installs the versioned system index and notifications template.\n' +
    'Safe to run from several processes at once.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Home directory (default: $SYSINDEX_HOME or ~/.sysindex)')
  .option('--timeout <ms>', 'Store request timeout in milliseconds', parseTimeout, DEFAULT_TIMEOUT_MS)

program.addCommand(statusCommand)
program.addCommand(installCommand)
program.addCommand(logCommand)

export { program }
