/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/mantle.ts.
 */

import { program } from 'commander'
import { compileCommand } from './compile.js'
import { checkCommand } from './check.js'
import { graphCommand } from './graph.js'
import { planCommand } from './plan.js'
import { fmtCommand } from './fmt.js'
import { logCommand } from './log.js'

program
  .name('mantle')
  .description(
    'Mantle — compiles resource manifests into an ordered, hashed catalog.\n' +
    'Set MANTLE_NO_COLOR to disable colored output.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Mantle home directory (default: $MANTLE_HOME or ~/.mantle)')

program.addCommand(compileCommand)
program.addCommand(checkCommand)
program.addCommand(graphCommand)
program.addCommand(planCommand)
program.addCommand(fmtCommand)
program.addCommand(logCommand)

export { program }
