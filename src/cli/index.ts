#!/usr/bin/env node
/**
 * @entry promptloop CLI
 *
 * Refinement loop:
 *   ploop session create -n <name> -t <task> -p <prompt> -i <inputs>
 *   ploop run                      - run the current prompt on the next batch
 *   ploop feedback <result> bad -r "too verbose"
 *   ploop propose                  - reflect and propose a better prompt
 *   ploop compare / judge / keep / revert
 */

import { Command } from 'commander'
import { registerSessionCommands } from './commands/session.js'
import { registerRunCommands } from './commands/run.js'
import { registerFeedbackCommands } from './commands/feedback.js'
import { registerCompareCommands } from './commands/compare.js'
import { registerHistoryCommands } from './commands/history.js'
import { printError } from '../shared/error.js'

const program = new Command()

program
  .name('ploop')
  .description('Iterative prompt refinement from human feedback')
  .version('0.1.0')

registerSessionCommands(program)
registerRunCommands(program)
registerFeedbackCommands(program)
registerCompareCommands(program)
registerHistoryCommands(program)

program.parseAsync().catch((error: unknown) => {
  printError(error)
  process.exitCode = 1
})
