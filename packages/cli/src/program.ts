import { VERSION } from '@desk-triage/core'
import { Command } from 'commander'
import { registerClassifyCommand } from './commands/classify'
import { registerNormalizeCommand } from './commands/normalize'
import { registerReplayCommand } from './commands/replay'
import { registerTriageCommand } from './commands/triage'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('desk-triage')
    .description('Classify and route helpdesk tickets')
    .version(VERSION)
    .option('-f, --format <format>', 'Output format (json|text)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-error output')

  program.addHelpText(
    'after',
    '\n  Examples:\n' +
      '    desk-triage normalize body.eml -s "ALARM: High CPU"\n' +
      '    desk-triage classify body.txt --offline\n' +
      '    desk-triage triage event.json --dry-run\n' +
      '    desk-triage replay dlq.jsonl\n'
  )

  registerNormalizeCommand(program)
  registerClassifyCommand(program)
  registerTriageCommand(program)
  registerReplayCommand(program)

  return program
}
