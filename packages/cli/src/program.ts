import { VERSION } from '@deskhand/core'
import { Command, Option } from 'commander'
import { registerAskCommand } from './commands/ask'
import { registerChatCommand } from './commands/chat'
import { registerKbCommands } from './commands/kb'
import { registerRefCommand } from './commands/ref'
import { registerSearchCommand } from './commands/search'
import { registerTicketCommands } from './commands/ticket'
import { OUTPUT_FORMATS } from './core/output'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('deskhand')
    .description('Answer support questions from tickets and the knowledge base')
    .version(`deskhand v${VERSION}`)
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS)
    )
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-error output')

  program.addHelpText(
    'after',
    '\n  Examples:\n' +
      '    deskhand search password reset\n' +
      '    deskhand ask "What is the status of PROJ-1001?"\n' +
      '    deskhand ticket show PROJ-1001\n' +
      '    deskhand chat\n'
  )

  registerSearchCommand(program)
  registerAskCommand(program)
  registerTicketCommands(program)
  registerRefCommand(program)
  registerKbCommands(program)
  registerChatCommand(program)

  return program
}
