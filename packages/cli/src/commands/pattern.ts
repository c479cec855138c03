// @scantoken/cli — Detection pattern command

import type { Command } from 'commander'
import { TOKEN_PATTERN } from '@scantoken/core'
import type { CommandContext } from '../lib/context.js'

export function registerPatternCommand(program: Command, context: CommandContext): void {
  program
    .command('pattern')
    .description('Print the detection pattern for third-party secret scanners')
    .action(() => {
      const output = context.output()
      if (output.isJson) {
        output.json({ pattern: TOKEN_PATTERN })
      } else {
        output.data(TOKEN_PATTERN)
      }
    })
}
