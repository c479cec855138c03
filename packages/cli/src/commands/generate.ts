// @scantoken/cli — Token generation command

import type { Command } from 'commander'
import { describeResult } from '@scantoken/runtime'
import type { CommandContext } from '../lib/context.js'
import { openScantoken, parsePositiveInt } from '../lib/context.js'

export function registerGenerateCommand(program: Command, context: CommandContext): void {
  program
    .command('generate')
    .description('Generate tokens for an allocated component')
    .argument('<component>', 'issuer component (3-6 lowercase letters)')
    .requiredOption('-r, --registry <file>', 'component allocation file (JSON)')
    .option('-n, --count <n>', 'number of tokens to generate', parsePositiveInt, 1)
    .action(async (component: string, options: { registry: string; count: number }) => {
      const output = context.output()
      const scantoken = await openScantoken(options.registry)

      const tokens: string[] = []
      for (let i = 0; i < options.count; i++) {
        const result = await scantoken.generate(component)
        if (!result.success) {
          if (output.isJson) {
            output.json({ success: false, reason: result.reason, message: describeResult(result) })
          } else {
            output.error(describeResult(result))
          }
          context.fail()
          return
        }
        tokens.push(result.token.value)
      }

      if (output.isJson) {
        output.json({ success: true, component, tokens })
        return
      }
      for (const token of tokens) {
        output.data(token)
      }
    })
}
