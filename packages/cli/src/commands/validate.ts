// @scantoken/cli — Token validation command

import type { Command } from 'commander'
import { describeResult } from '@scantoken/runtime'
import type { CommandContext } from '../lib/context.js'
import { openScantoken } from '../lib/context.js'

/** Strips the line ending a shell pipe leaves after the token */
function stripLineEnding(text: string): string {
  return text.replace(/\r?\n$/, '')
}

export function registerValidateCommand(program: Command, context: CommandContext): void {
  program
    .command('validate')
    .description('Validate a token (grammar, checksum, and registry when given)')
    .argument('<token>', 'token to validate, or - to read it from stdin')
    .option('-r, --registry <file>', 'component allocation file (JSON); omit to validate offline')
    .action(async (token: string, options: { registry?: string }) => {
      const output = context.output()
      const scantoken = await openScantoken(options.registry)
      const candidate = token === '-' ? stripLineEnding(await context.io.readStdin()) : token

      const result = await scantoken.validate(candidate)
      const registryChecked = scantoken.config.enforceRegistry

      if (!result.valid) {
        if (output.isJson) {
          output.json({ valid: false, reason: result.reason, message: describeResult(result) })
        } else {
          output.error(describeResult(result))
        }
        context.fail()
        return
      }

      if (output.isJson) {
        output.json({ valid: true, component: result.token.component, registryChecked })
        return
      }
      output.success(`Valid token for component ${result.token.component}`)
      if (!registryChecked) {
        output.dim('Registry not checked (no --registry given)')
      }
    })
}
