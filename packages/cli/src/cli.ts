// @scantoken/cli — Program definition

import { Command, CommanderError } from 'commander'
import { registerGenerateCommand } from './commands/generate.js'
import { registerPatternCommand } from './commands/pattern.js'
import { registerScanCommand } from './commands/scan.js'
import { registerValidateCommand } from './commands/validate.js'
import { createCommandContext } from './lib/context.js'
import type { CliIO } from './lib/output.js'
import { OutputFormatter } from './lib/output.js'

export const VERSION = '0.1.0'

/**
 * Builds the `scantoken` program. `fail` is called when a command decides
 * the run should exit non-zero.
 */
export function createProgram(io: CliIO, fail: () => void): Command {
  const program = new Command()

  program
    .name('scantoken')
    .description('Generate, validate and scan for checksummed secret tokens')
    .version(VERSION)
    .option('--json', 'machine-readable output on stdout')
    .option('--no-color', 'disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str.trimEnd()),
      writeErr: (str) => io.stderr(str.trimEnd()),
    })

  const context = createCommandContext(program, io, fail)
  registerGenerateCommand(program, context)
  registerValidateCommand(program, context)
  registerScanCommand(program, context)
  registerPatternCommand(program, context)

  return program
}

/**
 * Runs the CLI against `argv` (arguments after the executable and script)
 * and resolves to the process exit code.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0
  const program = createProgram(io, () => {
    exitCode = 1
  })

  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    const message = error instanceof Error ? error.message : String(error)
    new OutputFormatter(io, { json: false, color: program.opts<{ color?: boolean }>().color ?? true }).error(message)
    return 1
  }
  return exitCode
}
