// @scantoken/cli — Styled output

import { Chalk } from 'chalk'
import type { ChalkInstance } from 'chalk'

/** Where the CLI writes and reads; replaced in tests */
export interface CliIO {
  readonly stdout: (line: string) => void
  readonly stderr: (line: string) => void
  readonly readStdin: () => Promise<string>
  readonly readFile: (path: string) => Promise<string>
  readonly chalk: ChalkInstance
}

/** Global output options */
export interface OutputOptions {
  readonly json: boolean
  readonly color: boolean
}

/**
 * Writes status lines to stderr and data to stdout, so piped output stays clean.
 */
export class OutputFormatter {
  private readonly chalk: ChalkInstance

  constructor(
    private readonly io: CliIO,
    private readonly options: OutputOptions,
  ) {
    this.chalk = options.color ? io.chalk : new Chalk({ level: 0 })
  }

  get isJson(): boolean {
    return this.options.json
  }

  /** Raw data line (tokens, patterns) */
  data(line: string): void {
    this.io.stdout(line)
  }

  json(value: unknown): void {
    this.io.stdout(JSON.stringify(value, null, 2))
  }

  success(msg: string): void {
    this.io.stderr(`${this.chalk.green('✓')} ${msg}`)
  }

  error(msg: string): void {
    this.io.stderr(`${this.chalk.red('✗')} ${msg}`)
  }

  warn(msg: string): void {
    this.io.stderr(`${this.chalk.yellow('⚠')} ${msg}`)
  }

  dim(msg: string): void {
    this.io.stderr(this.chalk.dim(msg))
  }
}
