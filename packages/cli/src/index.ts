// @scantoken/cli — Public API

export { createProgram, run, VERSION } from './cli.js'
export type { CliIO, OutputOptions } from './lib/output.js'
export { OutputFormatter } from './lib/output.js'
