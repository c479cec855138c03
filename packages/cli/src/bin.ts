#!/usr/bin/env node
// @scantoken/cli — Executable entry point

import { readFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import chalk from 'chalk'
import { run } from './cli.js'

const exitCode = await run(process.argv.slice(2), {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  readStdin: () => text(process.stdin),
  readFile: (path) => readFile(path, 'utf8'),
  chalk,
})

process.exitCode = exitCode
