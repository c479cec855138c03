// @scantoken/cli — Shared command context

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import { createScantoken, loadRegistryFile } from '@scantoken/runtime'
import type { ScantokenInstance } from '@scantoken/runtime'
import type { CliIO } from './output.js'
import { OutputFormatter } from './output.js'

/** Handed to every command registration */
export interface CommandContext {
  readonly io: CliIO
  /** Formatter for the global `--json` / `--no-color` options */
  output(): OutputFormatter
  /** Marks the run as failed (exit code 1) */
  fail(): void
}

export function createCommandContext(program: Command, io: CliIO, fail: () => void): CommandContext {
  return {
    io,
    output() {
      const opts = program.opts<{ json?: boolean; color?: boolean }>()
      return new OutputFormatter(io, { json: opts.json ?? false, color: opts.color ?? true })
    },
    fail,
  }
}

/**
 * Builds an instance for the command, with the registry tier on when a file is given.
 */
export async function openScantoken(registryPath: string | undefined): Promise<ScantokenInstance> {
  if (registryPath === undefined) {
    return createScantoken()
  }
  return createScantoken({ registry: await loadRegistryFile(registryPath) })
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}
