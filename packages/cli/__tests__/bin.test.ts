import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { execFile } from 'node:child_process'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { build } from 'tsup'
import { TOKEN_PATTERN } from '@scantoken/core'
import { binConfig } from '../tsup.config.js'

const SAMPLE_TOKEN = `asf_sample_${'0'.repeat(27)}2MvMGi`
const BAD_CHECKSUM_TOKEN = `asf_sample_${'0'.repeat(27)}2MvMGj`

interface BinResult {
  readonly code: number
  readonly stdout: string
  readonly stderr: string
}

describe('scantoken executable', () => {
  // Inside the package so the bundle resolves its npm dependencies
  const cliRoot = fileURLToPath(new URL('..', import.meta.url))
  let outDir: string
  let binPath: string

  function runBin(args: readonly string[]): Promise<BinResult> {
    return new Promise((resolve) => {
      execFile(
        process.execPath,
        [binPath, ...args],
        { env: { ...process.env, FORCE_COLOR: '0' } },
        (error, stdout, stderr) => {
          const code = error === null ? 0 : typeof error.code === 'number' ? error.code : 1
          resolve({ code, stdout, stderr })
        },
      )
    })
  }

  beforeAll(async () => {
    outDir = await mkdtemp(join(cliRoot, '.bin-test-'))
    await build({ ...binConfig, outDir, clean: false, silent: true, config: false })
    binPath = join(outDir, 'bin.js')
  }, 60_000)

  afterAll(async () => {
    await rm(outDir, { recursive: true, force: true })
  })

  it('should keep the shebang', async () => {
    const source = await readFile(binPath, 'utf8')
    expect(source.startsWith('#!/usr/bin/env node\n')).toBe(true)
  })

  it('should run under plain node', async () => {
    expect(await runBin(['pattern'])).toEqual({ code: 0, stdout: `${TOKEN_PATTERN}\n`, stderr: '' })
  })

  it('should exit 0 for a valid token', async () => {
    expect(await runBin(['validate', SAMPLE_TOKEN])).toEqual({
      code: 0,
      stdout: '',
      stderr: '✓ Valid token for component sample\nRegistry not checked (no --registry given)\n',
    })
  })

  it('should exit 1 for a checksum mismatch', async () => {
    expect(await runBin(['validate', BAD_CHECKSUM_TOKEN])).toEqual({
      code: 1,
      stdout: '',
      stderr: '✗ Token checksum does not match its entropy: expected 2MvMGi, found 2MvMGj\n',
    })
  })
})
