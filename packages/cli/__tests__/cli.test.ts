import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Chalk } from 'chalk'
import { TOKEN_PATTERN, verifyToken } from '@scantoken/core'
import { fingerprintToken } from '@scantoken/runtime'
import { run, VERSION } from '../src/cli.js'
import type { CliIO } from '../src/lib/output.js'

const ZERO_ENTROPY = '0'.repeat(27)
const SAMPLE_TOKEN = `asf_sample_${ZERO_ENTROPY}2MvMGi`
const INFRA_TOKEN = `asf_infra_${ZERO_ENTROPY}2MvMGi`
const BAD_CHECKSUM_TOKEN = `asf_sample_${ZERO_ENTROPY}2MvMGj`

interface Harness {
  readonly io: CliIO
  readonly stdout: string[]
  readonly stderr: string[]
}

function createHarness(options: { files?: Record<string, string>; stdin?: string } = {}): Harness {
  const stdout: string[] = []
  const stderr: string[] = []
  const files = new Map(Object.entries(options.files ?? {}))
  const io: CliIO = {
    stdout: (line) => {
      stdout.push(line)
    },
    stderr: (line) => {
      stderr.push(line)
    },
    readStdin: () => Promise.resolve(options.stdin ?? ''),
    readFile: (path) => {
      const content = files.get(path)
      return content === undefined
        ? Promise.reject(new Error(`ENOENT: ${path}`))
        : Promise.resolve(content)
    },
    chalk: new Chalk({ level: 0 }),
  }
  return { io, stdout, stderr }
}

describe('scantoken CLI', () => {
  let dir: string
  let registryPath: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scantoken-cli-'))
    registryPath = join(dir, 'components.json')
    await writeFile(registryPath, JSON.stringify({ components: ['sample'] }))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('program', () => {
    it('should print the version', async () => {
      const h = createHarness()
      expect(await run(['--version'], h.io)).toBe(0)
      expect(h.stdout).toEqual([VERSION])
    })

    it('should report a failing action with exit code 1', async () => {
      const broken = join(dir, 'broken.json')
      await writeFile(broken, '{')
      const h = createHarness()

      expect(await run(['validate', SAMPLE_TOKEN, '-r', broken], h.io)).toBe(1)
      expect(h.stderr).toEqual([`✗ Registry file ${broken} is not valid JSON`])
    })
  })

  describe('pattern', () => {
    it('should print the detection pattern', async () => {
      const h = createHarness()
      expect(await run(['pattern'], h.io)).toBe(0)
      expect(h.stdout).toEqual([TOKEN_PATTERN])
    })

    it('should print JSON with --json', async () => {
      const h = createHarness()
      expect(await run(['--json', 'pattern'], h.io)).toBe(0)
      expect(JSON.parse(h.stdout.join('\n'))).toEqual({ pattern: TOKEN_PATTERN })
    })
  })

  describe('generate', () => {
    it('should print the requested number of valid tokens', async () => {
      const h = createHarness()
      expect(await run(['generate', 'sample', '-r', registryPath, '-n', '3'], h.io)).toBe(0)

      expect(h.stdout).toHaveLength(3)
      expect(new Set(h.stdout).size).toBe(3)
      for (const token of h.stdout) {
        const result = verifyToken(token)
        expect(result.valid).toBe(true)
        expect(token.startsWith('asf_sample_')).toBe(true)
      }
    })

    it('should refuse an unallocated component', async () => {
      const h = createHarness()
      expect(await run(['generate', 'other', '-r', registryPath], h.io)).toBe(1)
      expect(h.stdout).toEqual([])
      expect(h.stderr).toEqual(['✗ Component is not allocated in the registry'])
    })

    it('should refuse a malformed component', async () => {
      const h = createHarness()
      expect(await run(['--json', 'generate', 'AB', '-r', registryPath], h.io)).toBe(1)
      expect(JSON.parse(h.stdout.join('\n'))).toEqual({
        success: false,
        reason: 'invalid_component_format',
        message: 'Component must be 3-6 lowercase ASCII letters',
      })
    })

    it('should require a registry file', async () => {
      const h = createHarness()
      expect(await run(['generate', 'sample'], h.io)).toBe(1)
      expect(h.stderr).toEqual(["error: required option '-r, --registry <file>' not specified"])
    })

    it('should reject a non-positive count', async () => {
      const h = createHarness()
      expect(await run(['generate', 'sample', '-r', registryPath, '-n', '0'], h.io)).toBe(1)
      expect(h.stderr).toEqual([
        "error: option '-n, --count <n>' argument '0' is invalid. Expected a positive integer.",
      ])
    })
  })

  describe('validate', () => {
    it('should accept a valid token offline', async () => {
      const h = createHarness()
      expect(await run(['validate', SAMPLE_TOKEN], h.io)).toBe(0)
      expect(h.stderr).toEqual([
        '✓ Valid token for component sample',
        'Registry not checked (no --registry given)',
      ])
    })

    it('should report a checksum mismatch', async () => {
      const h = createHarness()
      expect(await run(['validate', BAD_CHECKSUM_TOKEN], h.io)).toBe(1)
      expect(h.stderr).toEqual([
        '✗ Token checksum does not match its entropy: expected 2MvMGi, found 2MvMGj',
      ])
    })

    it('should apply the registry tier when a registry is given', async () => {
      const h = createHarness()
      expect(await run(['validate', INFRA_TOKEN, '-r', registryPath], h.io)).toBe(1)
      expect(h.stderr).toEqual(['✗ Component is not allocated in the registry: infra'])
    })

    it('should read the token from stdin with -', async () => {
      const h = createHarness({ stdin: `${SAMPLE_TOKEN}\n` })
      expect(await run(['validate', '-', '-r', registryPath], h.io)).toBe(0)
      expect(h.stderr).toEqual(['✓ Valid token for component sample'])
    })

    it('should describe malformed tokens in JSON', async () => {
      const h = createHarness()
      expect(await run(['--json', 'validate', 'asf_sample_123'], h.io)).toBe(1)
      expect(JSON.parse(h.stdout.join('\n'))).toEqual({
        valid: false,
        reason: 'malformed_token',
        message:
          'Token does not match asf_<component>_<entropy><checksum>: input ended at offset 14 while reading entropy',
      })
    })
  })

  describe('scan', () => {
    it('should report leaked tokens with their position', async () => {
      const h = createHarness({ files: { 'app.log': `line one\nkey=${SAMPLE_TOKEN}\n` } })
      expect(await run(['scan', 'app.log'], h.io)).toBe(1)
      expect(h.stdout).toEqual([
        `app.log:2:5: asf_sample_0000… component=sample registry=unchecked fingerprint=${fingerprintToken(SAMPLE_TOKEN)}`,
      ])
      expect(h.stderr).toEqual(['✗ 1 leaked token(s) found'])
    })

    it('should pass clean input from stdin', async () => {
      const h = createHarness({ stdin: 'nothing to see here asf_ but no token\n' })
      expect(await run(['scan'], h.io)).toBe(0)
      expect(h.stdout).toEqual([])
      expect(h.stderr).toEqual(['✓ No leaked tokens found'])
    })

    it('should warn about unallocated components without failing on them', async () => {
      const h = createHarness({ stdin: `${INFRA_TOKEN} ${SAMPLE_TOKEN}` })
      expect(await run(['scan', '-r', registryPath], h.io)).toBe(1)
      expect(h.stdout).toEqual([
        `<stdin>:1:45: asf_sample_0000… component=sample registry=allocated fingerprint=${fingerprintToken(SAMPLE_TOKEN)}`,
      ])
      expect(h.stderr).toEqual([
        '⚠ <stdin>:1:1: asf_infra_0000… has unallocated component infra',
        '✗ 1 leaked token(s) found',
      ])
    })

    it('should list checksum near-misses with --show-rejected', async () => {
      const h = createHarness({ stdin: `x ${BAD_CHECKSUM_TOKEN}` })
      expect(await run(['scan', '--show-rejected'], h.io)).toBe(0)
      expect(h.stderr).toEqual([
        '<stdin>:1:3: asf_sample_0000… checksum mismatch (expected 2MvMGi)',
        '✓ No leaked tokens found',
      ])
    })

    it('should emit a JSON report', async () => {
      const h = createHarness({ files: { 'a.txt': SAMPLE_TOKEN, 'b.txt': 'clean' } })
      expect(await run(['--json', 'scan', 'a.txt', 'b.txt'], h.io)).toBe(1)
      expect(JSON.parse(h.stdout.join('\n'))).toEqual({
        leaks: 1,
        sources: [
          {
            source: 'a.txt',
            findings: [
              {
                line: 1,
                column: 1,
                component: 'sample',
                redacted: 'asf_sample_0000…',
                fingerprint: fingerprintToken(SAMPLE_TOKEN),
                registry: 'unchecked',
              },
            ],
            rejected: [],
          },
          { source: 'b.txt', findings: [], rejected: [] },
        ],
      })
    })

    it('should fail on an unreadable file', async () => {
      const h = createHarness()
      expect(await run(['scan', 'missing.log'], h.io)).toBe(1)
      expect(h.stderr).toEqual(['✗ ENOENT: missing.log'])
    })
  })
})
