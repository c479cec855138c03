// @scantoken/cli — Leak scanning command

import type { Command } from 'commander'
import type { Finding, RejectedCandidate } from '@scantoken/runtime'
import type { CommandContext } from '../lib/context.js'
import { openScantoken } from '../lib/context.js'

const STDIN_SOURCE = '-'

interface SourceReport {
  readonly source: string
  readonly findings: readonly Finding[]
  readonly rejected: readonly RejectedCandidate[]
}

/**
 * A finding is a leak unless the registry positively says its component is unallocated.
 * Unreachable registries fail closed.
 */
function isLeak(finding: Finding): boolean {
  return finding.registry !== 'unallocated'
}

function sourceLabel(source: string): string {
  return source === STDIN_SOURCE ? '<stdin>' : source
}

export function registerScanCommand(program: Command, context: CommandContext): void {
  program
    .command('scan')
    .description('Scan files or stdin for leaked tokens')
    .argument('[files...]', 'files to scan (default: stdin)')
    .option('-r, --registry <file>', 'component allocation file (JSON) for the registry tier')
    .option('--show-rejected', 'also list matches whose checksum does not verify')
    .action(async (files: string[], options: { registry?: string; showRejected?: boolean }) => {
      const output = context.output()
      const scantoken = await openScantoken(options.registry)
      const sources = files.length > 0 ? files : [STDIN_SOURCE]

      const reports: SourceReport[] = []
      for (const source of sources) {
        const text =
          source === STDIN_SOURCE ? await context.io.readStdin() : await context.io.readFile(source)
        const report = await scantoken.scan(text)
        reports.push({ source: sourceLabel(source), ...report })
      }

      const leaks = reports.reduce((n, r) => n + r.findings.filter(isLeak).length, 0)
      if (leaks > 0) context.fail()

      if (output.isJson) {
        output.json({
          leaks,
          sources: reports.map((r) => ({
            source: r.source,
            findings: r.findings.map((f) => ({
              line: f.line,
              column: f.column,
              component: f.token.component,
              redacted: f.redacted,
              fingerprint: f.fingerprint,
              registry: f.registry,
            })),
            rejected: r.rejected,
          })),
        })
        return
      }

      for (const report of reports) {
        for (const finding of report.findings) {
          const where = `${report.source}:${String(finding.line)}:${String(finding.column)}`
          if (!isLeak(finding)) {
            output.warn(`${where}: ${finding.redacted} has unallocated component ${finding.token.component}`)
            continue
          }
          output.data(
            `${where}: ${finding.redacted} component=${finding.token.component} ` +
              `registry=${finding.registry} fingerprint=${finding.fingerprint}`,
          )
        }
        if (options.showRejected === true) {
          for (const candidate of report.rejected) {
            output.dim(
              `${report.source}:${String(candidate.line)}:${String(candidate.column)}: ` +
                `${candidate.redacted} checksum mismatch (expected ${candidate.expectedChecksum})`,
            )
          }
        }
      }

      if (leaks > 0) {
        output.error(`${String(leaks)} leaked token(s) found`)
      } else {
        output.success('No leaked tokens found')
      }
    })
}
