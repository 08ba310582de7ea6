/**
 * Text rendering for CLI output. Pure: every function returns the string
 * the command prints.
 */

import type { ClusterSnapshotHash, InstallationReport } from '@sysindex/kernel'
import type { InstallEvent, InstallOperation } from '@sysindex/runtime-host'
import { resultColor, t } from './theme.js'

const mark = (present: boolean): string => (present ? t.green('●') : t.dim('○'))

/** Left-justify `label` to 12 columns. */
const label = (text: string): string => t.muted(text.padEnd(12))

export function renderStatus(report: InstallationReport, hash: ClusterSnapshotHash): string {
  let out = '\n'
  out += '  ' + label('state') + t.text(`v${report.state_version}`) + '  ' + t.dim('hash: ') + t.blueDim(hash.slice(0, 12)) + '\n'
  out += '  ' + label('index') + mark(report.primary_present) + ' ' + t.white(report.primary_index) + '\n'

  const installed = report.installed_template_version
  const versionNote =
    installed === null ? t.dim('  not installed')
    : report.template_present ? t.dim(`  v${installed}`)
    : t.amber(`  v${installed} outdated`)
  out += '  ' + label('template') + mark(report.template_present) + ' ' + t.white(report.template) + versionNote + '\n'

  if (report.outdated_primary_indices.length > 0) {
    out += '\n  ' + t.muted('outdated indices') + '\n'
    for (const name of report.outdated_primary_indices) {
      out += '    ' + t.amber(name) + '\n'
    }
  }
  return out
}

const OPERATION_LABELS: Record<InstallOperation, string> = {
  primary:  'primary index',
  template: 'notifications template',
  both:     'primary index and notifications template',
}

export function renderInstallResult(
  operation: InstallOperation,
  error: Error | null,
  report: InstallationReport,
): string {
  if (error !== null) {
    return t.red(`✗ install ${OPERATION_LABELS[operation]} failed: ${error.message}`)
  }
  return t.green(`✓ ${OPERATION_LABELS[operation]} installed`) + t.dim(`  (state v${report.state_version})`)
}

export function renderLogEvents(events: ReadonlyArray<InstallEvent>): string {
  if (events.length === 0) {
    return t.muted('  (no install events)')
  }
  return events
    .map((e) => {
      const line =
        '  ' + t.dim(e.timestamp) + '  ' + t.text(e.operation.padEnd(8)) + ' ' +
        resultColor(e.result)(e.result.padEnd(6)) + ' ' + t.dim(`v${e.state_version}`)
      return e.error === null ? line : line + '  ' + t.red(e.error)
    })
    .join('\n')
}
