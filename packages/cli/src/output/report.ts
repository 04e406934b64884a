import {
  renderInstruction,
  type BuildError,
  type BuildOutcome,
  type LayerKey,
  type PlanStep,
  type VerificationReport,
} from '@slipway/kernel'
import type { BuildSummary, LoggedBuildEvent } from '@slipway/runtime-host'
import { eventColor, t, type Theme } from './theme.js'

/**
 * Pure formatters for CLI output. Every function returns the text to print;
 * commands decide where it goes.
 */

const STATE_W = 23
const KEY_W   = 12

const pad = (s: string, width: number): string => s + ' '.repeat(Math.max(1, width - s.length))

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** `[slipway <cmd>] <kind>: <message>`, then the step and the native diagnostic. */
export function formatBuildError(command: string, error: BuildError, theme: Theme = t): string {
  const lines = [theme.red(`[slipway ${command}] ${error.kind}: ${error.message}`)]
  if (error.state !== null) lines.push('  ' + theme.muted('step: ') + error.state)
  for (const line of error.detail.split('\n')) {
    if (line.trim() !== '') lines.push('  ' + theme.dim(line))
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// plan
// ---------------------------------------------------------------------------

export interface PlanRow {
  readonly step: PlanStep
  readonly key: LayerKey
  readonly cached: boolean
}

export function formatPlan(rows: ReadonlyArray<PlanRow>, theme: Theme = t): string {
  let out = ''
  for (const [i, row] of rows.entries()) {
    const status = row.cached ? theme.green('cached') : theme.amber('build')
    out += `${String(i + 1).padStart(2)}  ${theme.white(pad(row.step.state, STATE_W))}` +
      `${theme.muted(row.key.slice(0, KEY_W))}  ${status}\n`
    for (const instruction of row.step.instructions) {
      for (const line of renderInstruction(instruction).split('\n')) {
        out += '      ' + theme.dim(line) + '\n'
      }
    }
  }
  const cached = rows.filter((r) => r.cached).length
  out += `\n${cached} of ${rows.length} steps cached\n`
  return out
}

// ---------------------------------------------------------------------------
// build
// ---------------------------------------------------------------------------

export function formatOutcome(outcome: BuildOutcome, theme: Theme = t): string {
  const cached = outcome.steps.filter((s) => s.cached).length
  const built = outcome.steps.length - cached
  if (!outcome.ok) {
    return theme.red(`build ${outcome.buildId} failed`) +
      theme.muted(` (${cached} cached, ${built} built before the failure)`) + '\n'
  }
  return theme.green(`tagged ${outcome.tag}`) +
    theme.muted(` (${outcome.layer.id}, ${cached} cached, ${built} built)`) + '\n'
}

// ---------------------------------------------------------------------------
// verify
// ---------------------------------------------------------------------------

export function formatVerification(tag: string, report: VerificationReport, theme: Theme = t): string {
  let out = ''
  for (const check of report.checks) {
    const mark = check.passed ? theme.green('✓') : theme.red('✗')
    out += `  ${mark} ${pad(check.id, 21)}${theme.muted(check.detail)}\n`
  }
  const failed = report.checks.filter((c) => !c.passed).length
  out += report.passed
    ? theme.green(`\n${tag} passed all ${report.checks.length} checks`) + '\n'
    : theme.red(`\n${tag} failed ${failed} of ${report.checks.length} checks`) + '\n'
  return out
}

// ---------------------------------------------------------------------------
// log and status
// ---------------------------------------------------------------------------

export function formatEvent(event: LoggedBuildEvent, theme: Theme = t): string {
  const color = eventColor(theme, event.event_type)
  return `${theme.muted(event.timestamp)}  ${theme.dim(event.build_id.slice(0, 8))}  ` +
    `${color(pad(event.event_type, 16))}${pad(event.state ?? '-', STATE_W)}${event.detail}`
}

export function formatSummary(summary: BuildSummary, theme: Theme = t): string {
  const status =
    summary.status === 'succeeded' ? theme.green(pad('succeeded', 11)) :
    summary.status === 'failed'    ? theme.red(pad('failed', 11)) :
                                     theme.amber(pad('incomplete', 11))
  const counts = theme.muted(`${summary.cachedSteps} cached, ${summary.appliedSteps} built`)
  const error = summary.error === '' ? '' : '\n    ' + theme.red(summary.error)
  return `${theme.muted(summary.startedAt)}  ${status}${pad(summary.tag, 20)}${counts}${error}`
}

export interface StatusInfo {
  readonly home: string
  readonly engine: string
  readonly contextDir: string
  readonly projectDir: string
  readonly cachedLayers: number
  readonly lastBuild: BuildSummary | null
}

export function formatStatus(info: StatusInfo, theme: Theme = t): string {
  const label = (s: string): string => '  ' + theme.muted(pad(s, 16))
  let out = ''
  out += label('home') + info.home + '\n'
  out += label('engine') + info.engine + '\n'
  out += label('context') + info.contextDir + '\n'
  out += label('project state') + info.projectDir + '\n'
  out += label('cached layers') + theme.white(String(info.cachedLayers)) + '\n'
  out += label('last build') + (info.lastBuild === null ? theme.dim('none') : formatSummary(info.lastBuild, theme)) + '\n'
  return out
}
