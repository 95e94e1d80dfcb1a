import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { Result, StepStatus } from 'shared'
import { parseMarkerLine } from '../lib/markers.js'

export interface StatusOptions {
  json?: boolean
}

export interface StepSummary {
  step: string
  status: StepStatus
  warnings: number
  errors: number
  message?: string
}

export interface StatusSummary {
  project?: string
  artefacts?: string
  steps: StepSummary[]
  timing?: { passed: boolean; report: string }
  passed: boolean
}

/** Fold the marker lines of a captured log into one run summary. */
export function summarizeLog(text: string): StatusSummary {
  const summary: StatusSummary = { steps: [], passed: true }

  for (const line of text.split(/\r?\n/)) {
    const marker = parseMarkerLine(line)
    if (!marker) continue
    switch (marker.kind) {
      case 'step':
        summary.steps.push({
          step: marker.step,
          status: marker.status,
          warnings: marker.warnings,
          errors: marker.errors,
          ...(marker.message !== undefined ? { message: marker.message } : {}),
        })
        break
      case 'project-context':
        summary.project = marker.name
        break
      case 'build-artefacts':
        summary.artefacts = marker.path
        break
      case 'timing':
        summary.timing = { passed: marker.passed, report: marker.report }
        break
    }
  }

  summary.passed = !summary.steps.some(s => s.status === 'error') && summary.timing?.passed !== false
  return summary
}

const ICONS: Record<StepStatus, string> = { success: '✓', warning: '⚠', error: '✗' }

export async function statusCommand(logPath: string, options: StatusOptions = {}): Promise<Result<StatusSummary, string>> {
  const path = resolve(logPath)
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch {
    return { ok: false, error: `Cannot read log file: ${path}` }
  }

  const summary = summarizeLog(text)

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2))
  } else {
    console.error(`\nProject: ${summary.project ?? 'unknown'}`)
    for (const step of summary.steps) {
      const counts = step.status === 'success' ? '' : ` (W:${step.warnings} E:${step.errors})`
      console.error(`  ${ICONS[step.status]} ${step.step}${counts}`)
    }
    if (summary.steps.length === 0) {
      console.error('  No step markers found.')
    }
    if (summary.timing) {
      console.error(`  Timing: ${summary.timing.passed ? 'PASSED' : 'FAILED'} (${summary.timing.report})`)
    }
    if (summary.artefacts) {
      console.error(`  Artefacts: ${summary.artefacts}`)
    }
    console.error(`\nStatus: ${summary.passed ? '✅ PASSED' : '❌ FAILED'}\n`)
  }

  return { ok: true, value: summary }
}
