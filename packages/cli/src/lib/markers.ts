import type { StepStatus } from 'shared'

export const STEP_SUCCESS_PREFIX = '[HDLPREP_STEP_SUCCESS]'
export const STEP_WARNING_PREFIX = '[HDLPREP_STEP_WARNING]'
export const STEP_ERROR_PREFIX = '[HDLPREP_STEP_ERROR]'
export const PROJECT_CONTEXT_PREFIX = '[HDLPREP_PROJECT_CONTEXT]'
export const BUILD_ARTEFACTS_PREFIX = '[HDLPREP_BUILD_ARTEFACTS]'
export const TIMING_RESULT_PREFIX = '[HDLPREP_TIMING_RESULT]'

export type ParsedMarker =
  | { kind: 'step'; status: StepStatus; step: string; warnings: number; errors: number; message?: string }
  | { kind: 'project-context'; name: string }
  | { kind: 'build-artefacts'; path: string }
  | { kind: 'timing'; passed: boolean; report: string }

/**
 * Format the terminal marker for a step. Warning markers lead with the
 * warning count and error markers with the error count; the other count is
 * only appended when non-zero.
 */
export function formatStepMarker(
  step: string,
  status: StepStatus,
  warnings: number,
  errors: number,
  message?: string
): string {
  const suffix = message ? ` - ${message}` : ''
  switch (status) {
    case 'success':
      return `${STEP_SUCCESS_PREFIX} ${step}${suffix}`
    case 'warning': {
      const counts = errors > 0 ? `W:${warnings} E:${errors}` : `W:${warnings}`
      return `${STEP_WARNING_PREFIX} ${step} [${counts}]${suffix}`
    }
    case 'error': {
      const counts = warnings > 0 ? `E:${errors} W:${warnings}` : `E:${errors}`
      return `${STEP_ERROR_PREFIX} ${step} [${counts}]${suffix}`
    }
  }
}

export function formatProjectContext(name: string): string {
  return `${PROJECT_CONTEXT_PREFIX} name=${name}`
}

export function formatBuildArtefacts(path: string): string {
  return `${BUILD_ARTEFACTS_PREFIX} ${path}`
}

export function formatTimingResult(passed: boolean, reportPath: string): string {
  return `${TIMING_RESULT_PREFIX} status=${passed ? 'PASSED' : 'FAILED'} report=${reportPath}`
}

const STEP_PATTERN = /^\[HDLPREP_STEP_(SUCCESS|WARNING|ERROR)\]\s+(\S+)(?:\s+\[([^\]]*)\])?(?:\s+-\s+(.*))?$/
const COUNT_PATTERN = /([WE]):(\d+)/g

function parseCounts(text: string | undefined): { warnings: number; errors: number } {
  let warnings = 0
  let errors = 0
  for (const match of (text ?? '').matchAll(COUNT_PATTERN)) {
    if (match[1] === 'W') warnings = parseInt(match[2], 10)
    else errors = parseInt(match[2], 10)
  }
  return { warnings, errors }
}

/**
 * Parse one output line. Returns null for anything that is not a marker.
 */
export function parseMarkerLine(line: string): ParsedMarker | null {
  const trimmed = line.trim()

  const step = trimmed.match(STEP_PATTERN)
  if (step) {
    const status: StepStatus = step[1] === 'SUCCESS' ? 'success' : step[1] === 'WARNING' ? 'warning' : 'error'
    return {
      kind: 'step',
      status,
      step: step[2],
      ...parseCounts(step[3]),
      ...(step[4] !== undefined ? { message: step[4] } : {}),
    }
  }

  if (trimmed.startsWith(`${PROJECT_CONTEXT_PREFIX} name=`)) {
    return { kind: 'project-context', name: trimmed.slice(PROJECT_CONTEXT_PREFIX.length + ' name='.length) }
  }

  if (trimmed.startsWith(`${BUILD_ARTEFACTS_PREFIX} `)) {
    return { kind: 'build-artefacts', path: trimmed.slice(BUILD_ARTEFACTS_PREFIX.length + 1) }
  }

  const timing = trimmed.match(/^\[HDLPREP_TIMING_RESULT\]\s+status=(PASSED|FAILED)\s+report=(.*)$/)
  if (timing) {
    return { kind: 'timing', passed: timing[1] === 'PASSED', report: timing[2] }
  }

  return null
}
