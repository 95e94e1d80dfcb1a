import type { LogMessage, StepResult, StepStatus } from 'shared'
import { formatStepMarker } from './markers.js'

export interface ModuleLogState {
  warnings: number
  errors: number
  messages: LogMessage[]
}

/**
 * Logging handle bound to one module. Warnings and errors are counted
 * against the module; the other levels only print.
 */
export interface ModuleLog {
  readonly module: string
  status(message: string): void
  info(message: string): void
  debug(message: string): void
  warning(message: string): void
  error(message: string): void
}

export interface StepTrackerOptions {
  /** Line sink, stdout by default */
  write?: (line: string) => void
}

export function finalStatus(state: Pick<ModuleLogState, 'warnings' | 'errors'>): StepStatus {
  if (state.errors > 0) return 'error'
  if (state.warnings > 0) return 'warning'
  return 'success'
}

/**
 * Per-run table of module counters. One tracker is created per pipeline
 * invocation and passed to every step.
 */
export class StepTracker {
  private readonly states = new Map<string, ModuleLogState>()
  private readonly finalized: StepResult[] = []
  private readonly write: (line: string) => void

  constructor(options: StepTrackerOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line))
  }

  /** Reset the counters of a module and return its log handle. */
  begin(module: string): ModuleLog {
    this.states.set(module, { warnings: 0, errors: 0, messages: [] })
    return this.log(module)
  }

  /** Log handle for a module without resetting it. */
  log(module: string): ModuleLog {
    return {
      module,
      status: (message) => this.write(message),
      info: (message) => this.write(`INFO: ${message}`),
      debug: (message) => this.write(`debug: ${message}`),
      warning: (message) => this.record(module, 'warning', message),
      error: (message) => this.record(module, 'error', message),
    }
  }

  state(module: string): ModuleLogState {
    const state = this.states.get(module)
    if (!state) return { warnings: 0, errors: 0, messages: [] }
    return { warnings: state.warnings, errors: state.errors, messages: [...state.messages] }
  }

  /**
   * Compute the step's terminal status from its module counters, print the
   * step marker and remember the result for the run summary.
   */
  finalize<T>(step: string, module: string, data?: T): StepResult<T> {
    const { warnings, errors } = this.state(module)
    const status = finalStatus({ warnings, errors })
    this.write(formatStepMarker(step, status, warnings, errors))

    const result: StepResult<T> = { step, module, status, warnings, errors }
    if (data !== undefined) result.data = data
    this.finalized.push(result)
    return result
  }

  get results(): readonly StepResult[] {
    return this.finalized
  }

  get hasErrors(): boolean {
    return this.finalized.some(r => r.status === 'error')
  }

  get hasWarnings(): boolean {
    return this.finalized.some(r => r.status === 'warning')
  }

  private record(module: string, severity: LogMessage['severity'], text: string): void {
    let state = this.states.get(module)
    if (!state) {
      state = { warnings: 0, errors: 0, messages: [] }
      this.states.set(module, state)
    }
    if (severity === 'warning') {
      state.warnings++
      this.write(`WARNING: ${module} - ${text}`)
    } else {
      state.errors++
      this.write(`ERROR: ${module} - ${text}`)
    }
    state.messages.push({ severity, text })
  }
}
