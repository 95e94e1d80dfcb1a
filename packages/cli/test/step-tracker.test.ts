import { describe, it, expect } from 'vitest'
import { StepTracker, finalStatus } from '../src/lib/step-tracker.js'

function capture() {
  const lines: string[] = []
  const tracker = new StepTracker({ write: (line) => lines.push(line) })
  return { lines, tracker }
}

describe('finalStatus', () => {
  it('lets errors win over warnings', () => {
    expect(finalStatus({ warnings: 0, errors: 0 })).toBe('success')
    expect(finalStatus({ warnings: 2, errors: 0 })).toBe('warning')
    expect(finalStatus({ warnings: 2, errors: 1 })).toBe('error')
  })
})

describe('StepTracker', () => {
  it('prints log lines in their formats', () => {
    const { lines, tracker } = capture()
    const log = tracker.begin('constraints')
    log.status('Handling constraints...')
    log.info('Adding XDC file')
    log.debug('lookup built')
    log.warning('File not found: pins.xdc')
    log.error('Block design missing')
    expect(lines).toEqual([
      'Handling constraints...',
      'INFO: Adding XDC file',
      'debug: lookup built',
      'WARNING: constraints - File not found: pins.xdc',
      'ERROR: constraints - Block design missing',
    ])
  })

  it('finalizes a clean step as success', () => {
    const { lines, tracker } = capture()
    tracker.begin('config')
    const result = tracker.finalize('config::resolve', 'config')
    expect(result).toEqual({ step: 'config::resolve', module: 'config', status: 'success', warnings: 0, errors: 0 })
    expect(lines).toEqual(['[HDLPREP_STEP_SUCCESS] config::resolve'])
  })

  it('carries both counts into an error marker', () => {
    const { lines, tracker } = capture()
    const log = tracker.begin('ip_cores')
    log.warning('a')
    log.warning('b')
    log.warning('c')
    log.error('d')
    const result = tracker.finalize('ip_cores::restructure', 'ip_cores', { descriptors: 2 })
    expect(result.status).toBe('error')
    expect(result.data).toEqual({ descriptors: 2 })
    expect(lines[lines.length - 1]).toBe('[HDLPREP_STEP_ERROR] ip_cores::restructure [E:1 W:3]')
    expect(tracker.hasErrors).toBe(true)
  })

  it('finalizes warnings without errors as warning', () => {
    const { lines, tracker } = capture()
    const log = tracker.begin('constraints')
    log.warning('a')
    log.warning('b')
    expect(tracker.finalize('constraints::plan', 'constraints').status).toBe('warning')
    expect(lines[lines.length - 1]).toBe('[HDLPREP_STEP_WARNING] constraints::plan [W:2]')
  })

  it('resets counters on begin', () => {
    const { tracker } = capture()
    tracker.begin('generics').warning('first run')
    tracker.begin('generics')
    expect(tracker.state('generics')).toEqual({ warnings: 0, errors: 0, messages: [] })
  })

  it('records messages per module', () => {
    const { tracker } = capture()
    tracker.begin('a').warning('one')
    tracker.begin('b').error('two')
    expect(tracker.state('a').messages).toEqual([{ severity: 'warning', text: 'one' }])
    expect(tracker.state('b').messages).toEqual([{ severity: 'error', text: 'two' }])
  })

  it('tracks run flags across steps', () => {
    const { tracker } = capture()
    tracker.begin('a').warning('w')
    tracker.finalize('a::step', 'a')
    tracker.begin('b')
    tracker.finalize('b::step', 'b')
    expect(tracker.hasWarnings).toBe(true)
    expect(tracker.hasErrors).toBe(false)
    expect(tracker.results.map(r => r.status)).toEqual(['warning', 'success'])
  })
})
