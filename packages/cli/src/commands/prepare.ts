import type { OperationMode, Result } from 'shared'
import { DEFAULT_CORES, runPipeline, type PipelineReport } from '../lib/pipeline.js'
import { StepTracker } from '../lib/step-tracker.js'

export interface PrepareOptions {
  compileOrder: string
  mode?: string
  output?: string
  cores?: string
  json?: boolean
  /** Line sink for step output, stdout by default */
  write?: (line: string) => void
}

const MODES: readonly OperationMode[] = ['open', 'build', 'export']

function parseMode(mode: string | undefined): OperationMode | undefined {
  const requested = (mode ?? 'build').trim().toLowerCase()
  return MODES.find(m => m === requested)
}

function parseCores(cores: string | undefined): number | undefined {
  if (cores === undefined) return DEFAULT_CORES
  const parsed = Number(cores)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined
}

export async function prepareCommand(configPath: string, options: PrepareOptions): Promise<Result<PipelineReport, string>> {
  const mode = parseMode(options.mode)
  if (!mode) {
    return { ok: false, error: `Unknown mode '${options.mode}', expected one of: ${MODES.join(', ')}` }
  }
  const cores = parseCores(options.cores)
  if (cores === undefined) {
    return { ok: false, error: `--cores must be a positive integer, got '${options.cores}'` }
  }

  const tracker = new StepTracker({ write: options.write })
  const report = await runPipeline(
    {
      configPath,
      compileOrderPath: options.compileOrder,
      mode,
      cores,
      ...(options.output !== undefined ? { outputDir: options.output } : {}),
    },
    tracker
  )

  if (options.json) {
    console.log(JSON.stringify({ passed: report.passed, steps: report.steps, outputDir: report.outputDir }, null, 2))
  } else {
    const warnings = report.steps.reduce((sum, s) => sum + s.warnings, 0)
    const errors = report.steps.reduce((sum, s) => sum + s.errors, 0)
    console.error(`\nPreparation ${report.passed ? '✅ PASSED' : '❌ FAILED'} (${report.steps.length} step(s), ${warnings} warning(s), ${errors} error(s))\n`)
  }

  return { ok: true, value: report }
}
