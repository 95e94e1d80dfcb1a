import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import type { DeviceInfo, OperationMode, ProjectConfiguration, StepResult } from 'shared'
import { planBlockDesigns, type PlannedBlockDesign } from './block-designs.js'
import { loadCompileOrder } from './compile-order.js'
import { resolveConfig } from './config-resolver.js'
import { planConstraints, type PlannedConstraint } from './constraints.js'
import { restructureIpCores } from './dependency-resolver.js'
import { encodeAll } from './generic-encoder.js'
import { classifyManifest, type HdlSource } from './manifest-classifier.js'
import { formatBuildArtefacts, formatProjectContext } from './markers.js'
import type { StepTracker } from './step-tracker.js'

export const DEFAULT_CORES = 4
export const RESOLVED_CONFIG_FILE = 'resolved_config.json'
export const BUILD_PLAN_FILE = 'build_plan.json'

export interface PipelineOptions {
  configPath: string
  compileOrderPath: string
  mode: OperationMode
  /** Defaults to `<config dir>/.hdlprep/<mode>` */
  outputDir?: string
  cores?: number
  env?: Record<string, string | undefined>
  environmentSetup?: boolean
}

export interface BuildPlan {
  project_name: string
  display_name: string
  top_level: string
  device: DeviceInfo
  mode: OperationMode
  cores: number
  generics: string
  sources: {
    hdl: HdlSource[]
    ip_cores: string[]
    block_designs: PlannedBlockDesign[]
    constraints: PlannedConstraint[]
  }
  synth_options: Record<string, string>
  impl_options: Record<string, string>
}

export interface PipelineReport {
  passed: boolean
  hasWarnings: boolean
  steps: StepResult[]
  outputDir: string
  plan?: BuildPlan
}

export function defaultOutputDir(configPath: string, mode: OperationMode): string {
  return join(dirname(resolve(configPath)), '.hdlprep', mode)
}

/** `<PROJECT>_<BOARD>`, upper-cased, as shown to the operator. */
export function displayName(config: ProjectConfiguration): string {
  const info = config.project_information
  const board = info.device_info.board_name?.trim() || 'UNKNOWN'
  return `${info.project_name}_${board}`.toUpperCase()
}

/**
 * Run every preparation step for one project. The run stops after the
 * first step that finalizes with an error; warnings are carried to the
 * report but never stop it.
 */
export async function runPipeline(options: PipelineOptions, tracker: StepTracker): Promise<PipelineReport> {
  const outputDir = resolve(options.outputDir ?? defaultOutputDir(options.configPath, options.mode))
  const cores = options.cores ?? DEFAULT_CORES
  const report = (plan?: BuildPlan): PipelineReport => ({
    passed: !tracker.hasErrors,
    hasWarnings: tracker.hasWarnings,
    steps: [...tracker.results],
    outputDir,
    ...(plan ? { plan } : {}),
  })

  tracker.log('pipeline').status(`======= Preparing project (${options.mode}) =======`)

  // Configuration
  const configLog = tracker.begin('config')
  const resolved = await resolveConfig(options.configPath, configLog, {
    env: options.env,
    environmentSetup: options.environmentSetup,
  })
  if (!resolved.ok) configLog.error(resolved.error.message)
  if (tracker.finalize('config::resolve', 'config').status === 'error' || !resolved.ok) return report()
  const config = resolved.value.config

  // Compile order
  const orderLog = tracker.begin('compile_order')
  const entries = await loadCompileOrder(options.compileOrderPath, orderLog)
  if (!entries.ok) orderLog.error(entries.error.message)
  if (tracker.finalize('compile_order::load', 'compile_order').status === 'error' || !entries.ok) return report()

  // Source files
  const sourceLog = tracker.begin('source_files')
  const manifest = await classifyManifest(entries.value, sourceLog)
  if (tracker.finalize('source_files::classify', 'source_files', { processed: manifest.processed, skipped: manifest.skipped }).status === 'error') {
    return report()
  }

  // IP cores
  const ipLog = tracker.begin('ip_cores')
  const ipResult = await restructureIpCores(
    manifest.ipCore,
    options.mode === 'build' ? 'restructure' : 'pass-through',
    join(outputDir, 'xci'),
    ipLog
  )
  const ipStep = tracker.finalize(
    'ip_cores::restructure',
    'ip_cores',
    ipResult.ok ? { descriptors: ipResult.value.descriptorCount, coefficients: ipResult.value.coefficientCount } : undefined
  )
  if (ipStep.status === 'error' || !ipResult.ok) return report()

  // Constraints
  const constraintLog = tracker.begin('constraints')
  const constraints = await planConstraints(config.constraints, manifest.external, constraintLog)
  if (tracker.finalize('constraints::plan', 'constraints').status === 'error') return report()

  // Block designs
  const designLog = tracker.begin('block_designs')
  const blockDesigns = planBlockDesigns(config.block_designs, manifest.blockDesign, designLog)
  if (tracker.finalize('block_designs::plan', 'block_designs').status === 'error') return report()

  // Generics
  const genericLog = tracker.begin('generics')
  const generics = encodeAll(config.project_information.top_level_generics, genericLog)
  if (tracker.finalize('generics::encode', 'generics').status === 'error') return report()

  // Build plan
  const planLog = tracker.begin('build_plan')
  const plan: BuildPlan = {
    project_name: config.project_information.project_name,
    display_name: displayName(config),
    top_level: config.project_information.top_level_file_name,
    device: config.project_information.device_info,
    mode: options.mode,
    cores,
    generics,
    sources: {
      hdl: manifest.hdl,
      ip_cores: ipResult.value.sources,
      block_designs: blockDesigns,
      constraints: constraints.constraints,
    },
    synth_options: config.synth_options ?? {},
    impl_options: config.impl_options ?? {},
  }
  try {
    await mkdir(outputDir, { recursive: true })
    await writeFile(join(outputDir, RESOLVED_CONFIG_FILE), JSON.stringify(config, null, 2) + '\n')
    await writeFile(join(outputDir, BUILD_PLAN_FILE), JSON.stringify(plan, null, 2) + '\n')
    planLog.info(`Build plan written to ${join(outputDir, BUILD_PLAN_FILE)}`)
  } catch (error) {
    planLog.error(`Failed to write build plan: ${error}`)
  }
  if (tracker.finalize('build_plan::write', 'build_plan').status === 'error') return report()

  planLog.status(formatProjectContext(plan.display_name))
  planLog.status(formatBuildArtefacts(outputDir))
  return report(plan)
}
