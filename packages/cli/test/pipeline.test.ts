import { describe, it, expect, afterEach } from 'vitest'
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { ProjectConfiguration } from 'shared'
import { BUILD_PLAN_FILE, RESOLVED_CONFIG_FILE, defaultOutputDir, displayName, runPipeline } from '../src/lib/pipeline.js'
import { StepTracker } from '../src/lib/step-tracker.js'

const PROJECT = `
project_information:
  project_name: blinky
  top_level_file_name: top.vhd
  device_info:
    part_name: xc7a35tcpg236-1
    board_name: basys3
  top_level_generics:
    G_WIDTH: { type: integer, value: 8 }
    G_ID: { type: bit_vector, value: DAC00001, width: 32 }
constraints:
  - file: pins.xdc
block_designs:
  - file: system.bd
    commands: [validate_bd_design]
synth_options:
  flatten_hierarchy: rebuilt
`

const DESCRIPTOR = `{
  "ip_inst": {
    "parameters": { "Coefficient_File": [ { "value": "../coe/taps.coe" } ] }
  }
}
`

const ORDER = {
  files: [
    { type: 'VHDL', path: 'src/top.vhd' },
    { type: 'X_XCI', path: 'ip/fir.xci' },
    { type: 'X_BD', path: 'bd/system.bd' },
    { type: 'EXTERNAL', path: 'pins.xdc', file_ext: 'XDC' },
  ],
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

describe('runPipeline', () => {
  const dirs: string[] = []
  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function fixture(project = PROJECT): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'hdlprep-pipeline-'))
    dirs.push(dir)
    for (const sub of ['src', 'ip', 'coe', 'bd']) await mkdir(join(dir, sub))
    await writeFile(join(dir, 'project.yaml'), project)
    await writeFile(join(dir, 'compile_order.json'), JSON.stringify(ORDER))
    await writeFile(join(dir, 'src', 'top.vhd'), 'entity top is end;\n')
    await writeFile(join(dir, 'ip', 'fir.xci'), DESCRIPTOR)
    await writeFile(join(dir, 'coe', 'taps.coe'), 'radix=16;\n')
    await writeFile(join(dir, 'bd', 'system.bd'), '{}\n')
    await writeFile(join(dir, 'pins.xdc'), '')
    return dir
  }

  function capture() {
    const lines: string[] = []
    return { lines, tracker: new StepTracker({ write: (line) => lines.push(line) }) }
  }

  it('writes a build plan for a clean project', async () => {
    const dir = await fixture()
    const out = join(dir, 'out')
    const { lines, tracker } = capture()

    const report = await runPipeline(
      { configPath: join(dir, 'project.yaml'), compileOrderPath: join(dir, 'compile_order.json'), mode: 'build', outputDir: out, env: {} },
      tracker
    )

    expect(report.passed).toBe(true)
    expect(report.hasWarnings).toBe(false)
    expect(lines.filter(l => l.startsWith('[HDLPREP_STEP_'))).toEqual([
      '[HDLPREP_STEP_SUCCESS] config::resolve',
      '[HDLPREP_STEP_SUCCESS] compile_order::load',
      '[HDLPREP_STEP_SUCCESS] source_files::classify',
      '[HDLPREP_STEP_SUCCESS] ip_cores::restructure',
      '[HDLPREP_STEP_SUCCESS] constraints::plan',
      '[HDLPREP_STEP_SUCCESS] block_designs::plan',
      '[HDLPREP_STEP_SUCCESS] generics::encode',
      '[HDLPREP_STEP_SUCCESS] build_plan::write',
    ])
    expect(lines.slice(-2)).toEqual([
      '[HDLPREP_PROJECT_CONTEXT] name=BLINKY_BASYS3',
      `[HDLPREP_BUILD_ARTEFACTS] ${out}`,
    ])

    const plan = report.plan
    expect(plan?.generics).toBe("-generic G_WIDTH=8 -generic G_ID=32'hDAC00001")
    expect(plan?.cores).toBe(4)
    expect(plan?.sources.ip_cores).toEqual([
      join(out, 'xci', 'coefficients', 'taps.coe'),
      join(out, 'xci', 'fir', 'fir.xci'),
    ])
    expect(plan?.sources.block_designs).toEqual([{ path: join(dir, 'bd', 'system.bd'), commands: ['validate_bd_design'] }])
    expect(plan?.sources.hdl).toEqual([
      { path: join(dir, 'src', 'top.vhd'), dialect: 'vhdl', fileType: 'VHDL', library: 'work', version: 'VHDL' },
    ])

    expect(JSON.parse(await readFile(join(out, BUILD_PLAN_FILE), 'utf-8'))).toEqual(plan)
    const resolved = JSON.parse(await readFile(join(out, RESOLVED_CONFIG_FILE), 'utf-8'))
    expect(resolved.synth_options).toEqual({ flatten_hierarchy: 'rebuilt' })
  })

  it('registers original IP files outside build mode', async () => {
    const dir = await fixture()
    const { tracker } = capture()
    const report = await runPipeline(
      { configPath: join(dir, 'project.yaml'), compileOrderPath: join(dir, 'compile_order.json'), mode: 'open', outputDir: join(dir, 'out'), env: {} },
      tracker
    )
    expect(report.plan?.sources.ip_cores).toEqual([join(dir, 'ip', 'fir.xci'), join(dir, 'coe', 'taps.coe')])
    expect(await exists(join(dir, 'out', 'xci'))).toBe(false)
  })

  it('halts after the first failing step', async () => {
    const dir = await fixture()
    const { lines, tracker } = capture()
    const report = await runPipeline(
      { configPath: join(dir, 'project.yaml'), compileOrderPath: join(dir, 'absent.json'), mode: 'build', outputDir: join(dir, 'out'), env: {} },
      tracker
    )

    expect(report.passed).toBe(false)
    expect(report.plan).toBeUndefined()
    expect(report.steps.map(s => s.status)).toEqual(['success', 'error'])
    expect(lines).toContain('[HDLPREP_STEP_ERROR] compile_order::load [E:1]')
    expect(await exists(join(dir, 'out', BUILD_PLAN_FILE))).toBe(false)
  })

  it('continues past warnings', async () => {
    const dir = await fixture(PROJECT.replace('- file: pins.xdc', '- file: absent.xdc'))
    const { tracker } = capture()
    const report = await runPipeline(
      { configPath: join(dir, 'project.yaml'), compileOrderPath: join(dir, 'compile_order.json'), mode: 'build', outputDir: join(dir, 'out'), env: {} },
      tracker
    )

    expect(report.passed).toBe(true)
    expect(report.hasWarnings).toBe(true)
    expect(report.steps.find(s => s.module === 'constraints')?.status).toBe('warning')
    expect(report.plan?.sources.constraints).toEqual([])
  })
})

describe('pipeline helpers', () => {
  it('places output beside the configuration', () => {
    expect(defaultOutputDir('/proj/cfg/project.yaml', 'open')).toBe('/proj/cfg/.hdlprep/open')
  })

  it('builds the display name', () => {
    const config: ProjectConfiguration = {
      project_information: { project_name: 'blinky', top_level_file_name: 'top.vhd', device_info: { part_name: 'xc7a35t' } },
    }
    expect(displayName(config)).toBe('BLINKY_UNKNOWN')
  })
})
