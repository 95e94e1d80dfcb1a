import { execFile } from 'node:child_process'
import { access } from 'node:fs/promises'
import { resolve } from 'node:path'
import { promisify } from 'node:util'
import type { Result } from 'shared'
import type { ModuleLog } from './step-tracker.js'

const execFileAsync = promisify(execFile)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Parse `KEY=VALUE` lines. Blank lines, comments and lines without `=` are
 * ignored; keys and values are trimmed and the first `=` splits.
 */
export function parseKeyValueLines(output: string): Record<string, string> {
  const values: Record<string, string> = {}
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eq = trimmed.indexOf('=')
    if (eq <= 0) continue
    values[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim()
  }
  return values
}

/**
 * Run each `executor -> script` pair from `environment_setup` in declaration
 * order and collect the variables the scripts print. Later scripts override
 * earlier ones.
 */
export async function runEnvironmentSetup(
  setup: Record<string, string>,
  baseDir: string,
  log: ModuleLog
): Promise<Result<Record<string, string>, string>> {
  const collected: Record<string, string> = {}

  for (const [executor, script] of Object.entries(setup)) {
    const scriptPath = resolve(baseDir, script)
    if (!(await fileExists(scriptPath))) {
      log.warning(`Setup script not found: ${scriptPath}`)
      continue
    }

    log.info(`Running: ${executor} ${scriptPath}`)
    try {
      const { stdout } = await execFileAsync(executor, [scriptPath], { cwd: baseDir, encoding: 'utf-8' })
      Object.assign(collected, parseKeyValueLines(stdout))
    } catch (error) {
      return { ok: false, error: `Environment setup failed for ${script}: ${error}` }
    }
  }

  return { ok: true, value: collected }
}
