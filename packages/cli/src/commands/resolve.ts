import { stringify } from 'yaml'
import type { ProjectConfiguration, Result } from 'shared'
import { resolveConfig } from '../lib/config-resolver.js'
import { StepTracker } from '../lib/step-tracker.js'

export interface ResolveCommandOptions {
  json?: boolean
  /** Skip `environment_setup` scripts */
  setup?: boolean
  env?: Record<string, string | undefined>
  write?: (line: string) => void
}

/**
 * Print the fully resolved configuration: inheritance merged, placeholders
 * substituted and validated. Diagnostics go to stderr so the document on
 * stdout stays parseable.
 */
export async function resolveCommand(configPath: string, options: ResolveCommandOptions = {}): Promise<Result<ProjectConfiguration, string>> {
  const tracker = new StepTracker({ write: options.write ?? ((line) => console.error(line)) })
  const log = tracker.begin('config')
  const resolved = await resolveConfig(configPath, log, {
    env: options.env,
    environmentSetup: options.setup !== false,
  })
  if (!resolved.ok) return { ok: false, error: resolved.error.message }

  const config = resolved.value.config
  if (options.json) {
    console.log(JSON.stringify(config, null, 2))
  } else {
    console.log(stringify(config).trimEnd())
  }
  return { ok: true, value: config }
}
