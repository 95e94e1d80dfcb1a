import type { Result } from 'shared'
import { resolveConfig } from '../lib/config-resolver.js'
import { encodeAll } from '../lib/generic-encoder.js'
import { StepTracker } from '../lib/step-tracker.js'

export interface GenericsOptions {
  env?: Record<string, string | undefined>
  write?: (line: string) => void
}

/** Print the `-generic NAME=<literal>` argument string for a configuration. */
export async function genericsCommand(configPath: string, options: GenericsOptions = {}): Promise<Result<string, string>> {
  const tracker = new StepTracker({ write: options.write ?? ((line) => console.error(line)) })
  const resolved = await resolveConfig(configPath, tracker.begin('config'), { env: options.env })
  if (!resolved.ok) return { ok: false, error: resolved.error.message }

  const args = encodeAll(resolved.value.config.project_information.top_level_generics, tracker.begin('generics'))
  console.log(args)
  return { ok: true, value: args }
}
