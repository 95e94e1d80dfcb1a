import { basename } from 'node:path'
import type { BlockDesignConfig, FileEntry } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export interface PlannedBlockDesign {
  path: string
  commands: string[]
}

/**
 * Pair the block designs of the compile order with the post-load commands
 * configured for them. A configured block design that the compile order
 * does not contain is an error.
 */
export function planBlockDesigns(
  configured: readonly BlockDesignConfig[] | undefined,
  entries: readonly FileEntry[],
  log: ModuleLog
): PlannedBlockDesign[] {
  if (entries.length === 0) {
    log.info('No block design files found in compile order')
  }

  const byName = new Map(entries.map(e => [basename(e.path), e.path]))
  const commands = new Map<string, string[]>()
  for (const design of configured ?? []) {
    if (!byName.has(design.file)) {
      log.error(`Block design '${design.file}' defined in configuration but not found in compile order`)
      continue
    }
    if (design.commands) commands.set(design.file, design.commands)
  }

  return entries.map(entry => ({
    path: entry.path,
    commands: commands.get(basename(entry.path)) ?? [],
  }))
}
