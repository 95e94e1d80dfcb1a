import { access } from 'node:fs/promises'
import { basename, extname } from 'node:path'
import type { ConstraintConfig, FileEntry } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export const CONSTRAINT_FILESET = 'constrs_1'
export const UTILITY_FILESET = 'utils_1'

export interface PlannedConstraint {
  file: string
  path: string
  kind: 'xdc' | 'tcl'
  fileset: string
  /** Source the script at project setup instead of adding it to a fileset */
  immediate: boolean
  properties: Record<string, string>
}

export interface ConstraintPlan {
  constraints: PlannedConstraint[]
  added: number
  immediate: number
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

function flattenProperties(properties: ConstraintConfig['properties']): Record<string, string> {
  if (properties === undefined) return {}
  const flat: Record<string, string> = {}
  for (const entry of Array.isArray(properties) ? properties : [properties]) {
    Object.assign(flat, entry)
  }
  return flat
}

/**
 * Index external XDC/TCL entries of the compile order by file name. Entries
 * without an extension tag are not constraint candidates.
 */
function constraintLookup(external: readonly FileEntry[]): Map<string, string> {
  const lookup = new Map<string, string>()
  for (const entry of external) {
    const ext = entry.extension?.toUpperCase()
    if (ext === 'XDC' || ext === 'TCL') lookup.set(basename(entry.path), entry.path)
  }
  return lookup
}

/**
 * Match configured constraints against the compile order and decide the
 * fileset, properties and execution of each.
 */
export async function planConstraints(
  constraints: readonly ConstraintConfig[] | undefined,
  external: readonly FileEntry[],
  log: ModuleLog
): Promise<ConstraintPlan> {
  const plan: ConstraintPlan = { constraints: [], added: 0, immediate: 0 }
  if (!constraints || constraints.length === 0) {
    log.info('No constraints section found in configuration')
    return plan
  }

  const lookup = constraintLookup(external)

  for (const constraint of constraints) {
    const path = lookup.get(constraint.file)
    if (path === undefined) {
      log.warning(`File '${constraint.file}' specified in config but not found in compile order`)
      continue
    }
    if (!(await fileExists(path))) {
      log.warning(`File not found: ${path}`)
      continue
    }

    const ext = extname(path).toLowerCase()
    if (ext !== '.xdc' && ext !== '.tcl') {
      log.warning(`Unknown file type for: ${constraint.file}`)
      continue
    }
    const kind = ext === '.xdc' ? 'xdc' : 'tcl'

    const properties = flattenProperties(constraint.properties)
    let fileset = constraint.fileset ?? properties.FILESET ?? CONSTRAINT_FILESET
    const execution = (constraint.execution ?? properties.execution)?.toLowerCase()
    delete properties.FILESET
    delete properties.execution

    if (execution === 'synthesis') properties.USED_IN_IMPLEMENTATION = 'false'
    if (execution === 'implementation') properties.USED_IN_SYNTHESIS = 'false'

    if (kind === 'tcl' && execution === 'immediate') {
      log.info(`TCL script will be executed immediately: ${constraint.file}`)
      plan.constraints.push({ file: constraint.file, path, kind, fileset, immediate: true, properties })
      plan.immediate++
      continue
    }

    if (kind === 'tcl' && fileset !== CONSTRAINT_FILESET && fileset !== UTILITY_FILESET) {
      log.warning(`Unknown fileset '${fileset}' for TCL file '${constraint.file}', using ${UTILITY_FILESET}`)
      fileset = UTILITY_FILESET
    }

    log.info(`Adding ${kind.toUpperCase()} file '${constraint.file}' to ${fileset}`)
    plan.constraints.push({ file: constraint.file, path, kind, fileset, immediate: false, properties })
    plan.added++
  }

  log.status(`Constraint handling complete. Added ${plan.added} constraint(s), ${plan.immediate} immediate TCL script(s).`)
  return plan
}
