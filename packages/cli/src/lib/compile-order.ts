import { readFile, access } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { Ajv } from 'ajv'
import { compileOrderSchema } from 'shared'
import type { CompileOrderFile, CompileOrderRecord, FileEntry, RawFileType, Result } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export interface CompileOrderError {
  type: 'not-found' | 'malformed'
  message: string
}

type EntryShape = Pick<FileEntry, 'declaredType' | 'dialect' | 'declaredVersion'>

const RAW_TYPES: Record<RawFileType, EntryShape> = {
  VHDL: { declaredType: 'HDL_SOURCE', dialect: 'vhdl' },
  VHDL2008: { declaredType: 'HDL_SOURCE', dialect: 'vhdl', declaredVersion: 'VHDL2008' },
  VHDL2019: { declaredType: 'HDL_SOURCE', dialect: 'vhdl', declaredVersion: 'VHDL2019' },
  VERILOG: { declaredType: 'HDL_SOURCE', dialect: 'verilog' },
  SYSTEMVERILOG: { declaredType: 'HDL_SOURCE', dialect: 'systemverilog' },
  X_XCI: { declaredType: 'IP_CORE' },
  X_BD: { declaredType: 'BLOCK_DESIGN' },
  EXTERNAL: { declaredType: 'EXTERNAL_CONSTRAINT_OR_SCRIPT' },
}

const ajv = new Ajv({ allErrors: true })
const validateCompileOrder = ajv.compile<CompileOrderFile>(compileOrderSchema)

function isRawType(type: string): type is RawFileType {
  return Object.hasOwn(RAW_TYPES, type)
}

/**
 * Turn one manifest record into a file entry, or undefined when its type is
 * not part of the vocabulary. Relative paths resolve against `baseDir`.
 */
export function toFileEntry(record: CompileOrderRecord, baseDir: string): FileEntry | undefined {
  const type = record.type.trim().toUpperCase()
  if (!isRawType(type)) return undefined

  return {
    path: resolve(baseDir, record.path),
    ...RAW_TYPES[type],
    ...(record.library !== undefined ? { library: record.library } : {}),
    ...(record.ver_tag !== undefined ? { versionTag: record.ver_tag } : {}),
    ...(record.file_ext !== undefined ? { extension: record.file_ext } : {}),
  }
}

/**
 * Load the compile-order manifest (`{ files: [...] }`) produced by the
 * dependency scanner. Record order is preserved.
 */
export async function loadCompileOrder(filePath: string, log: ModuleLog): Promise<Result<FileEntry[], CompileOrderError>> {
  const absolutePath = resolve(filePath)
  try {
    await access(absolutePath)
  } catch {
    return { ok: false, error: { type: 'not-found', message: `Compile order file not found: ${absolutePath}` } }
  }

  let data: unknown
  try {
    data = JSON.parse(await readFile(absolutePath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: { type: 'malformed', message: `Failed to parse compile order file: ${error}` } }
  }

  if (!validateCompileOrder(data)) {
    const details = (validateCompileOrder.errors ?? []).map(e => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    return { ok: false, error: { type: 'malformed', message: `Invalid compile order file: ${details.join('; ')}` } }
  }

  const baseDir = dirname(absolutePath)
  const entries: FileEntry[] = []
  for (const record of data.files) {
    const entry = toFileEntry(record, baseDir)
    if (!entry) {
      log.warning(`Unknown file type '${record.type}' for ${record.path}, skipping`)
      continue
    }
    entries.push(entry)
  }

  log.info(`Loaded ${entries.length} compile order entr${entries.length === 1 ? 'y' : 'ies'} from ${absolutePath}`)
  return { ok: true, value: entries }
}
