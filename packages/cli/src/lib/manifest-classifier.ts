import { access } from 'node:fs/promises'
import type { FileEntry, HdlDialect, VhdlVersion } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export const DEFAULT_LIBRARY = 'work'

export interface HdlSource {
  path: string
  dialect: HdlDialect
  /** Backend file type label, e.g. `VHDL 2008` */
  fileType: string
  library: string
  version?: VhdlVersion
}

export interface ClassifiedManifest {
  hdl: HdlSource[]
  ipCore: FileEntry[]
  blockDesign: FileEntry[]
  external: FileEntry[]
  processed: number
  skipped: number
}

const VHDL_FILE_TYPES: Record<VhdlVersion, string> = {
  VHDL: 'VHDL',
  VHDL2008: 'VHDL 2008',
  VHDL2019: 'VHDL 2019',
}

const VERSION_TAGS: Record<string, VhdlVersion> = {
  VHDL: 'VHDL',
  VHDL93: 'VHDL',
  VHDL2008: 'VHDL2008',
  VHDL08: 'VHDL2008',
  VHDL2019: 'VHDL2019',
  VHDL19: 'VHDL2019',
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export function parseVersionTag(tag: string): VhdlVersion | undefined {
  const key = tag.toUpperCase().replace(/[^A-Z0-9]/g, '')
  return Object.hasOwn(VERSION_TAGS, key) ? VERSION_TAGS[key] : undefined
}

/**
 * VHDL language version for an entry: an explicit version tag wins over the
 * version implied by the declared type, and neither means baseline VHDL.
 */
export function resolveVhdlVersion(entry: FileEntry, log: ModuleLog): VhdlVersion {
  const fallback = entry.declaredVersion ?? 'VHDL'
  if (entry.versionTag === undefined || entry.versionTag.trim() === '') return fallback

  const tagged = parseVersionTag(entry.versionTag)
  if (!tagged) {
    log.warning(`Unknown version tag '${entry.versionTag}' for ${entry.path}, using ${VHDL_FILE_TYPES[fallback]}`)
    return fallback
  }
  return tagged
}

function toHdlSource(entry: FileEntry, dialect: HdlDialect, log: ModuleLog): HdlSource {
  const library = entry.library ?? DEFAULT_LIBRARY
  switch (dialect) {
    case 'vhdl': {
      const version = resolveVhdlVersion(entry, log)
      return { path: entry.path, dialect, fileType: VHDL_FILE_TYPES[version], library, version }
    }
    case 'verilog':
      return { path: entry.path, dialect, fileType: 'Verilog', library }
    case 'systemverilog':
      return { path: entry.path, dialect, fileType: 'SystemVerilog', library }
  }
}

/**
 * Split compile-order entries into HDL sources, IP-core descriptors, block
 * designs and external constraint/script files. Entries whose file is
 * missing are skipped with a warning. Each group keeps input order.
 */
export async function classifyManifest(entries: readonly FileEntry[], log: ModuleLog): Promise<ClassifiedManifest> {
  const result: ClassifiedManifest = { hdl: [], ipCore: [], blockDesign: [], external: [], processed: 0, skipped: 0 }

  for (const entry of entries) {
    if (!(await fileExists(entry.path))) {
      log.warning(`File not found: ${entry.path}`)
      result.skipped++
      continue
    }

    switch (entry.declaredType) {
      case 'HDL_SOURCE':
        if (!entry.dialect) {
          log.warning(`HDL source without a dialect: ${entry.path}`)
          result.skipped++
          continue
        }
        result.hdl.push(toHdlSource(entry, entry.dialect, log))
        break
      case 'IP_CORE':
        result.ipCore.push(entry)
        break
      case 'BLOCK_DESIGN':
        result.blockDesign.push(entry)
        break
      case 'EXTERNAL_CONSTRAINT_OR_SCRIPT':
        result.external.push(entry)
        break
    }
    result.processed++
  }

  log.status(
    `Classified ${result.processed} file(s), skipped ${result.skipped}: ` +
    `${result.hdl.length} HDL, ${result.ipCore.length} IP core, ` +
    `${result.blockDesign.length} block design, ${result.external.length} external`
  )
  return result
}
