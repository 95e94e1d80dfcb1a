import { readFile, writeFile, copyFile, mkdir, access } from 'node:fs/promises'
import { basename, dirname, extname, join, relative, resolve, sep } from 'node:path'
import type { FileEntry, Result } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export type RestructureMode = 'restructure' | 'pass-through'

/**
 * One serialization of IP-core descriptors. `pattern` captures the text
 * before the reference, the reference itself and the text after it, so a
 * rewrite can replace exactly the reference span.
 */
export interface ReferenceGrammar {
  name: 'key-value' | 'tagged-text'
  aliases: readonly string[]
  pattern(alias: string): RegExp
}

/** Structured form: `"Coefficient_File": [ { "value": "path/to/file.coe" } ]` */
export const KEY_VALUE_GRAMMAR: ReferenceGrammar = {
  name: 'key-value',
  aliases: ['Coefficient_File', 'Coe_File', 'coefficient_file', 'coe_file'],
  pattern: (alias) => new RegExp(`("${alias}"[^"]*"value"[^"]*")([^"]+)(")`),
}

/** Tagged-text form: `referenceId="PARAM_VALUE.Coefficient_File">path/to/file.coe<` */
export const TAGGED_TEXT_GRAMMAR: ReferenceGrammar = {
  name: 'tagged-text',
  aliases: ['Coefficient_File', 'Coe_File', 'CoefFile', 'coefficient_file'],
  pattern: (alias) => new RegExp(`(referenceId="PARAM_VALUE\\.${alias}">)([^<]+)(<)`),
}

export interface CoefficientReference {
  grammar: ReferenceGrammar['name']
  alias: string
  /** Reference as written, trimmed */
  reference: string
}

export interface DiscoveredDescriptor {
  path: string
  content: string
  /** Absolute path of the referenced coefficient file, when it exists */
  coefficient?: string
}

export interface RestructureResult {
  descriptorCount: number
  coefficientCount: number
  /** Files to register as backend sources, in registration order */
  sources: string[]
}

export interface DependencyError {
  type: 'shared-write-failure'
  message: string
  path: string
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export function selectGrammar(content: string): ReferenceGrammar {
  return content.includes('"ip_inst"') ? KEY_VALUE_GRAMMAR : TAGGED_TEXT_GRAMMAR
}

function matchReference(content: string): { alias: string; grammar: ReferenceGrammar; match: RegExpMatchArray } | undefined {
  const grammar = selectGrammar(content)
  for (const alias of grammar.aliases) {
    const match = content.match(grammar.pattern(alias))
    if (match && match[2].trim() !== '') return { alias, grammar, match }
  }
  return undefined
}

/**
 * Find the coefficient reference embedded in a descriptor. Aliases are
 * tried in order and the first match wins.
 */
export function findCoefficientReference(content: string): CoefficientReference | undefined {
  const found = matchReference(content)
  if (!found) return undefined
  return { grammar: found.grammar.name, alias: found.alias, reference: found.match[2].trim() }
}

/**
 * Replace the reference span located by the same grammar and alias that
 * discovery used. Everything outside the span is left byte for byte.
 */
export function rewriteCoefficientReference(content: string, newReference: string): string {
  const found = matchReference(content)
  if (!found) return content
  return content.replace(
    found.grammar.pattern(found.alias),
    (_all: string, before: string, _reference: string, after: string) => `${before}${newReference}${after}`
  )
}

function toPosix(path: string): string {
  return path.split(sep).join('/')
}

function uniqueName(name: string, taken: Set<string>): string {
  let candidate = name
  const extension = extname(name)
  const stem = name.slice(0, name.length - extension.length)
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${stem}_${n}${extension}`
  }
  taken.add(candidate)
  return candidate
}

/**
 * Pass 1: read every descriptor and record the coefficient file it
 * references. Unreadable descriptors are skipped with a warning; a missing
 * or dangling reference is not an error.
 */
export async function discoverCoefficients(entries: readonly FileEntry[], log: ModuleLog): Promise<DiscoveredDescriptor[]> {
  const descriptors: DiscoveredDescriptor[] = []

  for (const entry of entries) {
    const path = resolve(entry.path)
    let content: string
    try {
      content = await readFile(path, 'utf-8')
    } catch (error) {
      log.warning(`Cannot read IP core descriptor ${path}: ${error}`)
      continue
    }

    const found = findCoefficientReference(content)
    if (!found) {
      log.debug(`No coefficient dependency found in ${path}`)
      descriptors.push({ path, content })
      continue
    }

    const coefficient = resolve(dirname(path), found.reference)
    if (!(await fileExists(coefficient))) {
      log.debug(`Coefficient reference '${found.reference}' in ${path} does not exist, ignoring`)
      descriptors.push({ path, content })
      continue
    }

    descriptors.push({ path, content, coefficient })
  }

  return descriptors
}

function writeFailure(log: ModuleLog, path: string, error: unknown): Result<never, DependencyError> {
  const message = `Failed to write ${path}: ${error}`
  log.error(message)
  return { ok: false, error: { type: 'shared-write-failure', message, path } }
}

async function restructure(
  descriptors: readonly DiscoveredDescriptor[],
  outputRoot: string,
  log: ModuleLog
): Promise<Result<RestructureResult, DependencyError>> {
  const sources: string[] = []
  const coefficientDir = join(outputRoot, 'coefficients')
  try {
    await mkdir(coefficientDir, { recursive: true })
  } catch (error) {
    return writeFailure(log, coefficientDir, error)
  }

  // Shared coefficients first, one copy per distinct source file
  const copied = new Map<string, string>()
  const coefficientNames = new Set<string>()
  for (const descriptor of descriptors) {
    if (!descriptor.coefficient || copied.has(descriptor.coefficient)) continue
    const target = join(coefficientDir, uniqueName(basename(descriptor.coefficient), coefficientNames))
    try {
      await copyFile(descriptor.coefficient, target)
    } catch (error) {
      return writeFailure(log, target, error)
    }
    copied.set(descriptor.coefficient, target)
    sources.push(target)
    log.info(`Copied shared coefficient → ${target}`)
  }

  const stems = new Set<string>(['coefficients'])
  let descriptorCount = 0
  for (const descriptor of descriptors) {
    const extension = extname(descriptor.path)
    const stem = uniqueName(basename(descriptor.path, extension), stems)
    const subdir = join(outputRoot, stem)
    const target = join(subdir, `${stem}${extension}`)

    let content = descriptor.content
    const shared = descriptor.coefficient ? copied.get(descriptor.coefficient) : undefined
    if (shared) {
      content = rewriteCoefficientReference(content, toPosix(relative(subdir, shared)))
    }

    try {
      await mkdir(subdir, { recursive: true })
      await writeFile(target, content)
    } catch (error) {
      return writeFailure(log, target, error)
    }
    sources.push(target)
    descriptorCount++
    log.info(`Added restructured IP core → ${target}`)
  }

  return { ok: true, value: { descriptorCount, coefficientCount: copied.size, sources } }
}

function passThrough(descriptors: readonly DiscoveredDescriptor[], log: ModuleLog): RestructureResult {
  const sources: string[] = []
  const registered = new Set<string>()
  for (const descriptor of descriptors) {
    sources.push(descriptor.path)
    log.info(`Added original IP core: ${descriptor.path}`)
    if (descriptor.coefficient && !registered.has(descriptor.coefficient)) {
      registered.add(descriptor.coefficient)
      sources.push(descriptor.coefficient)
      log.info(`Added original coefficient: ${descriptor.coefficient}`)
    }
  }
  return { descriptorCount: descriptors.length, coefficientCount: registered.size, sources }
}

/**
 * Discover coefficient dependencies of the IP-core descriptors and either
 * flatten them into `outputRoot` (one shared copy per coefficient, one
 * rewritten copy per descriptor) or register the originals in place.
 */
export async function restructureIpCores(
  entries: readonly FileEntry[],
  mode: RestructureMode,
  outputRoot: string,
  log: ModuleLog
): Promise<Result<RestructureResult, DependencyError>> {
  log.status(`Handling IP cores (restructure = ${mode === 'restructure' ? 'YES' : 'NO'})...`)

  const descriptors = await discoverCoefficients(entries, log)

  let result: Result<RestructureResult, DependencyError>
  if (mode === 'restructure') {
    result = await restructure(descriptors, resolve(outputRoot), log)
  } else {
    result = { ok: true, value: passThrough(descriptors, log) }
  }

  if (result.ok) {
    log.status(
      `IP core handling complete. Processed ${result.value.descriptorCount} descriptor(s), ` +
      `${result.value.coefficientCount} coefficient file(s).`
    )
  }
  return result
}
