import { readFile, access } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { Ajv } from 'ajv'
import type { ErrorObject } from 'ajv'
import { parse as parseYaml } from 'yaml'
import { projectConfigurationSchema } from 'shared'
import type { ProjectConfiguration, Result } from 'shared'
import {
  findNestedInherits,
  getChild,
  mapStrings,
  mergeNodes,
  toConfigNode,
  toPlain,
  withoutKey,
  type ConfigMap,
  type ConfigNode,
} from './config-node.js'
import { runEnvironmentSetup } from './environment-setup.js'
import type { ModuleLog } from './step-tracker.js'

export interface ConfigError {
  type:
    | 'not-found'
    | 'malformed'
    | 'merge-conflict'
    | 'missing-field'
    | 'unresolved-placeholder'
    | 'circular-inheritance'
    | 'environment-setup'
  message: string
  path?: string
}

export interface ResolveOptions {
  /** Substitution environment, `process.env` by default */
  env?: Record<string, string | undefined>
  /** Run `environment_setup` scripts before substitution, default true */
  environmentSetup?: boolean
}

export interface ResolvedConfig {
  sourcePath: string
  tree: ConfigNode
  config: ProjectConfiguration
  environment: Record<string, string | undefined>
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
const validateProject = ajv.compile<ProjectConfiguration>(projectConfigurationSchema)

const PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)\}/g
const UNTERMINATED = /\$\{[A-Z_][A-Z0-9_]*(?![A-Z0-9_}])/

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Read and parse one configuration document. An empty document is an empty
 * mapping; any other non-mapping root is malformed.
 */
export async function loadConfigDocument(filePath: string): Promise<Result<ConfigMap, ConfigError>> {
  if (!(await fileExists(filePath))) {
    return { ok: false, error: { type: 'not-found', message: `Configuration file not found: ${filePath}`, path: filePath } }
  }

  let data: unknown
  try {
    data = parseYaml(await readFile(filePath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: { type: 'malformed', message: `Failed to parse ${filePath}: ${error}`, path: filePath } }
  }

  const node = toConfigNode(data ?? {})
  if (!node.ok) {
    return { ok: false, error: { type: 'malformed', message: `${filePath}: ${node.error}`, path: filePath } }
  }
  if (node.value.kind !== 'map') {
    return { ok: false, error: { type: 'malformed', message: `${filePath}: document root must be a mapping`, path: filePath } }
  }

  const nested = findNestedInherits(node.value)
  if (nested.length > 0) {
    return {
      ok: false,
      error: { type: 'malformed', message: `${filePath}: 'inherits' is only allowed at the document root (found at ${nested.join(', ')})`, path: filePath },
    }
  }

  return { ok: true, value: node.value }
}

function parentReferences(node: ConfigNode, filePath: string): Result<string[], ConfigError> {
  if (node.kind === 'scalar' && typeof node.value === 'string') {
    return { ok: true, value: [node.value] }
  }
  if (node.kind === 'seq') {
    const refs: string[] = []
    for (const item of node.items) {
      if (item.kind !== 'scalar' || typeof item.value !== 'string') {
        return { ok: false, error: { type: 'malformed', message: `${filePath}: 'inherits' entries must be paths`, path: filePath } }
      }
      refs.push(item.value)
    }
    return { ok: true, value: refs }
  }
  return { ok: false, error: { type: 'malformed', message: `${filePath}: 'inherits' must be a path or a list of paths`, path: filePath } }
}

/**
 * Load a document and fold its `inherits` graph into one tree. Every
 * distinct document is one layer: parents come before children, in the order
 * listed, and an ancestor reached through several parents is folded once.
 */
export async function resolveInheritance(filePath: string): Promise<Result<ConfigNode, ConfigError>> {
  const layers = new Map<string, ConfigMap>()

  async function collect(path: string, chain: string[]): Promise<ConfigError | null> {
    if (chain.includes(path)) {
      return {
        type: 'circular-inheritance',
        message: `Circular inheritance detected: ${[...chain, path].join(' → ')}`,
        path,
      }
    }
    if (layers.has(path)) return null

    const document = await loadConfigDocument(path)
    if (!document.ok) return document.error

    const inherits = getChild(document.value, 'inherits')
    if (inherits !== undefined) {
      const refs = parentReferences(inherits, path)
      if (!refs.ok) return refs.error
      for (const ref of refs.value) {
        const error = await collect(resolve(dirname(path), ref), [...chain, path])
        if (error) return error
      }
    }

    layers.set(path, withoutKey(document.value, 'inherits'))
    return null
  }

  const error = await collect(resolve(filePath), [])
  if (error) return { ok: false, error }

  let accumulated: ConfigNode = { kind: 'map', entries: new Map() }
  for (const layer of layers.values()) {
    const merged = mergeNodes(accumulated, layer)
    if (!merged.ok) {
      return { ok: false, error: { type: 'merge-conflict', message: merged.error.message, path: merged.error.path } }
    }
    accumulated = merged.value
  }
  return { ok: true, value: accumulated }
}

export interface SubstituteOptions {
  /** Leave placeholders of unset variables in place instead of blanking them */
  keepUnset?: boolean
  onUnset?: (name: string) => void
}

/**
 * Replace `${NAME}` placeholders until none that can be resolved remain.
 * A value may expand to one further placeholder; the pass count is capped at
 * the initial placeholder count plus one, so self references fail instead of
 * looping.
 */
export function substituteString(
  text: string,
  env: Record<string, string | undefined>,
  options: SubstituteOptions = {}
): Result<string, string> {
  const pending = (value: string): boolean =>
    [...value.matchAll(PLACEHOLDER)].some(m => !options.keepUnset || env[m[1]] !== undefined)

  const cap = [...text.matchAll(PLACEHOLDER)].length + 1
  let result = text
  let passes = 0

  while (true) {
    if (UNTERMINATED.test(result)) {
      return { ok: false, error: `Unterminated placeholder in '${text}'` }
    }
    if (!pending(result)) return { ok: true, value: result }
    if (passes >= cap) {
      return { ok: false, error: `Placeholder in '${text}' does not resolve (self-referential?)` }
    }
    result = result.replace(PLACEHOLDER, (match: string, name: string) => {
      const value = env[name]
      if (value !== undefined) return value
      if (options.keepUnset) return match
      options.onUnset?.(name)
      return ''
    })
    passes++
  }
}

function runtimeGenericPaths(tree: ConfigNode): Set<string> {
  const paths = new Set<string>()
  const info = getChild(tree, 'project_information')
  const generics = info ? getChild(info, 'top_level_generics') : undefined
  if (generics?.kind !== 'map') return paths

  for (const [name, generic] of generics.entries) {
    const runtime = getChild(generic, 'runtime')
    if (runtime?.kind === 'scalar' && runtime.value === true) {
      paths.add(`project_information.top_level_generics.${name}.value`)
    }
  }
  return paths
}

/**
 * Substitute placeholders in every string scalar of the tree. Each unset
 * variable is reported once through the log. Values of runtime-only
 * generics keep their unset placeholders for the encoder to skip.
 */
export function substitutePlaceholders(
  tree: ConfigNode,
  env: Record<string, string | undefined>,
  log: ModuleLog
): Result<ConfigNode, ConfigError> {
  const runtimePaths = runtimeGenericPaths(tree)
  const reported = new Set<string>()
  const onUnset = (name: string) => {
    if (reported.has(name)) return
    reported.add(name)
    log.debug(`Environment variable '${name}' not found, substituting empty string`)
  }

  return mapStrings<ConfigError>(tree, (value, path) => {
    const substituted = substituteString(value, env, { keepUnset: runtimePaths.has(path), onUnset })
    if (!substituted.ok) {
      return { ok: false, error: { type: 'unresolved-placeholder', message: `${path}: ${substituted.error}`, path } }
    }
    return substituted
  })
}

function describeErrors(errors: ErrorObject[]): ConfigError {
  const missing = errors.filter(e => e.keyword === 'required')
  if (missing.length > 0) {
    const fields = missing.map(e => {
      const property = typeof e.params.missingProperty === 'string' ? e.params.missingProperty : '?'
      return `${e.instancePath}/${property}`.replace(/^\//, '').replace(/\//g, '.')
    })
    return { type: 'missing-field', message: `Missing required field(s): ${fields.join(', ')}`, path: fields[0] }
  }
  const details = errors.map(e => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
  return { type: 'malformed', message: `Invalid configuration: ${details.join('; ')}`, path: errors[0]?.instancePath }
}

export function validateProjectConfiguration(tree: ConfigNode): Result<ProjectConfiguration, ConfigError> {
  const plain = toPlain(tree)
  if (!validateProject(plain)) {
    return { ok: false, error: describeErrors(validateProject.errors ?? []) }
  }
  return { ok: true, value: plain }
}

function setupSection(tree: ConfigNode): Record<string, string> {
  const setup = getChild(tree, 'environment_setup')
  const scripts: Record<string, string> = {}
  if (setup?.kind !== 'map') return scripts
  for (const [executor, script] of setup.entries) {
    if (script.kind === 'scalar' && typeof script.value === 'string') scripts[executor] = script.value
  }
  return scripts
}

/**
 * Resolve a root configuration document into a validated project
 * configuration: inheritance, environment setup, placeholder substitution
 * and schema validation, in that order.
 */
export async function resolveConfig(
  rootPath: string,
  log: ModuleLog,
  options: ResolveOptions = {}
): Promise<Result<ResolvedConfig, ConfigError>> {
  const sourcePath = resolve(rootPath)
  log.status(`Resolving configuration: ${sourcePath}`)

  const merged = await resolveInheritance(sourcePath)
  if (!merged.ok) return merged

  const environment: Record<string, string | undefined> = { ...(options.env ?? process.env) }
  const setup = setupSection(merged.value)
  if (options.environmentSetup !== false && Object.keys(setup).length > 0) {
    const collected = await runEnvironmentSetup(setup, dirname(sourcePath), log)
    if (!collected.ok) return { ok: false, error: { type: 'environment-setup', message: collected.error } }
    Object.assign(environment, collected.value)
  }

  const substituted = substitutePlaceholders(merged.value, environment, log)
  if (!substituted.ok) return substituted

  const config = validateProjectConfiguration(substituted.value)
  if (!config.ok) return config

  log.info('Configuration validated successfully')
  return { ok: true, value: { sourcePath, tree: substituted.value, config: config.value, environment } }
}
