import type { Result, Scalar } from 'shared'

export type ConfigNode = ConfigMap | ConfigSeq | ConfigScalar

export interface ConfigMap {
  kind: 'map'
  entries: ReadonlyMap<string, ConfigNode>
}

export interface ConfigSeq {
  kind: 'seq'
  items: readonly ConfigNode[]
}

export interface ConfigScalar {
  kind: 'scalar'
  value: Scalar
}

export interface MergeConflict {
  /** Dotted key path, sequence positions are not part of it */
  path: string
  message: string
}

export function mapNode(entries: Iterable<[string, ConfigNode]> = []): ConfigMap {
  return { kind: 'map', entries: new Map(entries) }
}

export function seqNode(items: ConfigNode[]): ConfigSeq {
  return { kind: 'seq', items }
}

export function scalarNode(value: Scalar): ConfigScalar {
  return { kind: 'scalar', value }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Build a tree from parsed YAML/JSON data. Anything that is not a mapping,
 * sequence, string, number, boolean or null is rejected with its key path.
 */
export function toConfigNode(data: unknown, path = ''): Result<ConfigNode, string> {
  if (data === null || data === undefined) return { ok: true, value: scalarNode(null) }
  if (typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    return { ok: true, value: scalarNode(data) }
  }
  if (Array.isArray(data)) {
    const items: ConfigNode[] = []
    for (let i = 0; i < data.length; i++) {
      const item = toConfigNode(data[i], `${path}[${i}]`)
      if (!item.ok) return item
      items.push(item.value)
    }
    return { ok: true, value: seqNode(items) }
  }
  if (isRecord(data)) {
    const entries: [string, ConfigNode][] = []
    for (const [key, value] of Object.entries(data)) {
      const child = toConfigNode(value, joinPath(path, key))
      if (!child.ok) return child
      entries.push([key, child.value])
    }
    return { ok: true, value: mapNode(entries) }
  }
  return { ok: false, error: `Unsupported value at ${path || '(root)'}: ${String(data)}` }
}

export function toPlain(node: ConfigNode): unknown {
  switch (node.kind) {
    case 'scalar':
      return node.value
    case 'seq':
      return node.items.map(toPlain)
    case 'map': {
      const out: Record<string, unknown> = {}
      for (const [key, value] of node.entries) out[key] = toPlain(value)
      return out
    }
  }
}

export function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key
}

/**
 * Merge a child layer over a parent layer. Mappings merge key by key,
 * sequences concatenate parent first, and a key holding a scalar in both
 * layers is a conflict even when the values are equal. Neither input is
 * modified.
 */
export function mergeNodes(parent: ConfigNode, child: ConfigNode, path = ''): Result<ConfigNode, MergeConflict> {
  if (parent.kind === 'map' && child.kind === 'map') {
    const merged = new Map(parent.entries)
    for (const [key, value] of child.entries) {
      const existing = merged.get(key)
      if (existing === undefined) {
        merged.set(key, value)
        continue
      }
      const result = mergeNodes(existing, value, joinPath(path, key))
      if (!result.ok) return result
      merged.set(key, result.value)
    }
    return { ok: true, value: { kind: 'map', entries: merged } }
  }

  if (parent.kind === 'seq' && child.kind === 'seq') {
    return { ok: true, value: seqNode([...parent.items, ...child.items]) }
  }

  const where = path || '(root)'
  if (parent.kind === 'scalar' && child.kind === 'scalar') {
    return {
      ok: false,
      error: { path: where, message: `Scalar '${where}' is defined in more than one configuration layer` },
    }
  }
  return {
    ok: false,
    error: { path: where, message: `Cannot merge ${describe(child)} into ${describe(parent)} at '${where}'` },
  }
}

function describe(node: ConfigNode): string {
  switch (node.kind) {
    case 'map':
      return 'a mapping'
    case 'seq':
      return 'a sequence'
    case 'scalar':
      return 'a scalar'
  }
}

export function getChild(node: ConfigNode, key: string): ConfigNode | undefined {
  return node.kind === 'map' ? node.entries.get(key) : undefined
}

export function withoutKey(node: ConfigMap, key: string): ConfigMap {
  const entries = new Map(node.entries)
  entries.delete(key)
  return { kind: 'map', entries }
}

/**
 * Rebuild the tree, replacing every string scalar with `fn(value, path)`.
 * The first failure aborts the walk.
 */
export function mapStrings<E>(
  node: ConfigNode,
  fn: (value: string, path: string) => Result<string, E>,
  path = ''
): Result<ConfigNode, E> {
  switch (node.kind) {
    case 'scalar': {
      if (typeof node.value !== 'string') return { ok: true, value: node }
      const replaced = fn(node.value, path)
      if (!replaced.ok) return replaced
      return { ok: true, value: scalarNode(replaced.value) }
    }
    case 'seq': {
      const items: ConfigNode[] = []
      for (let i = 0; i < node.items.length; i++) {
        const item = mapStrings(node.items[i], fn, `${path}[${i}]`)
        if (!item.ok) return item
        items.push(item.value)
      }
      return { ok: true, value: seqNode(items) }
    }
    case 'map': {
      const entries: [string, ConfigNode][] = []
      for (const [key, value] of node.entries) {
        const child = mapStrings(value, fn, joinPath(path, key))
        if (!child.ok) return child
        entries.push([key, child.value])
      }
      return { ok: true, value: mapNode(entries) }
    }
  }
}

/** Dotted paths of every `inherits` key below the root mapping. */
export function findNestedInherits(node: ConfigNode, path = '', depth = 0): string[] {
  const found: string[] = []
  if (node.kind === 'map') {
    for (const [key, value] of node.entries) {
      const childPath = joinPath(path, key)
      if (key === 'inherits' && depth > 0) found.push(childPath)
      found.push(...findNestedInherits(value, childPath, depth + 1))
    }
  } else if (node.kind === 'seq') {
    node.items.forEach((item, i) => found.push(...findNestedInherits(item, `${path}[${i}]`, depth + 1)))
  }
  return found
}
