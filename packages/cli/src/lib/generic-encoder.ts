import type { GenericDefinition, GenericType, NumericBase, Result } from 'shared'
import type { ModuleLog } from './step-tracker.js'

export interface EncodingError {
  type: 'invalid-width' | 'invalid-digits' | 'unknown-type'
  message: string
  /** Raw, unvalidated literal to use instead */
  fallback: string
}

const TYPE_ALIASES: Record<string, GenericType> = {
  bit: 'bit',
  std_logic: 'bit',
  bit_vector: 'bit_vector',
  std_logic_vector: 'bit_vector',
  unsigned: 'unsigned',
  signed: 'signed',
  integer: 'integer',
  natural: 'integer',
  positive: 'integer',
  real: 'real',
  boolean: 'boolean',
  string: 'string',
}

const BASES: readonly NumericBase[] = ['hex', 'binary', 'decimal']

const PLACEHOLDER = /\$\{[^}]*\}/

function isBase(value: string): value is NumericBase {
  return BASES.some(base => base === value)
}

function isVectorType(type: GenericType | undefined): type is 'bit_vector' | 'unsigned' | 'signed' {
  return type === 'bit_vector' || type === 'unsigned' || type === 'signed'
}

function hasUnknownFormat(format: string | undefined): boolean {
  const requested = format?.trim().toLowerCase()
  return requested !== undefined && requested !== '' && !isBase(requested)
}

/**
 * Base a vector generic is written in. A missing or unrecognized `format`
 * means the type's default: hex for `bit_vector`, decimal otherwise.
 */
export function numericBase(type: 'bit_vector' | 'unsigned' | 'signed', format: string | undefined): NumericBase {
  const requested = format?.trim().toLowerCase()
  if (requested !== undefined && isBase(requested)) return requested
  return type === 'bit_vector' ? 'hex' : 'decimal'
}

export function normalizeGenericType(type: string): GenericType | undefined {
  return TYPE_ALIASES[type.trim().toLowerCase()]
}

/**
 * Strip an optional `0x` prefix, upper-case and left-pad with zeros to
 * `ceil(width / 4)` digits.
 */
export function formatHexValue(value: string, width: number): string {
  let digits = value.trim()
  if (digits.startsWith('0x') || digits.startsWith('0X')) digits = digits.slice(2)
  return digits.trim().toUpperCase().padStart(Math.ceil(width / 4), '0')
}

/** Strip an optional `0b` prefix and left-pad with zeros to `width` bits. */
export function formatBinaryValue(value: string, width: number): string {
  let digits = value.trim()
  if (digits.startsWith('0b') || digits.startsWith('0B')) digits = digits.slice(2)
  return digits.trim().padStart(width, '0')
}

function parseWidth(width: GenericDefinition['width']): number | undefined {
  if (width === undefined) return undefined
  const text = String(width).trim()
  if (!/^\d+$/.test(text)) return undefined
  const parsed = parseInt(text, 10)
  return parsed > 0 ? parsed : undefined
}

function encodeVector(
  name: string,
  type: 'bit_vector' | 'unsigned' | 'signed',
  definition: GenericDefinition,
  value: string
): Result<string, EncodingError> {
  const fallback = value
  const width = parseWidth(definition.width)
  if (width === undefined) {
    return {
      ok: false,
      error: { type: 'invalid-width', message: `Generic '${name}' of type ${type} needs a positive width, got '${definition.width ?? ''}'`, fallback },
    }
  }

  const base = numericBase(type, definition.format)

  const invalid = (detail: string): Result<string, EncodingError> => ({
    ok: false,
    error: { type: 'invalid-digits', message: `Generic '${name}' value '${value}' ${detail}`, fallback },
  })
  if (value === '') return invalid('is empty')

  switch (base) {
    case 'hex': {
      const digits = formatHexValue(value, width)
      if (!/^[0-9A-F]+$/.test(digits)) return invalid('is not a hexadecimal number')
      if (digits.length > Math.ceil(width / 4)) return invalid(`does not fit in ${width} bits`)
      return { ok: true, value: `${width}'h${digits}` }
    }
    case 'binary': {
      const digits = formatBinaryValue(value, width)
      if (!/^[01]+$/.test(digits)) return invalid('is not a binary number')
      if (digits.length > width) return invalid(`does not fit in ${width} bits`)
      return { ok: true, value: `${width}'b${digits}` }
    }
    case 'decimal': {
      const allowed = type === 'signed' ? /^-?\d+$/ : /^\d+$/
      if (!allowed.test(value)) return invalid('is not a decimal number')
      return { ok: true, value: `${width}'d${value}` }
    }
  }
}

/**
 * Encode one generic into the backend's literal syntax, e.g. `32'hDAC00001`,
 * `2'b10`, `8'd7`, `1'b1`, `8` or `"text"`.
 */
export function encodeGeneric(name: string, definition: GenericDefinition): Result<string, EncodingError> {
  const value = String(definition.value).trim()
  const type = normalizeGenericType(definition.type)

  switch (type) {
    case 'boolean': {
      const raw = definition.value
      const truthy = raw === true || raw === 1 || value.toLowerCase() === 'true' || value === '1'
      return { ok: true, value: `1'b${truthy ? 1 : 0}` }
    }
    case 'bit':
      if (value !== '0' && value !== '1') {
        return {
          ok: false,
          error: { type: 'invalid-digits', message: `Generic '${name}' of type bit must be 0 or 1, got '${value}'`, fallback: value },
        }
      }
      return { ok: true, value: `1'b${value}` }
    case 'bit_vector':
    case 'unsigned':
    case 'signed':
      return encodeVector(name, type, definition, value)
    case 'integer':
    case 'real':
      return { ok: true, value }
    case 'string':
      // Embedded quotes are not escaped
      return { ok: true, value: `"${value}"` }
    case undefined:
      return {
        ok: false,
        error: { type: 'unknown-type', message: `Unknown generic type '${definition.type}' for '${name}', using raw value`, fallback: value },
      }
  }
}

export function formatGenericArgument(name: string, literal: string): string {
  return `-generic ${name.trim()}=${literal}`
}

/**
 * Encode every generic in declaration order into one backend argument
 * string. Runtime-only generics whose value still holds a placeholder are
 * skipped; an unknown numeric format and encoding errors are logged as
 * warnings, and on an encoding error the raw value is used.
 */
export function encodeAll(generics: Record<string, GenericDefinition> | undefined, log: ModuleLog): string {
  const args: string[] = []

  for (const [name, definition] of Object.entries(generics ?? {})) {
    if (definition.runtime && PLACEHOLDER.test(String(definition.value))) {
      log.info(`Skipping unresolved runtime generic: ${name} = ${definition.value}`)
      continue
    }

    const type = normalizeGenericType(definition.type)
    if (isVectorType(type) && hasUnknownFormat(definition.format)) {
      log.warning(`Generic '${name}' has unknown numeric format '${definition.format}', using ${numericBase(type, definition.format)}`)
    }

    const encoded = encodeGeneric(name, definition)
    if (encoded.ok) {
      args.push(formatGenericArgument(name, encoded.value))
    } else {
      log.warning(encoded.error.message)
      args.push(formatGenericArgument(name, encoded.error.fallback))
    }
  }

  return args.join(' ')
}
