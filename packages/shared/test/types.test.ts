import { describe, it, expect } from 'vitest'
import { Ajv } from 'ajv'
import type { ProjectConfiguration, Result } from '../src/types.js'
import { compileOrderSchema, projectConfigurationSchema } from '../src/schema.js'

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })

describe('types', () => {
  it('ProjectConfiguration accepts a minimal project', () => {
    const config: ProjectConfiguration = {
      project_information: {
        project_name: 'blinky',
        top_level_file_name: 'top.vhd',
        device_info: { part_name: 'xc7a35tcpg236-1' },
      },
    }
    expect(config.project_information.project_name).toBe('blinky')
  })

  it('Result type works for success', () => {
    const result: Result<string> = { ok: true, value: 'hello' }
    expect(result.ok).toBe(true)
  })

  it('Result type works for failure', () => {
    const result: Result<string, string> = { ok: false, error: 'fail' }
    expect(result.ok).toBe(false)
  })
})

describe('projectConfigurationSchema', () => {
  const validate = ajv.compile(projectConfigurationSchema)

  it('accepts generics, constraints and block designs', () => {
    const valid = validate({
      project_information: {
        project_name: 'blinky',
        top_level_file_name: 'top.vhd',
        device_info: { part_name: 'xc7a35tcpg236-1', board_name: 'basys3' },
        top_level_generics: {
          G_WIDTH: { type: 'integer', value: 8 },
          G_ID: { type: 'bit_vector', value: 'DAC00001', width: 32, format: 'hex' },
        },
      },
      constraints: [
        { file: 'pins.xdc' },
        { file: 'timing.tcl', properties: [{ FILESET: 'utils_1' }] },
      ],
      block_designs: [{ file: 'system.bd', commands: ['validate_bd_design'] }],
    })
    expect(valid).toBe(true)
  })

  it('requires a part name', () => {
    const valid = validate({
      project_information: { project_name: 'blinky', top_level_file_name: 'top.vhd', device_info: {} },
    })
    expect(valid).toBe(false)
    expect(validate.errors?.[0].keyword).toBe('required')
  })

  it('rejects a generic without a value', () => {
    const valid = validate({
      project_information: {
        project_name: 'blinky',
        top_level_file_name: 'top.vhd',
        device_info: { part_name: 'xc7a35tcpg236-1' },
        top_level_generics: { G_WIDTH: { type: 'integer' } },
      },
    })
    expect(valid).toBe(false)
  })
})

describe('compileOrderSchema', () => {
  const validate = ajv.compile(compileOrderSchema)

  it('accepts records with optional fields', () => {
    expect(validate({ files: [{ type: 'VHDL', path: 'top.vhd', library: 'work', ver_tag: '2008' }] })).toBe(true)
  })

  it('rejects a record without a path', () => {
    expect(validate({ files: [{ type: 'VHDL' }] })).toBe(false)
  })
})
