const stringMap = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const

const genericSchema = {
  type: 'object',
  required: ['type', 'value'],
  properties: {
    type: { type: 'string', minLength: 1 },
    value: { type: ['string', 'number', 'boolean'] },
    width: { type: ['integer', 'string'] },
    format: { type: 'string' },
    runtime: { type: 'boolean' },
  },
} as const

export const projectConfigurationSchema = {
  type: 'object',
  required: ['project_information'],
  properties: {
    project_information: {
      type: 'object',
      required: ['project_name', 'top_level_file_name', 'device_info'],
      properties: {
        project_name: { type: 'string', minLength: 1 },
        top_level_file_name: { type: 'string', minLength: 1 },
        device_info: {
          type: 'object',
          required: ['part_name'],
          properties: {
            part_name: { type: 'string', minLength: 1 },
            board_name: { type: 'string' },
            board_part: { type: 'string' },
          },
        },
        top_level_generics: {
          type: 'object',
          additionalProperties: genericSchema,
        },
      },
    },
    constraints: {
      type: 'array',
      items: {
        type: 'object',
        required: ['file'],
        properties: {
          file: { type: 'string', minLength: 1 },
          fileset: { type: 'string' },
          execution: { type: 'string' },
          properties: {
            oneOf: [
              stringMap,
              { type: 'array', items: stringMap },
            ],
          },
        },
      },
    },
    block_designs: {
      type: 'array',
      items: {
        type: 'object',
        required: ['file'],
        properties: {
          file: { type: 'string', minLength: 1 },
          commands: { type: 'array', items: { type: 'string' } },
        },
      },
    },
    synth_options: stringMap,
    impl_options: stringMap,
    environment_setup: stringMap,
  },
} as const

export const compileOrderSchema = {
  type: 'object',
  required: ['files'],
  properties: {
    files: {
      type: 'array',
      items: {
        type: 'object',
        required: ['type', 'path'],
        properties: {
          type: { type: 'string', minLength: 1 },
          path: { type: 'string', minLength: 1 },
          library: { type: 'string' },
          ver_tag: { type: 'string' },
          file_ext: { type: 'string' },
        },
      },
    },
  },
} as const
