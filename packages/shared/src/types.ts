export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type OperationMode = 'open' | 'build' | 'export'

export type Scalar = string | number | boolean | null

export interface DeviceInfo {
  part_name: string
  board_name?: string
  board_part?: string
  [key: string]: unknown
}

export type NumericBase = 'hex' | 'binary' | 'decimal'

export type GenericType =
  | 'bit'
  | 'bit_vector'
  | 'unsigned'
  | 'signed'
  | 'integer'
  | 'real'
  | 'boolean'
  | 'string'

export interface GenericDefinition {
  type: string
  value: string | number | boolean
  width?: number | string
  format?: string
  runtime?: boolean
}

export interface ProjectInformation {
  project_name: string
  top_level_file_name: string
  device_info: DeviceInfo
  top_level_generics?: Record<string, GenericDefinition>
  [key: string]: unknown
}

export interface ConstraintConfig {
  file: string
  fileset?: string
  execution?: string
  properties?: Record<string, string> | Record<string, string>[]
}

export interface BlockDesignConfig {
  file: string
  commands?: string[]
}

export interface ProjectConfiguration {
  project_information: ProjectInformation
  constraints?: ConstraintConfig[]
  block_designs?: BlockDesignConfig[]
  synth_options?: Record<string, string>
  impl_options?: Record<string, string>
  environment_setup?: Record<string, string>
  [key: string]: unknown
}

export type RawFileType =
  | 'VHDL'
  | 'VHDL2008'
  | 'VHDL2019'
  | 'VERILOG'
  | 'SYSTEMVERILOG'
  | 'X_XCI'
  | 'X_BD'
  | 'EXTERNAL'

export interface CompileOrderRecord {
  type: string
  path: string
  library?: string
  ver_tag?: string
  file_ext?: string
}

export interface CompileOrderFile {
  files: CompileOrderRecord[]
}

export type DeclaredType = 'HDL_SOURCE' | 'IP_CORE' | 'BLOCK_DESIGN' | 'EXTERNAL_CONSTRAINT_OR_SCRIPT'

export type HdlDialect = 'vhdl' | 'verilog' | 'systemverilog'

export type VhdlVersion = 'VHDL' | 'VHDL2008' | 'VHDL2019'

export interface FileEntry {
  readonly path: string
  readonly declaredType: DeclaredType
  readonly dialect?: HdlDialect
  readonly declaredVersion?: VhdlVersion
  readonly library?: string
  readonly versionTag?: string
  readonly extension?: string
}

export type StepStatus = 'success' | 'warning' | 'error'

export type Severity = 'warning' | 'error'

export interface LogMessage {
  severity: Severity
  text: string
}

export interface StepResult<T = unknown> {
  step: string
  module: string
  status: StepStatus
  warnings: number
  errors: number
  data?: T
}
