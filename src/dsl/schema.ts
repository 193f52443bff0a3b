/**
 * Job definition schema.
 *
 * Job definitions are JSON documents (snake_case keys) describing one
 * external tool: its methods, templates, context builders, execution
 * backends and output parsing rules. Every rule family is a closed set of
 * tagged variants, so an unknown kind fails at load time instead of being
 * silently ignored. Parsing normalizes the document into the camelCase
 * `JobDefinition` shape used by the engine.
 */

import { z } from 'zod';
import { AssetKind } from '../domain/asset';

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

const NonEmptyString = z.string().min(1);

/** `string | string[]` joined with newlines; escaped newlines/quotes are unescaped. */
const TemplateText = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('\n') : value))
  .transform((value) => value.replace(/\\n/g, '\n').replace(/\\"/g, '"'));

const RegexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' },
);

const EnvironmentMap = z
  .record(z.union([z.string(), z.number(), z.boolean()]))
  .default({})
  .transform((env) => Object.fromEntries(Object.entries(env).map(([k, v]) => [k, String(v)])));

/** Seconds; must be positive. */
const TimeoutSec = z.number().positive();

// ---------------------------------------------------------------------------
// Method resolution
// ---------------------------------------------------------------------------

const ConditionSchema = z.union([
  z
    .object({ requires_any: z.array(NonEmptyString).min(1) })
    .strict()
    .transform((c) => ({ kind: 'requiresAny' as const, keys: c.requires_any })),
  z
    .object({ requires_all: z.array(NonEmptyString).min(1) })
    .strict()
    .transform((c) => ({ kind: 'requiresAll' as const, keys: c.requires_all })),
  z
    .object({ patterns: z.record(RegexSource) })
    .strict()
    .transform((c) => ({ kind: 'patterns' as const, patterns: c.patterns })),
]);

export type Condition = z.output<typeof ConditionSchema>;

const ResolutionRuleSchema = z.object({
  condition: ConditionSchema,
  method: NonEmptyString.optional(),
  description: z.string().optional(),
});

const UnderstandingSchema = z.object({
  keywords: z.array(NonEmptyString).default([]),
  aliases: z.array(NonEmptyString).default([]),
  method: NonEmptyString.optional(),
  action: NonEmptyString.optional(),
});

export interface ResolutionRule {
  name: string;
  condition: Condition;
  method: string;
}

export interface Understanding {
  phrase: string;
  keywords: string[];
  method: string;
}

// ---------------------------------------------------------------------------
// Context builders
// ---------------------------------------------------------------------------

const TransformSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('list_to_string'), separator: z.string().default(' ') }).strict(),
  z.object({ type: z.literal('unit_conversion'), factor: z.number().default(1) }).strict(),
  z
    .object({
      type: z.literal('steps_calculation'),
      multiplier: z.number().default(1000),
      timestep: z.number().refine((n) => n !== 0, { message: 'timestep must be non-zero' }).default(1),
    })
    .strict(),
]);

export type Transform = z.output<typeof TransformSchema>;

const ComputationSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('ps_to_steps'),
      source: NonEmptyString,
      timestep: NonEmptyString,
      scale: z.number().default(1000),
      default: z.unknown().optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('vector_component'),
      source: NonEmptyString,
      index: z.union([z.literal(0), z.literal(1), z.literal(2)]),
      default: z.unknown().optional(),
    })
    .strict(),
]);

type RawComputation = z.output<typeof ComputationSchema>;

export type Computation =
  | { type: 'ps_to_steps'; source: string; timestep: string; scale: number; defaultValue?: unknown }
  | { type: 'vector_component'; source: string; index: 0 | 1 | 2; defaultValue?: unknown };

function normalizeComputation(raw: RawComputation): Computation {
  const fallback = raw.default !== undefined ? { defaultValue: raw.default } : {};
  if (raw.type === 'ps_to_steps') {
    return { type: raw.type, source: raw.source, timestep: raw.timestep, scale: raw.scale, ...fallback };
  }
  return { type: raw.type, source: raw.source, index: raw.index, ...fallback };
}

const ContextBuilderSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('parameter_transform'),
      source: NonEmptyString,
      transform: TransformSchema,
      default: z.unknown().optional(),
      description: z.string().optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('computed_value'),
      computation: ComputationSchema,
      default: z.unknown().optional(),
      description: z.string().optional(),
    })
    .strict(),
]);

export type ContextBuilder =
  | { type: 'parameter_transform'; name: string; source: string; transform: Transform; defaultValue?: unknown }
  | { type: 'computed_value'; name: string; computation: Computation; defaultValue?: unknown };

// ---------------------------------------------------------------------------
// Templates and generated files
// ---------------------------------------------------------------------------

const GeneratorSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('template'), template: TemplateText }).strict(),
  z.object({ type: z.literal('data_file'), template: TemplateText }).strict(),
]);

export type Generator = z.output<typeof GeneratorSchema>;

const FileSpecSchema = z
  .object({
    name: NonEmptyString.optional(),
    content: TemplateText.optional(),
    generator: NonEmptyString.optional(),
  })
  .strict();

export interface FileSpec {
  key: string;
  /** File name in the working directory (defaults to the key). */
  name: string;
  content?: string;
  generator?: string;
}

const PostProcessorSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('array_indexing'), pattern: RegexSource.optional() }).strict(),
]);

export type PostProcessor = z.output<typeof PostProcessorSchema>;

// ---------------------------------------------------------------------------
// Methods
// ---------------------------------------------------------------------------

const OutputDeclSchema = z.object({
  name: NonEmptyString,
  file: NonEmptyString,
  type: z.string().default('data'),
});

export type OutputDecl = z.output<typeof OutputDeclSchema>;

const MethodSchema = z.object({
  description: z.string().optional(),
  input_template: TemplateText.optional(),
  template_file: NonEmptyString.optional(),
  input_file: NonEmptyString.default('input.in'),
  files: z.record(FileSpecSchema).default({}),
  needs: z.array(NonEmptyString).default([]),
  parameter_defaults: z.record(z.unknown()).default({}),
  outputs: z.array(OutputDeclSchema).default([]),
  execution: z
    .object({
      timeout: TimeoutSec.optional(),
      command_template: NonEmptyString.optional(),
    })
    .default({}),
});

export interface MethodDefinition {
  name: string;
  description?: string;
  /** Main input template text (inline, or read from `templateFile` at load). */
  template?: string;
  /** Template path as declared, resolved against the document directory. */
  templateFile?: string;
  /** File name the main template renders to. */
  inputFile: string;
  files: FileSpec[];
  needs: string[];
  parameterDefaults: Record<string, unknown>;
  outputs: OutputDecl[];
  timeoutSec?: number;
  commandTemplate?: string;
}

// ---------------------------------------------------------------------------
// Execution backends
// ---------------------------------------------------------------------------

export type ExecutionMode = 'local' | 'docker' | 'hpc';
export const EXECUTION_MODES: readonly ExecutionMode[] = ['local', 'docker', 'hpc'];

const LocalBackendSchema = z.object({
  executable: NonEmptyString.optional(),
  command_template: NonEmptyString.optional(),
  environment: EnvironmentMap,
  timeout: TimeoutSec.optional(),
});

const DockerBackendSchema = z.object({
  image: NonEmptyString,
  executable: NonEmptyString.optional(),
  command: NonEmptyString.optional(),
  command_template: NonEmptyString.optional(),
  environment: EnvironmentMap,
  timeout: TimeoutSec.optional(),
  mount_path: NonEmptyString.default('/work'),
});

const HpcBackendSchema = z.object({
  executable: NonEmptyString.optional(),
  command_template: NonEmptyString.optional(),
  submit_command: NonEmptyString.default('sbatch --wait'),
  directives: z.array(z.string()).default([]),
  environment: EnvironmentMap,
  timeout: TimeoutSec.optional(),
});

export interface LocalBackendConfig {
  executable?: string;
  commandTemplate?: string;
  environment: Record<string, string>;
  timeoutSec?: number;
}

export interface DockerBackendConfig extends LocalBackendConfig {
  image: string;
  command?: string;
  mountPath: string;
}

export interface HpcBackendConfig extends LocalBackendConfig {
  submitCommand: string;
  directives: string[];
}

export interface ExecutionConfig {
  mode?: ExecutionMode;
  local?: LocalBackendConfig;
  docker?: DockerBackendConfig;
  hpc?: HpcBackendConfig;
}

const ExecutionSchema = z.object({
  mode: z.enum(['local', 'docker', 'hpc']).optional(),
  local: LocalBackendSchema.optional(),
  docker: DockerBackendSchema.optional(),
  hpc: HpcBackendSchema.optional(),
});

// ---------------------------------------------------------------------------
// Output parsing and results
// ---------------------------------------------------------------------------

const RegexPatternSchema = z.union([
  RegexSource.transform((pattern) => ({ pattern })),
  z.object({ name: NonEmptyString, pattern: RegexSource }).strict(),
]);

const ParserSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('json') }).strict(),
  z.object({ type: z.literal('regex'), patterns: z.array(RegexPatternSchema).min(1) }).strict(),
  z
    .object({
      type: z.literal('columnar'),
      skip_lines: z.number().int().min(0).default(0),
      columns: z.array(NonEmptyString).optional(),
    })
    .strict(),
]);

export type ParserSpec =
  | { type: 'json' }
  | { type: 'regex'; patterns: Array<{ name?: string; pattern: string }> }
  | { type: 'columnar'; skipLines: number; columns?: string[] };

const OutputRuleSchema = z
  .object({
    name: NonEmptyString.optional(),
    pattern: NonEmptyString.optional(),
    parser: NonEmptyString.default('json'),
  })
  .strict()
  .refine((rule) => rule.name !== undefined || rule.pattern !== undefined, {
    message: 'An output rule needs a "name" or a "pattern"',
  });

export interface OutputRule {
  name?: string;
  pattern?: string;
  parser: string;
}

export type ParseErrorPolicy = 'ignore' | 'fail';

const ResultAssetRuleSchema = z.object({
  kind: z.enum([AssetKind.Params, AssetKind.Results, AssetKind.Artifact]),
  requires_data: z.array(NonEmptyString).default([]),
  payload: z.record(NonEmptyString),
});

export interface ResultAssetRule {
  name: string;
  kind: AssetKind.Params | AssetKind.Results | AssetKind.Artifact;
  requiresData: string[];
  /** Output payload key -> source field in the parsed results or params. */
  payload: Record<string, string>;
}

export interface ResultField {
  unit?: string;
  description?: string;
}

export const DEFAULT_EXPECTED_OUTPUTS = ['*.dat', '*.txt', '*.json', '*.out', '*.log'];

// ---------------------------------------------------------------------------
// Job definition
// ---------------------------------------------------------------------------

export const JobDefinitionDocumentSchema = z.object({
  name: NonEmptyString,
  description: z.string().optional(),
  version: z.string().optional(),
  methods: z.record(MethodSchema).default({}),
  method_resolution: z.record(ResolutionRuleSchema).default({}),
  understands: z.record(UnderstandingSchema).default({}),
  parameter_mapping: z.record(z.array(NonEmptyString)).default({}),
  context_builders: z.record(ContextBuilderSchema).default({}),
  generators: z.record(GeneratorSchema).default({}),
  template_syntax: z.object({ escape_sequences: z.record(z.string()).default({}) }).default({}),
  template_post_processors: z.array(PostProcessorSchema).default([]),
  execution: ExecutionSchema.optional(),
  expected_outputs: z.array(NonEmptyString).min(1).optional(),
  parsers: z.record(ParserSchema).default({}),
  output_parsing: z
    .object({
      files: z.array(OutputRuleSchema).default([]),
      on_error: z.enum(['ignore', 'fail']).default('ignore'),
    })
    .default({}),
  default_results: z.record(z.unknown()).default({}),
  results: z
    .object({
      format: z.record(z.object({ unit: z.string().optional(), description: z.string().optional() })).default({}),
    })
    .default({}),
  result_assets: z.record(ResultAssetRuleSchema).default({}),
  log_template: z.string().optional(),
});

export type JobDefinitionDocument = z.input<typeof JobDefinitionDocumentSchema>;

/** Normalized, engine-facing job definition. */
export interface JobDefinition {
  name: string;
  description?: string;
  version?: string;
  /** Path of the document the definition was loaded from. */
  source?: string;
  /** Methods in declaration order. */
  methods: MethodDefinition[];
  resolutionRules: ResolutionRule[];
  understands: Understanding[];
  parameterMapping: Record<string, string[]>;
  contextBuilders: ContextBuilder[];
  generators: Record<string, Generator>;
  escapeSequences: Record<string, string>;
  postProcessors: PostProcessor[];
  execution: ExecutionConfig;
  expectedOutputs: string[];
  parsers: Record<string, ParserSpec>;
  outputRules: OutputRule[];
  onParseError: ParseErrorPolicy;
  defaultResults: Record<string, unknown>;
  resultFormat: Record<string, ResultField>;
  resultAssets: ResultAssetRule[];
  logTemplate?: string;
}

type ParsedDocument = z.output<typeof JobDefinitionDocumentSchema>;

function normalizeBackend<T extends { executable?: string; command_template?: string; environment: Record<string, string>; timeout?: number }>(
  raw: T,
): LocalBackendConfig {
  const config: LocalBackendConfig = { environment: raw.environment };
  if (raw.executable !== undefined) config.executable = raw.executable;
  if (raw.command_template !== undefined) config.commandTemplate = raw.command_template;
  if (raw.timeout !== undefined) config.timeoutSec = raw.timeout;
  return config;
}

function normalizeExecution(raw: ParsedDocument['execution']): ExecutionConfig {
  // A document without an execution block runs locally with defaults.
  if (!raw || (!raw.local && !raw.docker && !raw.hpc)) {
    return { mode: raw?.mode, local: { environment: {} } };
  }
  const config: ExecutionConfig = {};
  if (raw.mode) config.mode = raw.mode;
  if (raw.local) config.local = normalizeBackend(raw.local);
  if (raw.docker) {
    config.docker = {
      ...normalizeBackend(raw.docker),
      image: raw.docker.image,
      mountPath: raw.docker.mount_path,
      ...(raw.docker.command !== undefined ? { command: raw.docker.command } : {}),
    };
  }
  if (raw.hpc) {
    config.hpc = {
      ...normalizeBackend(raw.hpc),
      submitCommand: raw.hpc.submit_command,
      directives: raw.hpc.directives,
    };
  }
  return config;
}

function normalizeMethod(name: string, raw: ParsedDocument['methods'][string]): MethodDefinition {
  const method: MethodDefinition = {
    name,
    inputFile: raw.input_file,
    files: Object.entries(raw.files).map(([key, spec]) => ({
      key,
      name: spec.name ?? key,
      ...(spec.content !== undefined ? { content: spec.content } : {}),
      ...(spec.generator !== undefined ? { generator: spec.generator } : {}),
    })),
    needs: raw.needs,
    parameterDefaults: raw.parameter_defaults,
    outputs: raw.outputs,
  };
  if (raw.description !== undefined) method.description = raw.description;
  if (raw.input_template !== undefined) method.template = raw.input_template;
  if (raw.template_file !== undefined) method.templateFile = raw.template_file;
  if (raw.execution.timeout !== undefined) method.timeoutSec = raw.execution.timeout;
  if (raw.execution.command_template !== undefined) method.commandTemplate = raw.execution.command_template;
  return method;
}

function normalizeParser(raw: z.output<typeof ParserSchema>): ParserSpec {
  switch (raw.type) {
    case 'json':
      return { type: 'json' };
    case 'regex':
      return { type: 'regex', patterns: raw.patterns };
    case 'columnar':
      return {
        type: 'columnar',
        skipLines: raw.skip_lines,
        ...(raw.columns !== undefined ? { columns: raw.columns } : {}),
      };
  }
}

/** Convert a schema-validated document into the engine-facing shape. */
export function normalizeDocument(doc: ParsedDocument, source?: string): JobDefinition {
  const definition: JobDefinition = {
    name: doc.name,
    methods: Object.entries(doc.methods).map(([name, raw]) => normalizeMethod(name, raw)),
    resolutionRules: Object.entries(doc.method_resolution).map(([name, rule]) => ({
      name,
      condition: rule.condition,
      method: rule.method ?? name,
    })),
    understands: Object.entries(doc.understands).map(([phrase, details]) => ({
      phrase,
      keywords: [...details.keywords, ...details.aliases],
      method: details.method ?? details.action ?? phrase,
    })),
    parameterMapping: doc.parameter_mapping,
    contextBuilders: Object.entries(doc.context_builders).map(([name, raw]): ContextBuilder => {
      const fallback = raw.default !== undefined ? { defaultValue: raw.default } : {};
      if (raw.type === 'parameter_transform') {
        return { type: raw.type, name, source: raw.source, transform: raw.transform, ...fallback };
      }
      return { type: raw.type, name, computation: normalizeComputation(raw.computation), ...fallback };
    }),
    generators: doc.generators,
    escapeSequences: doc.template_syntax.escape_sequences,
    postProcessors: doc.template_post_processors,
    execution: normalizeExecution(doc.execution),
    expectedOutputs: doc.expected_outputs ?? DEFAULT_EXPECTED_OUTPUTS,
    parsers: Object.fromEntries(Object.entries(doc.parsers).map(([name, raw]) => [name, normalizeParser(raw)])),
    outputRules: doc.output_parsing.files,
    onParseError: doc.output_parsing.on_error,
    defaultResults: doc.default_results,
    resultFormat: doc.results.format,
    resultAssets: Object.entries(doc.result_assets).map(([name, rule]) => ({
      name,
      kind: rule.kind,
      requiresData: rule.requires_data,
      payload: rule.payload,
    })),
  };
  if (doc.description !== undefined) definition.description = doc.description;
  if (doc.version !== undefined) definition.version = doc.version;
  if (doc.log_template !== undefined) definition.logTemplate = doc.log_template;
  if (source !== undefined) definition.source = source;
  return definition;
}

/** Declared method names in order. */
export function methodNames(definition: JobDefinition): string[] {
  return definition.methods.map((method) => method.name);
}

export function findMethod(definition: JobDefinition, name: string): MethodDefinition | undefined {
  return definition.methods.find((method) => method.name === name);
}

/** Declared execution modes in canonical order. */
export function declaredModes(definition: JobDefinition): ExecutionMode[] {
  return EXECUTION_MODES.filter((mode) => definition.execution[mode] !== undefined);
}
