/**
 * Template rendering.
 *
 * Substitution is "safe": `$name` and `${name}` are replaced when the
 * context has the name and otherwise left as written; `$$` is a literal
 * dollar sign.
 */

import { Asset, AssetKind } from '../domain/asset';
import { EngineError, missingInputError, noInputFilesError } from '../domain/errors';
import { JobDefinition, MethodDefinition, PostProcessor } from '../dsl/schema';
import { TemplateContext } from './context';

const PLACEHOLDER = /\$(?:(\$)|([_A-Za-z][_A-Za-z0-9]*)|\{([_A-Za-z][_A-Za-z0-9]*)\})/g;
const DEFAULT_ARRAY_INDEX = '\\$\\{([_A-Za-z][_A-Za-z0-9]*)\\[(\\d+)\\]\\}';
const DATA_FIELD = /\{([_A-Za-z][_A-Za-z0-9]*)\}/g;

/** Text form of a context value inside a rendered file. */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value) ?? '';
}

function lookup(ctx: TemplateContext, key: string): { found: boolean; value: unknown } {
  if (!Object.prototype.hasOwnProperty.call(ctx, key) || ctx[key] === undefined) return { found: false, value: undefined };
  return { found: true, value: ctx[key] };
}

export function safeSubstitute(template: string, ctx: TemplateContext): string {
  return template.replace(PLACEHOLDER, (whole, dollar?: string, bare?: string, braced?: string) => {
    if (dollar) return '$';
    const key = bare ?? braced;
    if (key === undefined) return whole;
    const { found, value } = lookup(ctx, key);
    return found ? formatValue(value) : whole;
  });
}

export function applyEscapeSequences(text: string, sequences: Record<string, string>): string {
  let out = text;
  for (const [from, to] of Object.entries(sequences)) {
    if (from) out = out.split(from).join(to);
  }
  return out;
}

/** Resolve `${name[k]}` placeholders against list-valued context entries. */
export function applyArrayIndexing(text: string, ctx: TemplateContext, pattern = DEFAULT_ARRAY_INDEX): string {
  return text.replace(new RegExp(pattern, 'g'), (whole, name?: string, index?: string) => {
    if (name === undefined || index === undefined) return whole;
    const { found, value } = lookup(ctx, name);
    if (!found || !Array.isArray(value)) return whole;
    const i = Number(index);
    if (!Number.isInteger(i) || i < 0 || i >= value.length) return whole;
    return formatValue(value[i]);
  });
}

function applyPostProcessors(text: string, ctx: TemplateContext, processors: PostProcessor[]): string {
  if (processors.length === 0) return applyArrayIndexing(text, ctx);
  let out = text;
  for (const processor of processors) {
    switch (processor.type) {
      case 'array_indexing':
        out = applyArrayIndexing(out, ctx, processor.pattern);
        break;
    }
  }
  return out;
}

export function renderTemplate(template: string, ctx: TemplateContext, definition: JobDefinition): string {
  const escaped = applyEscapeSequences(template, definition.escapeSequences);
  const substituted = safeSubstitute(escaped, ctx);
  return applyPostProcessors(substituted, ctx, definition.postProcessors);
}

/** Fill `{key}` placeholders from a System payload; unknown keys stay. */
export function renderDataFile(template: string, system: Record<string, unknown>): string {
  return template.replace(DATA_FIELD, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(system, key) ? formatValue(system[key]) : whole,
  );
}

/**
 * Check every `needs` entry: an input asset of that kind, a caller param,
 * or a param under one of its aliases.
 */
export function checkNeeds(
  definition: JobDefinition,
  method: MethodDefinition,
  inputAssets: Asset[],
  params: Record<string, unknown>,
): void {
  const kinds = new Set(inputAssets.map((asset) => asset.kind.toLowerCase()));
  for (const need of method.needs) {
    const aliases = definition.parameterMapping[need] ?? [];
    const satisfied =
      kinds.has(need.toLowerCase()) ||
      params[need] !== undefined ||
      aliases.some((alias) => params[alias] !== undefined);
    if (!satisfied) {
      throw new EngineError(missingInputError(need, Object.keys(params), [...kinds], aliases));
    }
  }
}

/** Render every file a method writes into its working directory. */
export function renderMethodFiles(
  definition: JobDefinition,
  method: MethodDefinition,
  ctx: TemplateContext,
  inputAssets: Asset[],
  params: Record<string, unknown>,
): Record<string, string> {
  checkNeeds(definition, method, inputAssets, params);

  const files: Record<string, string> = {};
  if (method.template !== undefined) {
    files[method.inputFile] = renderTemplate(method.template, ctx, definition);
  }

  const system = inputAssets.find((asset) => asset.kind === AssetKind.System);
  for (const file of method.files) {
    if (file.content !== undefined) {
      files[file.name] = renderTemplate(file.content, ctx, definition);
      continue;
    }
    const generator = file.generator !== undefined ? definition.generators[file.generator] : undefined;
    if (!generator) continue;
    files[file.name] =
      generator.type === 'data_file'
        ? renderDataFile(generator.template, system ? system.payload : {})
        : renderTemplate(generator.template, ctx, definition);
  }

  if (Object.keys(files).length === 0) {
    throw new EngineError(noInputFilesError(definition.name, method.name));
  }
  return files;
}
