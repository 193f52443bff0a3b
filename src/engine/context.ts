/**
 * Template context construction.
 *
 * A context is built in layers; a later layer only fills keys that are
 * still absent:
 *   fixed values -> caller params -> aliases -> input asset payloads ->
 *   method parameter defaults -> context builders
 */

import { Asset } from '../domain/asset';
import { Computation, ContextBuilder, JobDefinition, MethodDefinition, Transform } from '../dsl/schema';
import { logger } from '../logger';

const log = logger.child({ module: 'context' });

export const DEFAULT_SEED = 12345;

export type TemplateContext = Record<string, unknown>;

export interface ContextOptions {
  /** Clock used for the `timestamp` entry. */
  now?: () => Date;
}

class BuilderFailure extends Error {}

function has(ctx: TemplateContext, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(ctx, key) && ctx[key] !== undefined;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function requireNumber(value: unknown, what: string): number {
  const n = toNumber(value);
  if (n === undefined) throw new BuilderFailure(`${what} is not numeric: ${JSON.stringify(value)}`);
  return n;
}

function applyTransform(transform: Transform, value: unknown): unknown {
  switch (transform.type) {
    case 'list_to_string':
      return Array.isArray(value) ? value.map((item) => String(item)).join(transform.separator) : String(value);
    case 'unit_conversion':
      return requireNumber(value, 'unit_conversion input') * transform.factor;
    case 'steps_calculation':
      return Math.trunc((requireNumber(value, 'steps_calculation input') * transform.multiplier) / transform.timestep);
  }
}

/** Evaluate a computation; `undefined` means an input was missing. */
function compute(computation: Computation, ctx: TemplateContext): unknown {
  switch (computation.type) {
    case 'ps_to_steps': {
      if (!has(ctx, computation.source) || !has(ctx, computation.timestep)) return undefined;
      const span = requireNumber(ctx[computation.source], computation.source);
      const timestep = requireNumber(ctx[computation.timestep], computation.timestep);
      if (timestep === 0) throw new BuilderFailure(`${computation.timestep} is zero`);
      return Math.trunc((span * computation.scale) / timestep);
    }
    case 'vector_component': {
      if (!has(ctx, computation.source)) return undefined;
      const vector = ctx[computation.source];
      if (!Array.isArray(vector)) return vector;
      return vector[computation.index];
    }
  }
}

/** Value a builder contributes, or `undefined` to add nothing. */
function evaluateBuilder(builder: ContextBuilder, ctx: TemplateContext): unknown {
  if (builder.type === 'parameter_transform') {
    if (!has(ctx, builder.source)) return builder.defaultValue;
    return applyTransform(builder.transform, ctx[builder.source]);
  }
  const value = compute(builder.computation, ctx);
  if (value !== undefined) return value;
  return builder.computation.defaultValue ?? builder.defaultValue ?? '';
}

export function applyContextBuilders(builders: ContextBuilder[], ctx: TemplateContext): void {
  for (const builder of builders) {
    if (has(ctx, builder.name)) continue;
    let value: unknown;
    try {
      value = evaluateBuilder(builder, ctx);
    } catch (err) {
      if (!(err instanceof BuilderFailure)) throw err;
      log.warn('Context builder failed, using default', { builder: builder.name, error: err.message });
      value = builder.defaultValue ?? '';
    }
    if (value !== undefined) ctx[builder.name] = value;
  }
}

/** Resolve canonical parameter names from their aliases. */
export function applyAliases(mapping: Record<string, string[]>, ctx: TemplateContext): void {
  for (const [canonical, aliases] of Object.entries(mapping)) {
    if (has(ctx, canonical)) continue;
    const alias = aliases.find((name) => has(ctx, name));
    if (alias !== undefined) ctx[canonical] = ctx[alias];
  }
}

export function buildContext(
  definition: JobDefinition,
  method: MethodDefinition,
  inputAssets: Asset[],
  params: Record<string, unknown>,
  options: ContextOptions = {},
): TemplateContext {
  const now = options.now ?? (() => new Date());
  const ctx: TemplateContext = {
    timestamp: now().toISOString(),
    seed: DEFAULT_SEED,
    ...params,
  };

  applyAliases(definition.parameterMapping, ctx);

  for (const asset of inputAssets) {
    const key = asset.kind.toLowerCase();
    if (!has(ctx, key)) ctx[key] = asset.payload;
  }

  for (const [key, value] of Object.entries(method.parameterDefaults)) {
    if (!has(ctx, key)) {
      ctx[key] = value;
      log.debug('Using parameter default', { job: definition.name, method: method.name, key });
    }
  }

  applyContextBuilders(definition.contextBuilders, ctx);
  return ctx;
}
