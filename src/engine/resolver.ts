/**
 * Method resolution.
 *
 * Picks the method a run executes: an explicit `method` param, then the
 * definition's resolution rules, then keyword understanding, then the
 * first declared method.
 */

import { Condition, JobDefinition, findMethod, methodNames } from '../dsl/schema';
import { EngineError, noMethodsError, unknownMethodError } from '../domain/errors';

export interface MethodResolution {
  method: string;
  /** `explicit`, `rule:<name>`, `understands:<phrase>` or `first-declared`. */
  reason: string;
}

function isPresent(params: Record<string, unknown>, key: string): boolean {
  return key in params && params[key] !== undefined && params[key] !== null;
}

function stringForm(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

export function conditionHolds(condition: Condition, params: Record<string, unknown>): boolean {
  switch (condition.kind) {
    case 'requiresAny':
      return condition.keys.some((key) => isPresent(params, key));
    case 'requiresAll':
      return condition.keys.every((key) => isPresent(params, key));
    case 'patterns':
      return Object.entries(condition.patterns).some(
        ([key, pattern]) => isPresent(params, key) && new RegExp(pattern).test(stringForm(params[key])),
      );
  }
}

function declared(definition: JobDefinition, method: string): string {
  if (!findMethod(definition, method)) {
    throw new EngineError(unknownMethodError(definition.name, method, methodNames(definition)));
  }
  return method;
}

export function resolveMethod(definition: JobDefinition, params: Record<string, unknown>): MethodResolution {
  const names = methodNames(definition);
  if (names.length === 0) {
    throw new EngineError(noMethodsError(definition.name));
  }

  const explicit = params.method;
  if (typeof explicit === 'string' && explicit !== '') {
    if (names.includes(explicit)) {
      return { method: explicit, reason: 'explicit' };
    }
    throw new EngineError(unknownMethodError(definition.name, explicit, names));
  }

  for (const rule of definition.resolutionRules) {
    if (conditionHolds(rule.condition, params)) {
      return { method: declared(definition, rule.method), reason: `rule:${rule.name}` };
    }
  }

  if (definition.understands.length > 0) {
    const haystack = Object.values(params).map(stringForm).join(' ').toLowerCase();
    for (const entry of definition.understands) {
      if (entry.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()))) {
        return { method: declared(definition, entry.method), reason: `understands:${entry.phrase}` };
      }
    }
  }

  return { method: names[0], reason: 'first-declared' };
}
