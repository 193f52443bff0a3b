/**
 * Job definition loader.
 *
 * Validates a raw document against the schema, checks cross references
 * (methods named by rules, parsers named by output rules, generators named
 * by files), reads external template files and freezes the result.
 */

import fs from 'fs/promises';
import path from 'path';
import { ZodIssue } from 'zod';
import { JobDefinition, JobDefinitionDocumentSchema, methodNames, normalizeDocument } from './schema';

export interface DefinitionIssue {
  /** Path to the offending field. */
  path: Array<string | number>;
  message: string;
  code: string;
}

/** Structured load failure for a single definition document. */
export class DefinitionError extends Error {
  readonly issues: DefinitionIssue[];
  readonly source?: string;

  constructor(message: string, issues: DefinitionIssue[], source?: string) {
    super(message);
    this.name = 'DefinitionError';
    this.issues = issues;
    this.source = source;
  }

  format(): string {
    const header = this.source ? `Job definition ${this.source} is invalid:` : 'Job definition is invalid:';
    const lines = [header];
    for (const issue of this.issues) {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      lines.push(`  - ${where}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

function fromZodIssues(zodIssues: ZodIssue[]): DefinitionIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter((p): p is string | number => typeof p === 'string' || typeof p === 'number'),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function crossReferenceIssues(definition: JobDefinition): DefinitionIssue[] {
  const issues: DefinitionIssue[] = [];
  const methods = new Set(methodNames(definition));
  const reference = (fieldPath: Array<string | number>, message: string) =>
    issues.push({ path: fieldPath, message, code: 'invalid_reference' });

  for (const rule of definition.resolutionRules) {
    if (!methods.has(rule.method)) {
      reference(['method_resolution', rule.name, 'method'], `Unknown method "${rule.method}"`);
    }
  }
  for (const entry of definition.understands) {
    if (!methods.has(entry.method)) {
      reference(['understands', entry.phrase, 'method'], `Unknown method "${entry.method}"`);
    }
  }
  definition.outputRules.forEach((rule, index) => {
    if (rule.parser !== 'json' && !(rule.parser in definition.parsers)) {
      reference(['output_parsing', 'files', index, 'parser'], `Unknown parser "${rule.parser}"`);
    }
  });
  for (const method of definition.methods) {
    for (const file of method.files) {
      if (file.generator !== undefined && !(file.generator in definition.generators)) {
        reference(['methods', method.name, 'files', file.key, 'generator'], `Unknown generator "${file.generator}"`);
      }
    }
  }
  const mode = definition.execution.mode;
  if (mode !== undefined && definition.execution[mode] === undefined) {
    reference(['execution', 'mode'], `Execution mode "${mode}" has no matching backend block`);
  }
  return issues;
}

function validateDocument(input: unknown, source?: string): JobDefinition {
  const result = JobDefinitionDocumentSchema.safeParse(input);
  if (!result.success) {
    const issues = fromZodIssues(result.error.issues);
    throw new DefinitionError(`Invalid job definition: ${issues.length} validation error(s)`, issues, source);
  }
  const definition = normalizeDocument(result.data, source);
  const issues = crossReferenceIssues(definition);
  if (issues.length > 0) {
    throw new DefinitionError(`Invalid job definition: ${issues.length} validation error(s)`, issues, source);
  }
  return definition;
}

/**
 * Validate an in-memory document. Methods that point at a `template_file`
 * keep the path only; use `loadJobDefinitionFile` to have it read.
 */
export function parseJobDefinition(input: unknown, source?: string): Readonly<JobDefinition> {
  return deepFreeze(validateDocument(input, source));
}

/** Read, validate and freeze a definition file, inlining its template files. */
export async function loadJobDefinitionFile(filePath: string): Promise<Readonly<JobDefinition>> {
  const raw = await fs.readFile(filePath, 'utf8');
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new DefinitionError(
      'Job definition is not valid JSON',
      [{ path: [], message: err instanceof Error ? err.message : String(err), code: 'invalid_json' }],
      filePath,
    );
  }

  const definition = validateDocument(doc, filePath);
  const baseDir = path.dirname(filePath);
  for (const method of definition.methods) {
    if (method.template !== undefined || method.templateFile === undefined) continue;
    const templatePath = path.resolve(baseDir, method.templateFile);
    try {
      method.template = await fs.readFile(templatePath, 'utf8');
    } catch (err) {
      throw new DefinitionError(
        'Template file could not be read',
        [
          {
            path: ['methods', method.name, 'template_file'],
            message: `${templatePath}: ${err instanceof Error ? err.message : String(err)}`,
            code: 'missing_template',
          },
        ],
        filePath,
      );
    }
  }
  return deepFreeze(definition);
}
