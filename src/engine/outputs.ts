/**
 * Output discovery and parsing.
 */

import fs from 'fs/promises';
import path from 'path';
import { EngineError, parseFailedError } from '../domain/errors';
import { Result, err, ok } from '../domain/result';
import { JobDefinition, OutputRule, ParserSpec } from '../dsl/schema';
import { logger } from '../logger';

const log = logger.child({ module: 'outputs' });

export interface ParseError {
  message: string;
}

export type ParsedOutput = Record<string, unknown>;

/** Glob to anchored regex: `*` and `?` never cross a `/`. */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const ch of glob) {
    if (ch === '*') source += '[^/]*';
    else if (ch === '?') source += '[^/]';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export function matchesGlob(name: string, glob: string): boolean {
  return globToRegExp(glob).test(name);
}

/** Files in `workDir` matching any pattern, sorted by name, minus `exclude`. */
export async function discoverOutputs(
  workDir: string,
  patterns: string[],
  exclude: Iterable<string> = [],
): Promise<string[]> {
  const skip = new Set(exclude);
  const matchers = patterns.map(globToRegExp);
  const entries = await fs.readdir(workDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !skip.has(entry.name))
    .map((entry) => entry.name)
    .filter((name) => matchers.some((re) => re.test(name)))
    .sort();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseJson(text: string): Result<ParsedOutput, ParseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return err({ message: e instanceof Error ? e.message : String(e) });
  }
  if (!isPlainObject(parsed)) return err({ message: 'JSON output must be an object' });
  return ok(parsed);
}

function parseRegex(text: string, patterns: Array<{ name?: string; pattern: string }>): Result<ParsedOutput, ParseError> {
  const out: ParsedOutput = {};
  for (const { name, pattern } of patterns) {
    const matches: unknown[] = [];
    for (const m of text.matchAll(new RegExp(pattern, 'g'))) {
      const groups = m.slice(1).map((group) => group ?? '');
      if (groups.length === 0) matches.push(m[0]);
      else if (groups.length === 1) matches.push(groups[0]);
      else matches.push(groups);
    }
    if (matches.length > 0) {
      out[name ?? `matches_${Object.keys(out).length}`] = matches;
    }
  }
  return ok(out);
}

function numericOrText(field: string): number | string {
  const n = Number(field);
  return field !== '' && Number.isFinite(n) ? n : field;
}

function parseColumnar(text: string, skipLines: number, columns?: string[]): Result<ParsedOutput, ParseError> {
  const rows = text
    .split(/\r?\n/)
    .slice(skipLines)
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .map((line) => line.split(/\s+/));
  if (!columns) return ok({ data: rows });

  const out: ParsedOutput = {};
  columns.forEach((column, index) => {
    out[column] = rows.filter((row) => index < row.length).map((row) => numericOrText(row[index]));
  });
  return ok(out);
}

export function parseOutput(spec: ParserSpec, text: string): Result<ParsedOutput, ParseError> {
  switch (spec.type) {
    case 'json':
      return parseJson(text);
    case 'regex':
      return parseRegex(text, spec.patterns);
    case 'columnar':
      return parseColumnar(text, spec.skipLines, spec.columns);
  }
}

function ruleFor(rules: OutputRule[], file: string): OutputRule | undefined {
  return rules.find(
    (rule) => rule.name === file || (rule.pattern !== undefined && matchesGlob(file, rule.pattern)),
  );
}

/** Parser for a discovered file, or undefined when the file is not parsed. */
export function parserFor(definition: JobDefinition, file: string): ParserSpec | undefined {
  const rule = ruleFor(definition.outputRules, file);
  if (rule) {
    return definition.parsers[rule.parser] ?? (rule.parser === 'json' ? { type: 'json' } : undefined);
  }
  return path.extname(file) === '.json' ? { type: 'json' } : undefined;
}

export interface ParsedResults {
  /** Merged parse results; `default_results` when nothing parsed. */
  results: Record<string, unknown>;
  /** Whether `results` came from `default_results`. */
  usedDefaults: boolean;
  failures: Array<{ file: string; message: string }>;
}

/**
 * Parse discovered files in order and merge their results. Failures are
 * skipped under `on_error: ignore` and abort with PARSE.FAILED under `fail`.
 */
export async function collectResults(definition: JobDefinition, workDir: string, files: string[]): Promise<ParsedResults> {
  const merged: Record<string, unknown> = {};
  const failures: Array<{ file: string; message: string }> = [];

  for (const file of files) {
    const spec = parserFor(definition, file);
    if (!spec) continue;
    const text = await fs.readFile(path.join(workDir, file), 'utf8');
    const parsed = parseOutput(spec, text);
    if (parsed.ok) {
      for (const [key, value] of Object.entries(parsed.value)) {
        // defineProperty keeps a "__proto__" key as data instead of a prototype change.
        Object.defineProperty(merged, key, { value, enumerable: true, writable: true, configurable: true });
      }
    } else {
      failures.push({ file, message: parsed.error.message });
      log.warn('Failed to parse output file', { file, parser: spec.type, error: parsed.error.message });
    }
  }

  if (failures.length > 0 && definition.onParseError === 'fail') {
    throw new EngineError(parseFailedError(failures));
  }

  if (Object.keys(merged).length === 0) {
    log.info('No results parsed, using default results', { job: definition.name });
    return { results: structuredClone(definition.defaultResults), usedDefaults: true, failures };
  }
  return { results: merged, usedDefaults: false, failures };
}
