/**
 * Content addressing and identifier generation.
 *
 * Asset ids are derived from the kind and a canonical JSON rendering of
 * the payload, so equal payloads always map to the same id. Run ids are
 * random and say nothing about content.
 */

import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';

/**
 * Serialize a value with object keys sorted at every depth.
 * `undefined` object members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
  }
  const entries: Array<[string, unknown]> = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`).join(',')}}`;
}

export function sha256Hex(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Full content hash of a payload. */
export function contentHash(payload: unknown): string {
  return sha256Hex(canonicalJson(payload));
}

/** Generate a unique run id. */
export function newRunId(): string {
  return `run_${uuid()}`;
}
