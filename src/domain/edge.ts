/**
 * Provenance edge model.
 *
 * An edge is an immutable fact linking two asset or run ids. The ledger
 * of edges is append-only.
 */

import { z } from 'zod';
import { EngineError, validationError } from './errors';

export enum EdgeRelation {
  Uses = 'USES',
  Produces = 'PRODUCES',
  Derives = 'DERIVES',
  Configures = 'CONFIGURES',
  Logs = 'LOGS',
}

export interface Edge {
  from: string;
  to: string;
  rel: EdgeRelation;
  /** ISO-8601 timestamp. */
  t: string;
}

export type EdgeWire = Edge;

export const EdgeWireSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  rel: z.nativeEnum(EdgeRelation),
  t: z.string().min(1),
});

export function createEdge(from: string, to: string, rel: EdgeRelation, t: string = new Date().toISOString()): Edge {
  return Object.freeze({ from, to, rel, t });
}

export function edgeToWire(edge: Edge): EdgeWire {
  return { from: edge.from, to: edge.to, rel: edge.rel, t: edge.t };
}

/** Decode a wire edge; a missing timestamp defaults to now. */
export function edgeFromWire(input: unknown): Edge {
  const withTime =
    input !== null && typeof input === 'object' && !('t' in input)
      ? { ...input, t: new Date().toISOString() }
      : input;
  const parsed = EdgeWireSchema.safeParse(withTime);
  if (!parsed.success) {
    throw new EngineError(
      validationError('Invalid edge document', {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      }),
    );
  }
  return createEdge(parsed.data.from, parsed.data.to, parsed.data.rel, parsed.data.t);
}
