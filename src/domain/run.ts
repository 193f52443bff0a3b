/**
 * Run domain model.
 *
 * A Run records one execution attempt of a job. Unlike assets it is
 * mutable, and its id is random rather than content-derived.
 */

import { z } from 'zod';
import { TypedError } from './errors';

/** Run lifecycle states. */
export enum RunStatus {
  Queued = 'queued',
  Running = 'running',
  Done = 'done',
  Error = 'error',
}

/** Valid state transitions for runs. Each run moves forward exactly once. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Queued]: [RunStatus.Running],
  [RunStatus.Running]: [RunStatus.Done, RunStatus.Error],
  [RunStatus.Done]: [],
  [RunStatus.Error]: [],
};

/** A single execution attempt of a job. */
export interface Run {
  id: string;
  /** Job (runner) name the run executes. */
  kind: string;
  status: RunStatus;
  runnerVersion?: string;
  startedAt?: string;
  endedAt?: string;
  /** Method chosen by the resolver. */
  method?: string;
  /** Terminal error for runs that ended in `error`. */
  error?: TypedError;
}

/** Wire form of a run, as exchanged with collaborators. */
export interface RunWire {
  id: string;
  kind: string;
  status: string;
  runner_version?: string;
  started_at?: string;
  ended_at?: string;
  method?: string;
  error?: TypedError;
}

const RunWireSchema = z.object({
  id: z.string().min(1),
  kind: z.string(),
  status: z.nativeEnum(RunStatus),
  runner_version: z.string().optional(),
  started_at: z.string().optional(),
  ended_at: z.string().optional(),
  method: z.string().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      runId: z.string().optional(),
      retryable: z.boolean(),
      details: z.record(z.unknown()).optional(),
      suggestedFixes: z.array(
        z.object({ type: z.string(), params: z.record(z.unknown()), description: z.string().optional() }),
      ),
    })
    .optional(),
});

export function runToWire(run: Run): RunWire {
  const wire: RunWire = { id: run.id, kind: run.kind, status: run.status };
  if (run.runnerVersion) wire.runner_version = run.runnerVersion;
  if (run.startedAt) wire.started_at = run.startedAt;
  if (run.endedAt) wire.ended_at = run.endedAt;
  if (run.method) wire.method = run.method;
  if (run.error) wire.error = run.error;
  return wire;
}

export function runFromWire(input: unknown): Run {
  const data = RunWireSchema.parse(input);
  const run: Run = { id: data.id, kind: data.kind, status: data.status };
  if (data.runner_version) run.runnerVersion = data.runner_version;
  if (data.started_at) run.startedAt = data.started_at;
  if (data.ended_at) run.endedAt = data.ended_at;
  if (data.method) run.method = data.method;
  if (data.error) run.error = data.error;
  return run;
}
