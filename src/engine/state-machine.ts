/**
 * Run state machine.
 *
 * Enforces valid run status transitions, producing typed errors on
 * invalid ones.
 */

import { RunStatus, VALID_RUN_TRANSITIONS } from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === RunStatus.Done || status === RunStatus.Error;
}
