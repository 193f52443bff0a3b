/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine surfaces carries a namespaced code, a
 * retryability flag and structured details, so callers (and the HTTP
 * layer) can react without parsing message strings.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'TEMPLATE'
  | 'EXECUTION'
  | 'PARSE'
  | 'RUN'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and run records. */
export interface TypedError {
  /** Namespaced error code (e.g., "EXECUTION.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error wrapper thrown across engine boundaries. */
export class EngineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'EngineError';
  }
}

/** Normalize anything thrown into a TypedError. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof EngineError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}

// --- CONFIG ---

export function jobNotFoundError(name: string, known: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.JOB_NOT_FOUND',
    message: name
      ? `No job definition found for "${name}". Available jobs: ${known.join(', ') || '(none)'}`
      : `No job name specified. Available jobs: ${known.join(', ') || '(none)'}`,
    retryable: false,
    details: { name, available: known },
    suggestedFixes: known.slice(0, 5).map((candidate) => ({
      type: 'USE_JOB',
      params: { name: candidate },
    })),
  });
}

export function unknownMethodError(jobName: string, method: string, known: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.UNKNOWN_METHOD',
    message: `Job "${jobName}" has no method "${method}". Available methods: ${known.join(', ')}`,
    retryable: false,
    details: { job: jobName, method, available: known },
  });
}

export function noMethodsError(jobName: string): TypedError {
  return createTypedError({
    code: 'CONFIG.NO_METHODS',
    message: `Job "${jobName}" declares no methods`,
    retryable: false,
    details: { job: jobName },
    suggestedFixes: [
      { type: 'ADD_METHOD', params: { job: jobName }, description: 'Declare at least one entry under "methods"' },
    ],
  });
}

export function unknownBackendError(jobName: string, mode: string, declared: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.UNKNOWN_BACKEND',
    message: `Job "${jobName}" does not declare execution mode "${mode}". Declared modes: ${declared.join(', ') || '(none)'}`,
    retryable: false,
    details: { job: jobName, mode, available: declared },
  });
}

// --- TEMPLATE ---

export function missingInputError(need: string, params: string[], assets: string[], aliases: string[]): TypedError {
  return createTypedError({
    code: 'TEMPLATE.MISSING_INPUT',
    message: `Required input missing: ${need}`,
    retryable: false,
    details: { need, availableParams: params, availableAssets: assets, aliases },
    suggestedFixes: [
      { type: 'PROVIDE_PARAMETER', params: { name: need }, description: `Pass "${need}" or one of its aliases` },
    ],
  });
}

// --- EXECUTION ---

export function noInputFilesError(jobName: string, method: string): TypedError {
  return createTypedError({
    code: 'EXECUTION.NO_INPUT',
    message: `No template files available for execution of ${jobName}/${method}`,
    retryable: false,
    details: { job: jobName, method },
  });
}

export function executionFailedError(command: string, exitCode: number | null, stderr: string): TypedError {
  return createTypedError({
    code: 'EXECUTION.FAILED',
    message: `Command exited with code ${exitCode ?? 'unknown'}: ${command}`,
    retryable: false,
    details: { command, exitCode, stderr: stderr.slice(-2000) },
  });
}

export function executionTimeoutError(command: string, timeoutSec: number): TypedError {
  return createTypedError({
    code: 'EXECUTION.TIMEOUT',
    message: `Command exceeded timeout of ${timeoutSec}s: ${command}`,
    retryable: true,
    details: { command, timeoutSec },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeout: timeoutSec * 2 } },
    ],
  });
}

// --- PARSE ---

export function parseFailedError(failures: Array<{ file: string; message: string }>): TypedError {
  return createTypedError({
    code: 'PARSE.FAILED',
    message: `Failed to parse ${failures.length} output file(s): ${failures.map((f) => f.file).join(', ')}`,
    retryable: false,
    details: { failures },
  });
}

// --- RUN ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runAlreadyRunningError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Executor is busy; run "${runId}" was not started`,
    runId,
    retryable: true,
  });
}

export function executorBusyError(jobName: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Executor is busy; job "${jobName}" was not started`,
    retryable: true,
    details: { job: jobName },
  });
}

// --- VALIDATION ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function assetIdMismatchError(given: string, expected: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.ID_MISMATCH',
    message: `Asset id ${given} does not match its content id ${expected}`,
    retryable: false,
    details: { given, expected },
    suggestedFixes: [{ type: 'OMIT_ID', params: { id: given }, description: 'Omit the id and let the ledger compute it from the payload' }],
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
