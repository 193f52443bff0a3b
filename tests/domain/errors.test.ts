import { z } from 'zod';
import {
  EngineError,
  apiError,
  assetIdMismatchError,
  createTypedError,
  executionFailedError,
  executionTimeoutError,
  executorBusyError,
  jobNotFoundError,
  notFoundError,
  parseFailedError,
  runAlreadyRunningError,
  toTypedError,
} from '../../src/domain/errors';
import { getHttpStatus, toApiError } from '../../src/api/middleware';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('createTypedError defaults', () => {
    const error = createTypedError({ code: 'TEST.ERROR', message: 'x' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('toTypedError unwraps EngineError and wraps everything else', () => {
    const typed = notFoundError('Asset', 'S000000');
    expect(toTypedError(new EngineError(typed))).toBe(typed);
    expect(toTypedError(new Error('disk full'))).toMatchObject({ code: 'SYSTEM.INTERNAL', message: 'disk full' });
    expect(toTypedError('odd', 'EXECUTION.FAILED')).toMatchObject({ code: 'EXECUTION.FAILED', message: 'odd' });
  });

  test('jobNotFoundError lists known jobs and suggests them', () => {
    const error = jobNotFoundError('ghost', ['echo', 'md']);
    expect(error.message).toBe('No job definition found for "ghost". Available jobs: echo, md');
    expect(error.suggestedFixes.map((fix) => fix.params.name)).toEqual(['echo', 'md']);
    expect(jobNotFoundError('', []).message).toBe('No job name specified. Available jobs: (none)');
  });

  test('executionFailedError keeps the stderr tail', () => {
    const error = executionFailedError('lmp in.md', 1, `${'x'.repeat(3000)}tail`);
    expect(error.details?.exitCode).toBe(1);
    const stderr = error.details?.stderr;
    expect(typeof stderr === 'string' ? stderr.length : 0).toBe(2000);
    expect(typeof stderr === 'string' && stderr.endsWith('tail')).toBe(true);
  });

  test('executionTimeoutError is retryable with a longer timeout', () => {
    const error = executionTimeoutError('lmp in.md', 30);
    expect(error.retryable).toBe(true);
    expect(error.suggestedFixes).toEqual([{ type: 'INCREASE_TIMEOUT', params: { timeout: 60 } }]);
  });

  test('parseFailedError names every failed file', () => {
    const error = parseFailedError([
      { file: 'a.json', message: 'bad' },
      { file: 'b.dat', message: 'worse' },
    ]);
    expect(error.message).toBe('Failed to parse 2 output file(s): a.json, b.dat');
  });

  test('executorBusyError names the job and can be retried', () => {
    const error = executorBusyError('md');
    expect(error.code).toBe('RUN.ALREADY_RUNNING');
    expect(error.message).toBe('Executor is busy; job "md" was not started');
    expect(error.retryable).toBe(true);
  });

  test('assetIdMismatchError carries both ids', () => {
    const error = assetIdMismatchError('R000000', 'R111111');
    expect(error.code).toBe('VALIDATION.ID_MISMATCH');
    expect(error.details).toEqual({ given: 'R000000', expected: 'R111111' });
    expect(error.suggestedFixes).toEqual([
      {
        type: 'OMIT_ID',
        params: { id: 'R000000' },
        description: 'Omit the id and let the ledger compute it from the payload',
      },
    ]);
  });

  test('apiError wraps the error', () => {
    const typed = runAlreadyRunningError('run_1');
    expect(apiError(typed)).toEqual({ error: typed });
  });
});

describe('HTTP status mapping', () => {
  test.each<[string, number]>([
    ['CONFIG.JOB_NOT_FOUND', 404],
    ['RUN.NOT_FOUND', 404],
    ['VALIDATION.NOT_FOUND', 404],
    ['RUN.ALREADY_RUNNING', 409],
    ['VALIDATION.MALFORMED_BODY', 400],
    ['CONFIG.UNKNOWN_BACKEND', 422],
    ['VALIDATION.SCHEMA', 422],
    ['VALIDATION.ID_MISMATCH', 422],
    ['TEMPLATE.MISSING_INPUT', 422],
    ['EXECUTION.TIMEOUT', 422],
    ['PARSE.FAILED', 422],
    ['SYSTEM.INTERNAL', 500],
  ])('%s -> %d', (code, status) => {
    expect(getHttpStatus(createTypedError({ code, message: 'x' }))).toBe(status);
  });

  test('zod failures become validation errors', () => {
    const parsed = z.object({ ids: z.array(z.string()) }).safeParse({ ids: 'nope' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const error = toApiError(parsed.error);
    expect(error.code).toBe('VALIDATION.SCHEMA');
    expect(error.message).toBe('Invalid request body');
  });
});
