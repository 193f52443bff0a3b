import { EdgeRelation, createEdge, edgeFromWire, edgeToWire } from '../../src/domain/edge';
import { RunStatus, runFromWire, runToWire } from '../../src/domain/run';

describe('edges', () => {
  test('are frozen facts', () => {
    const edge = createEdge('S123456', 'run_1', EdgeRelation.Uses, '2026-01-01T00:00:00.000Z');
    expect(Object.isFrozen(edge)).toBe(true);
    expect(edgeToWire(edge)).toEqual({ from: 'S123456', to: 'run_1', rel: 'USES', t: '2026-01-01T00:00:00.000Z' });
  });

  test('decode with a default timestamp', () => {
    const edge = edgeFromWire({ from: 'run_1', to: 'R123456', rel: 'PRODUCES' });
    expect(edge.rel).toBe(EdgeRelation.Produces);
    expect(Number.isNaN(Date.parse(edge.t))).toBe(false);
  });

  test('reject unknown relations', () => {
    expect(() => edgeFromWire({ from: 'a', to: 'b', rel: 'OWNS', t: 'now' })).toThrow('Invalid edge document');
  });
});

describe('run wire form', () => {
  test('uses snake_case and omits absent fields', () => {
    const wire = runToWire({
      id: 'run_1',
      kind: 'echo',
      status: RunStatus.Done,
      runnerVersion: '0.1.0',
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:01.000Z',
      method: 'print',
    });
    expect(wire).toEqual({
      id: 'run_1',
      kind: 'echo',
      status: 'done',
      runner_version: '0.1.0',
      started_at: '2026-01-01T00:00:00.000Z',
      ended_at: '2026-01-01T00:00:01.000Z',
      method: 'print',
    });
    expect(runFromWire(wire)).toEqual({
      id: 'run_1',
      kind: 'echo',
      status: RunStatus.Done,
      runnerVersion: '0.1.0',
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:01.000Z',
      method: 'print',
    });
  });

  test('rejects unknown statuses', () => {
    expect(() => runFromWire({ id: 'run_1', kind: 'echo', status: 'paused' })).toThrow();
  });
});
