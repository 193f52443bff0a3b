import { EdgeRelation, createEdge } from '../../src/domain/edge';
import { lineageOf, replayLedger, traceRun } from '../../src/storage/lineage';
import { MemoryLedgerStore } from '../../src/storage/memory-store';

const T0 = '2026-01-01T00:00:00.000Z';

const EDGES = [
  createEdge('S111111', 'run_1', EdgeRelation.Uses, T0),
  createEdge('M222222', 'run_1', EdgeRelation.Configures, T0),
  createEdge('run_1', 'R333333', EdgeRelation.Produces, T0),
  createEdge('run_1', 'A444444', EdgeRelation.Logs, T0),
  createEdge('R333333', 'P555555', EdgeRelation.Derives, T0),
  createEdge('R333333', 'run_2', EdgeRelation.Configures, T0),
  createEdge('run_2', 'R666666', EdgeRelation.Produces, T0),
];

describe('replayLedger', () => {
  test('collects nodes in first-seen order', () => {
    const graph = replayLedger(EDGES);
    expect(graph.nodes).toEqual(['S111111', 'run_1', 'M222222', 'R333333', 'A444444', 'P555555', 'run_2', 'R666666']);
    expect(graph.edges).toHaveLength(7);
  });

  test('replaying the same ledger twice yields the same graph', () => {
    expect(replayLedger(EDGES)).toEqual(replayLedger([...EDGES]));
  });
});

describe('lineageOf', () => {
  const graph = replayLedger(EDGES);

  test('walks downstream breadth first', () => {
    expect(lineageOf(graph, 'S111111', 'downstream')).toEqual(['run_1', 'R333333', 'A444444', 'P555555', 'run_2', 'R666666']);
  });

  test('walks upstream breadth first', () => {
    expect(lineageOf(graph, 'R666666', 'upstream')).toEqual(['run_2', 'R333333', 'run_1', 'S111111', 'M222222']);
  });

  test('returns nothing for unknown ids', () => {
    expect(lineageOf(graph, 'X000000', 'downstream')).toEqual([]);
  });
});

describe('traceRun', () => {
  test('renders the edges touching a run', async () => {
    const ledger = new MemoryLedgerStore();
    await ledger.append(EDGES);
    expect(await traceRun(ledger, 'run_2')).toEqual(['R333333 -[CONFIGURES]-> run_2', 'run_2 -[PRODUCES]-> R666666']);
  });
});
