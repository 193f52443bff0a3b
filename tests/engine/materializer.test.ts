import { AssetKind, createAsset } from '../../src/domain/asset';
import { EdgeRelation } from '../../src/domain/edge';
import { parseJobDefinition } from '../../src/dsl/loader';
import { MaterializeInput, materialize, resultsPayload } from '../../src/engine/materializer';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

const definition = parseJobDefinition({
  name: 'md',
  results: { format: { kappa: { unit: 'W/mK' } } },
  result_assets: {
    conductivity: { kind: 'Params', requires_data: ['kappa'], payload: { value: 'kappa', temperature: 'T' } },
    never: { kind: 'Artifact', requires_data: ['absent'], payload: { x: 'kappa' } },
  },
});

const system = createAsset(AssetKind.System, {
  atoms: [{ el: 'Si', pos: [0, 0, 0] }],
  lattice: [
    [5.43, 0, 0],
    [0, 5.43, 0],
    [0, 0, 5.43],
  ],
  pbc: [true, true, true],
});
const settings = createAsset(AssetKind.Params, { x: 1 });

function input(overrides: Partial<MaterializeInput> = {}): MaterializeInput {
  return {
    definition,
    method: 'gk',
    runId: 'run-1',
    inputAssets: [system, settings],
    params: { method: 'gk', execution_mode: 'local', T: 300, seed: 1 },
    results: { kappa: 1.5, T_K: 300 },
    stdout: 'out',
    stderr: '',
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

describe('materialize', () => {
  test('the Results payload carries method, runner, results and non-control params', () => {
    expect(resultsPayload(definition, 'gk', { kappa: 1.5 }, { method: 'gk', execution_mode: 'docker', T: 300 })).toEqual({
      method: 'gk',
      runner: 'md',
      kappa: 1.5,
      T: 300,
    });
  });

  test('builds a content-addressed Results asset with units', () => {
    const { results } = materialize(input());
    const expected = createAsset(AssetKind.Results, {
      method: 'gk',
      runner: 'md',
      kappa: 1.5,
      T_K: 300,
      T: 300,
      seed: 1,
    });
    expect(results.id).toBe(expected.id);
    expect(results.units).toEqual({ kappa: 'W/mK', T_K: 'K' });
  });

  test('derives auxiliary assets whose required fields are present', () => {
    const { auxiliary } = materialize(input());
    expect(auxiliary).toHaveLength(1);
    expect(auxiliary[0].kind).toBe(AssetKind.Params);
    expect(auxiliary[0].payload).toEqual({ value: 1.5, temperature: 300 });
  });

  test('links inputs, outputs and derived assets in order', () => {
    const { results, log, auxiliary, edges } = materialize(input());
    expect(edges).toEqual([
      { from: system.id, to: 'run-1', rel: EdgeRelation.Uses, t: TIMESTAMP },
      { from: settings.id, to: 'run-1', rel: EdgeRelation.Configures, t: TIMESTAMP },
      { from: 'run-1', to: results.id, rel: EdgeRelation.Produces, t: TIMESTAMP },
      { from: 'run-1', to: log.id, rel: EdgeRelation.Logs, t: TIMESTAMP },
      { from: results.id, to: auxiliary[0].id, rel: EdgeRelation.Derives, t: TIMESTAMP },
    ]);
  });

  test('writes the default log text into a log Artifact', () => {
    const { log } = materialize(input());
    expect(log.kind).toBe(AssetKind.Artifact);
    expect(log.payload).toEqual({
      name: 'run.log',
      runner: 'md',
      method: 'gk',
      run_id: 'run-1',
      text: [
        'Run completed: md - gk',
        `Timestamp: ${TIMESTAMP}`,
        '',
        'Parameters:',
        '  method: gk',
        '  execution_mode: local',
        '  T: 300',
        '  seed: 1',
        '',
        'Results:',
        '  kappa: 1.5',
        '  T_K: 300',
        '',
      ].join('\n'),
      stdout: 'out',
      stderr: '',
    });
  });

  test('a log template replaces the default text', () => {
    const templated = parseJobDefinition({
      name: 'md',
      log_template: 'Run $run_id of $config_name/$method at $timestamp: $results',
    });
    const { log } = materialize(input({ definition: templated, results: { kappa: 1.5 } }));
    expect(log.payload).toMatchObject({ text: `Run run-1 of md/gk at ${TIMESTAMP}: {"kappa":1.5}` });
  });
});
