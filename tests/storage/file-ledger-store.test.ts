import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AssetKind, createAsset } from '../../src/domain/asset';
import { EdgeRelation, createEdge } from '../../src/domain/edge';
import { EngineError } from '../../src/domain/errors';
import { FileLedgerStore } from '../../src/storage/file-ledger-store';

const T0 = '2026-01-01T00:00:00.000Z';

describe('FileLedgerStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
    file = path.join(dir, 'nested', 'ledger.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('starts empty when the file does not exist', async () => {
    const ledger = await FileLedgerStore.open(file);
    expect(await ledger.snapshot()).toEqual({ assets: {}, edges: [] });
  });

  test('persists assets and edges across reopen', async () => {
    const ledger = await FileLedgerStore.open(file);
    const params = createAsset(AssetKind.Params, { T: 300 });
    await ledger.put(params);
    await ledger.append([createEdge(params.id, 'run_1', EdgeRelation.Configures, T0)]);

    const reopened = await FileLedgerStore.open(file);
    expect(await reopened.get(params.id)).toEqual(params);
    expect(await reopened.query({ runId: 'run_1' })).toEqual([
      { from: params.id, to: 'run_1', rel: EdgeRelation.Configures, t: T0 },
    ]);
  });

  test('writes the documented wire keys', async () => {
    const ledger = await FileLedgerStore.open(file);
    const results = createAsset(AssetKind.Results, { k: 1 }, { units: { k: 'K' } });
    await ledger.put(results);
    await ledger.append([createEdge('run_1', results.id, EdgeRelation.Produces, T0)]);

    const raw = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(raw).toEqual({
      assets: { [results.id]: { type: 'Results', id: results.id, payload: { k: 1 }, units: { k: 'K' } } },
      edges: [{ from: 'run_1', to: results.id, rel: 'PRODUCES', t: T0 }],
    });
  });

  test('keeps append order under concurrent batches', async () => {
    const ledger = await FileLedgerStore.open(file);
    await Promise.all([
      ledger.append([createEdge('a', 'b', EdgeRelation.Uses, T0)]),
      ledger.append([createEdge('c', 'd', EdgeRelation.Uses, T0), createEdge('e', 'f', EdgeRelation.Uses, T0)]),
      ledger.append([createEdge('g', 'h', EdgeRelation.Uses, T0)]),
    ]);
    const reopened = await FileLedgerStore.open(file);
    expect((await reopened.query()).map((edge) => edge.from)).toEqual(['a', 'c', 'e', 'g']);
  });

  test('leaves no temp files behind', async () => {
    const ledger = await FileLedgerStore.open(file);
    await ledger.putMany([createAsset(AssetKind.Params, { a: 1 }), createAsset(AssetKind.Params, { b: 1 })]);
    expect(await fs.readdir(path.dirname(file))).toEqual(['ledger.json']);
  });

  test('rejects a stored asset whose payload no longer matches its id', async () => {
    const genuine = createAsset(AssetKind.Results, { kappa: 1 });
    await fs.mkdir(path.dirname(file), { recursive: true });
    const doc = { type: 'Results', id: genuine.id, payload: { kappa: 999 } };
    await fs.writeFile(file, JSON.stringify({ assets: { [genuine.id]: doc }, edges: [] }), 'utf8');

    let code: string | undefined;
    try {
      await FileLedgerStore.open(file);
    } catch (err) {
      if (err instanceof EngineError) code = err.typedError.code;
    }
    expect(code).toBe('VALIDATION.ID_MISMATCH');
  });

  test('rejects a stored asset filed under another id', async () => {
    const genuine = createAsset(AssetKind.Results, { kappa: 1 });
    await fs.mkdir(path.dirname(file), { recursive: true });
    const doc = { type: 'Results', payload: { kappa: 1 } };
    await fs.writeFile(file, JSON.stringify({ assets: { R000000: doc }, edges: [] }), 'utf8');

    let details: Record<string, unknown> | undefined;
    try {
      await FileLedgerStore.open(file);
    } catch (err) {
      if (err instanceof EngineError) details = err.typedError.details;
    }
    expect(details).toEqual({ given: 'R000000', expected: genuine.id });
  });

  test('rejects a corrupt ledger file', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{not json', 'utf8');
    await expect(FileLedgerStore.open(file)).rejects.toBeInstanceOf(EngineError);
  });
});
