/**
 * Durable ledger store backed by a single JSON file.
 *
 * Every mutation builds a new snapshot, rewrites the whole file through a
 * temp file + rename, and only then swaps the snapshot in. Mutations run
 * one at a time; reads see the last snapshot that reached disk.
 */

import fs from 'fs/promises';
import path from 'path';
import { Asset, assetFromWire, assetToWire } from '../domain/asset';
import { Edge, edgeFromWire, edgeToWire } from '../domain/edge';
import { EngineError, assetIdMismatchError, createTypedError } from '../domain/errors';
import { logger } from '../logger';
import { EdgeQuery, LedgerSnapshot, LedgerStore, matchesEdgeQuery } from './store';

const log = logger.child({ module: 'file-ledger' });

interface LedgerState {
  assets: Map<string, Asset>;
  edges: Edge[];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileLedgerStore implements LedgerStore {
  private state: LedgerState = { assets: new Map(), edges: [] };
  private queue: Promise<void> = Promise.resolve();
  private writeCounter = 0;

  private constructor(readonly filePath: string) {}

  /** Open a ledger file, starting empty when it does not exist yet. */
  static async open(filePath: string): Promise<FileLedgerStore> {
    const store = new FileLedgerStore(filePath);
    await store.load();
    return store;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        log.info('Ledger file not found, starting empty', { path: this.filePath });
        return;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new EngineError(
        createTypedError({
          code: 'SYSTEM.LEDGER_CORRUPT',
          message: `Ledger file is not valid JSON: ${this.filePath}`,
          details: { path: this.filePath, cause: err instanceof Error ? err.message : String(err) },
        }),
      );
    }

    const assets = new Map<string, Asset>();
    const edges: Edge[] = [];
    if (parsed !== null && typeof parsed === 'object') {
      const assetDocs = 'assets' in parsed ? parsed.assets : undefined;
      if (assetDocs !== null && typeof assetDocs === 'object') {
        for (const [id, doc] of Object.entries(assetDocs)) {
          const asset = assetFromWire(doc);
          if (asset.id !== id) throw new EngineError(assetIdMismatchError(id, asset.id));
          assets.set(id, asset);
        }
      }
      const edgeDocs = 'edges' in parsed ? parsed.edges : undefined;
      if (Array.isArray(edgeDocs)) {
        for (const doc of edgeDocs) {
          edges.push(edgeFromWire(doc));
        }
      }
    }
    this.state = { assets, edges };
    log.debug('Ledger loaded', { path: this.filePath, assets: assets.size, edges: edges.length });
  }

  /**
   * Run a mutation against a copy of the current state. When it reports a
   * change, the copy is persisted and becomes the current state.
   */
  private enqueue<T>(mutate: (draft: LedgerState) => { changed: boolean; result: T }): Promise<T> {
    const task = this.queue.then(async () => {
      const draft: LedgerState = {
        assets: new Map(this.state.assets),
        edges: [...this.state.edges],
      };
      const { changed, result } = mutate(draft);
      if (changed) {
        await this.persist(draft);
        this.state = draft;
      }
      return result;
    });
    this.queue = task.then(
      () => undefined,
      () => undefined,
    );
    return task;
  }

  private async persist(state: LedgerState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.${++this.writeCounter}.tmp`;
    const body = JSON.stringify(toSnapshot(state), null, 2);
    try {
      await fs.writeFile(tmpPath, body, 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }

  put(asset: Asset): Promise<string> {
    return this.enqueue((draft) => {
      if (draft.assets.has(asset.id)) return { changed: false, result: asset.id };
      draft.assets.set(asset.id, structuredClone(asset));
      return { changed: true, result: asset.id };
    });
  }

  putMany(assets: Asset[]): Promise<string[]> {
    return this.enqueue((draft) => {
      let changed = false;
      for (const asset of assets) {
        if (!draft.assets.has(asset.id)) {
          draft.assets.set(asset.id, structuredClone(asset));
          changed = true;
        }
      }
      return { changed, result: assets.map((asset) => asset.id) };
    });
  }

  async get(id: string): Promise<Asset | null> {
    const asset = this.state.assets.get(id);
    return asset ? structuredClone(asset) : null;
  }

  async getMany(ids: string[]): Promise<Asset[]> {
    const found: Asset[] = [];
    for (const id of ids) {
      const asset = this.state.assets.get(id);
      if (asset) found.push(structuredClone(asset));
    }
    return found;
  }

  append(edges: Edge[]): Promise<number> {
    return this.enqueue((draft) => {
      for (const edge of edges) {
        draft.edges.push(structuredClone(edge));
      }
      return { changed: edges.length > 0, result: edges.length };
    });
  }

  async query(filter?: EdgeQuery): Promise<Edge[]> {
    return this.state.edges.filter((edge) => matchesEdgeQuery(edge, filter)).map((edge) => structuredClone(edge));
  }

  async snapshot(): Promise<LedgerSnapshot> {
    return toSnapshot(this.state);
  }
}

function toSnapshot(state: LedgerState): LedgerSnapshot {
  const assets: LedgerSnapshot['assets'] = {};
  for (const [id, asset] of state.assets) {
    assets[id] = assetToWire(asset);
  }
  return { assets, edges: state.edges.map(edgeToWire) };
}
