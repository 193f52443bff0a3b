/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are
 * deep-copied on the way in and out so callers never alias store state.
 */

import { Asset, assetToWire } from '../domain/asset';
import { Edge, edgeToWire } from '../domain/edge';
import { Run } from '../domain/run';
import { EdgeQuery, LedgerSnapshot, LedgerStore, RunStore, Store, matchesEdgeQuery } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

export class MemoryLedgerStore implements LedgerStore {
  protected assets = new Map<string, Asset>();
  protected edges: Edge[] = [];

  async put(asset: Asset): Promise<string> {
    if (!this.assets.has(asset.id)) {
      this.assets.set(asset.id, deepCopy(asset));
    }
    return asset.id;
  }

  async putMany(assets: Asset[]): Promise<string[]> {
    const ids: string[] = [];
    for (const asset of assets) {
      ids.push(await this.put(asset));
    }
    return ids;
  }

  async get(id: string): Promise<Asset | null> {
    const asset = this.assets.get(id);
    return asset ? deepCopy(asset) : null;
  }

  async getMany(ids: string[]): Promise<Asset[]> {
    const found: Asset[] = [];
    for (const id of ids) {
      const asset = this.assets.get(id);
      if (asset) found.push(deepCopy(asset));
    }
    return found;
  }

  async append(edges: Edge[]): Promise<number> {
    for (const edge of edges) {
      this.edges.push(deepCopy(edge));
    }
    return edges.length;
  }

  async query(filter?: EdgeQuery): Promise<Edge[]> {
    return this.edges.filter((edge) => matchesEdgeQuery(edge, filter)).map(deepCopy);
  }

  async snapshot(): Promise<LedgerSnapshot> {
    const assets: LedgerSnapshot['assets'] = {};
    for (const [id, asset] of this.assets) {
      assets[id] = assetToWire(asset);
    }
    return { assets, edges: this.edges.map(edgeToWire) };
  }
}

export class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  async create(run: Run): Promise<Run> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<Run>): Promise<Run | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Run = { ...deepCopy(existing), ...deepCopy(updates), id };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(): Promise<Run[]> {
    return Array.from(this.data.values()).map(deepCopy);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(ledger: LedgerStore = new MemoryLedgerStore()): Store {
  return {
    ledger,
    runs: new MemoryRunStore(),
  };
}
