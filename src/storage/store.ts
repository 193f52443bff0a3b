/**
 * Storage layer interfaces.
 *
 * Defines the contract for provenance persistence with pluggable
 * backends: an in-memory reference store and a durable JSON-file ledger.
 */

import { Asset, AssetWire } from '../domain/asset';
import { Edge, EdgeWire } from '../domain/edge';
import { Run } from '../domain/run';

/** Edge query filter. `runId` matches edges touching the id at either end. */
export interface EdgeQuery {
  from?: string;
  to?: string;
  runId?: string;
}

/** Persisted form of the ledger. */
export interface LedgerSnapshot {
  assets: Record<string, AssetWire>;
  edges: EdgeWire[];
}

/**
 * Content-addressed asset store plus append-only edge ledger.
 * Mutations are durable before their promise resolves.
 */
export interface LedgerStore {
  /** Store an asset; an id that already exists is left untouched. */
  put(asset: Asset): Promise<string>;
  putMany(assets: Asset[]): Promise<string[]>;
  get(id: string): Promise<Asset | null>;
  /** Assets in the order requested, skipping unknown ids. */
  getMany(ids: string[]): Promise<Asset[]>;
  /** Append edges as one batch; returns the number appended. */
  append(edges: Edge[]): Promise<number>;
  /** Edges matching every given filter, in ledger order. */
  query(filter?: EdgeQuery): Promise<Edge[]>;
  snapshot(): Promise<LedgerSnapshot>;
}

/** Store interface for run records. */
export interface RunStore {
  create(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  update(id: string, run: Partial<Run>): Promise<Run | null>;
  list(): Promise<Run[]>;
}

/** Composite store interface. */
export interface Store {
  ledger: LedgerStore;
  runs: RunStore;
}

export function matchesEdgeQuery(edge: Edge, filter: EdgeQuery = {}): boolean {
  if (filter.from && edge.from !== filter.from) return false;
  if (filter.to && edge.to !== filter.to) return false;
  if (filter.runId && edge.from !== filter.runId && edge.to !== filter.runId) return false;
  return true;
}
