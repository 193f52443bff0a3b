/**
 * Lineage graph reconstruction from the edge ledger.
 *
 * The ledger is the source of truth: replaying it from empty always
 * rebuilds the same directed multigraph.
 */

import { Edge } from '../domain/edge';
import { LedgerStore } from './store';

export interface LineageGraph {
  /** Every id seen at either end of an edge, in first-seen order. */
  nodes: string[];
  outgoing: Map<string, Edge[]>;
  incoming: Map<string, Edge[]>;
  edges: Edge[];
}

export type LineageDirection = 'upstream' | 'downstream';

export function replayLedger(edges: Iterable<Edge>): LineageGraph {
  const graph: LineageGraph = { nodes: [], outgoing: new Map(), incoming: new Map(), edges: [] };
  const seen = new Set<string>();
  const touch = (id: string) => {
    if (!seen.has(id)) {
      seen.add(id);
      graph.nodes.push(id);
    }
  };

  for (const edge of edges) {
    touch(edge.from);
    touch(edge.to);
    graph.edges.push(edge);
    const out = graph.outgoing.get(edge.from) ?? [];
    out.push(edge);
    graph.outgoing.set(edge.from, out);
    const inc = graph.incoming.get(edge.to) ?? [];
    inc.push(edge);
    graph.incoming.set(edge.to, inc);
  }
  return graph;
}

/** Breadth-first walk from `id`; the start id itself is not included. */
export function lineageOf(graph: LineageGraph, id: string, direction: LineageDirection): string[] {
  const visited = new Set<string>([id]);
  const order: string[] = [];
  const queue = [id];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const next =
      direction === 'downstream'
        ? (graph.outgoing.get(current) ?? []).map((edge) => edge.to)
        : (graph.incoming.get(current) ?? []).map((edge) => edge.from);
    for (const neighbor of next) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        order.push(neighbor);
        queue.push(neighbor);
      }
    }
  }
  return order;
}

export function formatEdge(edge: Edge): string {
  return `${edge.from} -[${edge.rel}]-> ${edge.to}`;
}

/** Readable trace of every edge touching a run, in ledger order. */
export async function traceRun(ledger: LedgerStore, runId: string): Promise<string[]> {
  const edges = await ledger.query({ runId });
  return edges.map(formatEdge);
}
