/**
 * Turns parsed results into provenance: the Results asset, auxiliary
 * assets declared by `result_assets`, the run log Artifact, and the edge
 * batch linking them to the run.
 */

import { Asset, AssetKind, createAsset } from '../domain/asset';
import { Edge, EdgeRelation, createEdge } from '../domain/edge';
import { resolveUnits } from '../domain/units';
import { JobDefinition } from '../dsl/schema';
import { formatValue, safeSubstitute } from './template';

/** Params that steer the engine and never land in a Results payload. */
export const CONTROL_PARAMS = ['method', 'execution_mode'];

export const LOG_ARTIFACT_NAME = 'run.log';

export interface MaterializeInput {
  definition: JobDefinition;
  method: string;
  runId: string;
  inputAssets: Asset[];
  params: Record<string, unknown>;
  results: Record<string, unknown>;
  stdout: string;
  stderr: string;
  /** ISO timestamp shared by the log and every edge of the batch. */
  timestamp: string;
}

export interface Materialized {
  results: Asset;
  log: Asset;
  auxiliary: Asset[];
  edges: Edge[];
}

export function resultsPayload(
  definition: JobDefinition,
  method: string,
  results: Record<string, unknown>,
  params: Record<string, unknown>,
): Record<string, unknown> {
  const payload: Record<string, unknown> = { method, runner: definition.name, ...results };
  for (const [key, value] of Object.entries(params)) {
    if (!CONTROL_PARAMS.includes(key)) payload[key] = value;
  }
  return payload;
}

export function auxiliaryAssets(
  definition: JobDefinition,
  results: Record<string, unknown>,
  params: Record<string, unknown>,
): Asset[] {
  const assets: Asset[] = [];
  for (const rule of definition.resultAssets) {
    if (!rule.requiresData.every((field) => field in results)) continue;
    const payload: Record<string, unknown> = {};
    for (const [key, source] of Object.entries(rule.payload)) {
      const value = source in results ? results[source] : params[source];
      if (value !== undefined) payload[key] = value;
    }
    if (Object.keys(payload).length > 0) {
      assets.push(createAsset(rule.kind, payload));
    }
  }
  return assets;
}

function defaultLogText(
  definition: JobDefinition,
  method: string,
  timestamp: string,
  params: Record<string, unknown>,
  results: Record<string, unknown>,
): string {
  const lines = [`Run completed: ${definition.name} - ${method}`, `Timestamp: ${timestamp}`, '', 'Parameters:'];
  for (const [key, value] of Object.entries(params)) lines.push(`  ${key}: ${formatValue(value)}`);
  lines.push('', 'Results:');
  for (const [key, value] of Object.entries(results)) lines.push(`  ${key}: ${formatValue(value)}`);
  return `${lines.join('\n')}\n`;
}

export function logText(input: MaterializeInput): string {
  const { definition, method, timestamp, params, results, runId } = input;
  if (definition.logTemplate !== undefined) {
    return safeSubstitute(definition.logTemplate, {
      config_name: definition.name,
      method,
      timestamp,
      run_id: runId,
      params,
      results,
    });
  }
  return defaultLogText(definition, method, timestamp, params, results);
}

export function materialize(input: MaterializeInput): Materialized {
  const { definition, method, runId, inputAssets, params, results, timestamp } = input;

  const resultsAsset = createAsset(AssetKind.Results, resultsPayload(definition, method, results, params), {
    units: resolveUnits(Object.keys(results), definition.resultFormat),
  });

  const log = createAsset(AssetKind.Artifact, {
    name: LOG_ARTIFACT_NAME,
    runner: definition.name,
    method,
    run_id: runId,
    text: logText(input),
    stdout: input.stdout,
    stderr: input.stderr,
  });

  const auxiliary = auxiliaryAssets(definition, results, params);

  const edges: Edge[] = [];
  for (const asset of inputAssets) {
    const rel = asset.kind === AssetKind.System ? EdgeRelation.Uses : EdgeRelation.Configures;
    edges.push(createEdge(asset.id, runId, rel, timestamp));
  }
  edges.push(createEdge(runId, resultsAsset.id, EdgeRelation.Produces, timestamp));
  edges.push(createEdge(runId, log.id, EdgeRelation.Logs, timestamp));
  for (const asset of auxiliary) {
    edges.push(createEdge(resultsAsset.id, asset.id, EdgeRelation.Derives, timestamp));
  }

  return { results: resultsAsset, log, auxiliary, edges };
}
