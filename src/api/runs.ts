/**
 * Job and run API routes.
 *
 * GET /jobs: Registered job definitions
 * POST /jobs/:jobName/runs: Execute a job synchronously
 * GET /runs/:runId: Get a run
 * GET /runs/:runId/trace: Readable edge trace of a run
 */

import { Router } from 'express';
import { z } from 'zod';
import { assetToWire } from '../domain/asset';
import { edgeToWire } from '../domain/edge';
import { EngineError, notFoundError, runNotFoundError } from '../domain/errors';
import { runToWire } from '../domain/run';
import { DefinitionRegistry } from '../dsl/registry';
import { declaredModes, methodNames } from '../dsl/schema';
import { JobExecutor } from '../engine/executor';
import { traceRun } from '../storage/lineage';
import { Store } from '../storage/store';
import { sendError } from './middleware';

const StartRunBody = z
  .object({
    assetIds: z.array(z.string()).default([]),
    params: z.record(z.unknown()).default({}),
  })
  .default({});

export function createRunRoutes(store: Store, registry: DefinitionRegistry, executor: JobExecutor): Router {
  const router = Router();

  router.get('/jobs', (_req, res) => {
    res.json({
      jobs: registry.list().map((definition) => ({
        name: definition.name,
        description: definition.description,
        methods: methodNames(definition),
        modes: declaredModes(definition),
      })),
    });
  });

  /**
   * POST /jobs/:jobName/runs
   * Creates a run and executes it before responding. A run that fails
   * after starting is returned alongside the error.
   */
  router.post('/jobs/:jobName/runs', async (req, res) => {
    const started: { runId?: string } = {};
    try {
      const body = StartRunBody.parse(req.body ?? {});
      const definition = registry.find(req.params.jobName);

      const inputAssets = await store.ledger.getMany(body.assetIds);
      const found = new Set(inputAssets.map((asset) => asset.id));
      const missing = body.assetIds.find((id) => !found.has(id));
      if (missing !== undefined) throw new EngineError(notFoundError('Asset', missing));

      const outcome = await executor.start(definition.name, inputAssets, body.params, (run) => {
        started.runId = run.id;
      });
      res.status(201).json({
        run: runToWire(outcome.run),
        assets: outcome.assets.map(assetToWire),
        edges: outcome.edges.map(edgeToWire),
      });
    } catch (err) {
      const run = started.runId !== undefined ? await store.runs.getById(started.runId) : null;
      sendError(res, err, run ? { run: runToWire(run) } : {});
    }
  });

  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) throw new EngineError(runNotFoundError(req.params.runId));
      res.json({ run: runToWire(run) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/trace', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) throw new EngineError(runNotFoundError(req.params.runId));
      res.json({ run: runToWire(run), lines: await traceRun(store.ledger, run.id) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
