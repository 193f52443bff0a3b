/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { DefinitionRegistry } from './dsl/registry';
import { ExecutorOptions, JobExecutor, RUNNER_VERSION } from './engine/executor';
import { errorHandler } from './api/middleware';
import { createAssetRoutes } from './api/assets';
import { createEdgeRoutes } from './api/edges';
import { createRunRoutes } from './api/runs';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  registry: DefinitionRegistry;
  executor: JobExecutor;
}

export interface AppContextOptions {
  store?: Store;
  registry?: DefinitionRegistry;
  executor?: Partial<ExecutorOptions>;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const store = options.store ?? createMemoryStore();
  const registry = options.registry ?? DefinitionRegistry.fromDefinitions([]);
  const executor = new JobExecutor(store, registry, options.executor);
  return { store, registry, executor };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: RUNNER_VERSION,
      uptimeMs: Date.now() - startTime,
      jobs: ctx.registry.names().length,
    });
  });

  app.use('/api', createAssetRoutes(ctx.store.ledger));
  app.use('/api', createEdgeRoutes(ctx.store.ledger));
  app.use('/api', createRunRoutes(ctx.store, ctx.registry, ctx.executor));

  app.use(errorHandler);

  return app;
}
