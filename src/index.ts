/**
 * jobgraph: configuration-driven execution engine with a
 * content-addressed provenance ledger.
 *
 * Running this module starts the HTTP server; importing it exposes the
 * library.
 */

import 'dotenv/config';
import { loadEngineConfig } from './config';
import { DefinitionRegistry } from './dsl/registry';
import { logger, setLogLevel } from './logger';
import { createMemoryStore } from './storage/memory-store';
import { FileLedgerStore } from './storage/file-ledger-store';
import { createApp, createAppContext } from './server';

async function main(): Promise<void> {
  const config = loadEngineConfig();
  setLogLevel(config.logLevel);

  const ledger = await FileLedgerStore.open(config.ledgerPath);
  const registry = await DefinitionRegistry.load(config.definitionsDir);
  const context = createAppContext({
    store: createMemoryStore(ledger),
    registry,
    executor: { workRoot: config.workRoot, defaultTimeoutSec: config.defaultTimeoutSec },
  });

  createApp(context).listen(config.port, () => {
    logger.info('Server listening', { port: config.port, ledger: config.ledgerPath, jobs: registry.names() });
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './storage';
