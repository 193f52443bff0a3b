/**
 * Job executor: drives one run of a job definition end to end.
 *
 * Looks up the definition, resolves the method and backend, renders the
 * input files into a fresh working directory, launches the tool, parses
 * its outputs and records the produced assets and edges in the ledger.
 * Configuration errors surface before the run starts; anything after that
 * ends the run in `error` and writes nothing to the ledger.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Asset } from '../domain/asset';
import { Edge } from '../domain/edge';
import {
  EngineError,
  TypedError,
  executionFailedError,
  executionTimeoutError,
  executorBusyError,
  runAlreadyRunningError,
  toTypedError,
} from '../domain/errors';
import { newRunId } from '../domain/identity';
import { Run, RunStatus } from '../domain/run';
import { DefinitionRegistry } from '../dsl/registry';
import { JobDefinition, MethodDefinition, findMethod } from '../dsl/schema';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { ExecutionBackend, selectBackend } from './backends';
import { buildContext } from './context';
import { LaunchOutcome, ProcessLauncher, ShellProcessLauncher } from './launcher';
import { materialize } from './materializer';
import { resolveMethod } from './resolver';
import { collectResults, discoverOutputs } from './outputs';
import { transitionRunStatus } from './state-machine';
import { renderMethodFiles } from './template';

const log = logger.child({ module: 'executor' });

export const RUNNER_VERSION = '0.1.0';

/** Executor configuration. */
export interface ExecutorOptions {
  /** Parent directory for per-run working directories. */
  workRoot: string;
  /** Timeout when neither the method nor the backend sets one. */
  defaultTimeoutSec: number;
  launcher: ProcessLauncher;
  now: () => Date;
  runnerVersion: string;
}

const DEFAULT_OPTIONS: ExecutorOptions = {
  workRoot: os.tmpdir(),
  defaultTimeoutSec: 60,
  launcher: new ShellProcessLauncher(),
  now: () => new Date(),
  runnerVersion: RUNNER_VERSION,
};

export interface ExecutionOutcome {
  run: Run;
  /** Produced assets: Results, the log Artifact, then auxiliary assets. */
  assets: Asset[];
  edges: Edge[];
}

interface PreparedRun {
  definition: JobDefinition;
  method: MethodDefinition;
  backend: ExecutionBackend;
}

export class JobExecutor {
  private options: ExecutorOptions;
  /** Set while a run is being created or executed; one run at a time per executor. */
  private busy = false;

  constructor(
    private store: Store,
    private registry: DefinitionRegistry,
    options?: Partial<ExecutorOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Build a queued run for `kind` and store it. */
  async createRun(kind: string): Promise<Run> {
    const run: Run = { id: newRunId(), kind, status: RunStatus.Queued };
    return this.store.runs.create(run);
  }

  async execute(
    jobName: string,
    run: Run,
    inputAssets: Asset[] = [],
    params: Record<string, unknown> = {},
  ): Promise<ExecutionOutcome> {
    if (this.busy) {
      throw new EngineError(runAlreadyRunningError(run.id));
    }
    this.busy = true;
    try {
      return await this.executeInternal(jobName, run, inputAssets, params);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Create a queued run and execute it. The executor is claimed before the
   * run is stored, so a busy executor rejects without leaving a run behind.
   * `onCreated` sees the stored run before execution begins.
   */
  async start(
    jobName: string,
    inputAssets: Asset[] = [],
    params: Record<string, unknown> = {},
    onCreated?: (run: Run) => void,
  ): Promise<ExecutionOutcome> {
    if (this.busy) {
      throw new EngineError(executorBusyError(jobName));
    }
    this.busy = true;
    try {
      const run = await this.createRun(jobName);
      onCreated?.(run);
      return await this.executeInternal(jobName, run, inputAssets, params);
    } finally {
      this.busy = false;
    }
  }

  /** Everything that can fail before the run starts. */
  private prepare(jobName: string, params: Record<string, unknown>): PreparedRun {
    const definition = this.registry.find(jobName);
    const resolution = resolveMethod(definition, params);
    const method = findMethod(definition, resolution.method);
    if (!method) {
      throw new Error(`Resolved method "${resolution.method}" missing from "${definition.name}"`);
    }
    const backend = selectBackend(definition, params);
    log.info('Method resolved', {
      job: definition.name,
      method: method.name,
      reason: resolution.reason,
      mode: backend.mode,
    });
    return { definition, method, backend };
  }

  private async executeInternal(
    jobName: string,
    initial: Run,
    inputAssets: Asset[],
    params: Record<string, unknown>,
  ): Promise<ExecutionOutcome> {
    const { definition, method, backend } = this.prepare(jobName, params);

    let run = (await this.store.runs.getById(initial.id)) ?? (await this.store.runs.create(initial));
    run = await this.transitionRun(run, RunStatus.Running, {
      startedAt: this.options.now().toISOString(),
      method: method.name,
      runnerVersion: this.options.runnerVersion,
    });

    let workDir: string | undefined;
    try {
      workDir = await fs.mkdtemp(path.join(this.options.workRoot, 'jobgraph-'));
      const ctx = buildContext(definition, method, inputAssets, params, { now: this.options.now });
      const files = renderMethodFiles(definition, method, ctx, inputAssets, params);
      for (const [name, content] of Object.entries(files)) {
        await fs.writeFile(path.join(workDir, name), content, 'utf8');
      }

      const inputFile = method.template !== undefined ? method.inputFile : Object.keys(files)[0];
      const spec = backend.prepare({
        method,
        workDir,
        inputFile,
        defaultTimeoutSec: this.options.defaultTimeoutSec,
      });
      for (const [name, content] of Object.entries(spec.files)) {
        await fs.writeFile(path.join(workDir, name), content, 'utf8');
      }

      log.info('Launching command', { runId: run.id, mode: backend.mode, command: spec.command });
      const outcome = await this.options.launcher.run(spec);
      checkOutcome(spec.command, spec.timeoutSec, outcome);
      log.debug('Command finished', { runId: run.id, exitCode: outcome.exitCode, durationMs: outcome.durationMs });

      const written = [...Object.keys(files), ...Object.keys(spec.files)];
      const outputs = await discoverOutputs(workDir, definition.expectedOutputs, written);
      const parsed = await collectResults(definition, workDir, outputs);

      const produced = materialize({
        definition,
        method: method.name,
        runId: run.id,
        inputAssets,
        params,
        results: parsed.results,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        timestamp: this.options.now().toISOString(),
      });
      const assets = [produced.results, produced.log, ...produced.auxiliary];

      await this.store.ledger.putMany([...inputAssets, ...assets]);
      await this.store.ledger.append(produced.edges);

      run = await this.transitionRun(run, RunStatus.Done, { endedAt: this.options.now().toISOString() });
      log.info('Run completed', { runId: run.id, job: definition.name, results: produced.results.id });
      return { run, assets, edges: produced.edges };
    } catch (err) {
      const error: TypedError = { ...toTypedError(err), runId: run.id };
      await this.transitionRun(run, RunStatus.Error, { endedAt: this.options.now().toISOString(), error });
      log.error('Run failed', { runId: run.id, job: definition.name, code: error.code, error: error.message });
      throw new EngineError(error);
    } finally {
      if (workDir !== undefined) await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private async transitionRun(run: Run, target: RunStatus, updates: Partial<Run> = {}): Promise<Run> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success && result.error) {
      throw new EngineError({ ...result.error, runId: run.id });
    }
    const next: Run = { ...run, ...updates, status: target };
    const stored = await this.store.runs.update(run.id, next);
    log.debug('Run transition', { runId: run.id, from: run.status, to: target });
    return stored ?? next;
  }
}

function checkOutcome(command: string, timeoutSec: number, outcome: LaunchOutcome): void {
  if (outcome.timedOut) {
    throw new EngineError(executionTimeoutError(command, timeoutSec));
  }
  if (outcome.exitCode !== 0) {
    throw new EngineError(executionFailedError(command, outcome.exitCode, outcome.stderr));
  }
}
