/**
 * Execution backends.
 *
 * A backend turns a prepared working directory into a launch spec: the
 * command line, environment, timeout and any files it needs. Launching
 * itself is left to a ProcessLauncher.
 */

import { EngineError, unknownBackendError } from '../domain/errors';
import {
  DockerBackendConfig,
  ExecutionMode,
  HpcBackendConfig,
  JobDefinition,
  LocalBackendConfig,
  MethodDefinition,
  declaredModes,
} from '../dsl/schema';
import { LaunchSpec } from './launcher';

export const DEFAULT_EXECUTABLE = 'echo';
export const DEFAULT_COMMAND_TEMPLATE = '{executable} {input_file}';
export const BATCH_SCRIPT = 'job.sh';

export interface BackendContext {
  method: MethodDefinition;
  workDir: string;
  /** Main input file name inside the working directory. */
  inputFile: string;
  defaultTimeoutSec: number;
  /** Base environment the backend's settings are merged over. */
  baseEnv?: Record<string, string | undefined>;
}

export interface ExecutionBackend {
  readonly mode: ExecutionMode;
  prepare(ctx: BackendContext): LaunchSpec;
}

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value !== '' && SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function mergeEnv(base: Record<string, string | undefined>, overrides: Record<string, string>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...overrides };
}

/**
 * Fill a command template: `${VAR}` from the environment first, then
 * `{key}` from the backend variables. Unknown references stay as written.
 */
export function fillCommand(template: string, vars: Record<string, string>, env: Record<string, string>): string {
  const withEnv = template.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (whole, name: string) => env[name] ?? whole);
  return withEnv.replace(/(?<!\$)\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (whole, name: string) => vars[name] ?? whole);
}

abstract class BaseBackend<C extends LocalBackendConfig> implements ExecutionBackend {
  abstract readonly mode: ExecutionMode;

  constructor(protected readonly config: C) {}

  protected timeoutSec(ctx: BackendContext): number {
    return ctx.method.timeoutSec ?? this.config.timeoutSec ?? ctx.defaultTimeoutSec;
  }

  protected env(ctx: BackendContext): Record<string, string> {
    return mergeEnv(ctx.baseEnv ?? process.env, this.config.environment);
  }

  protected variables(ctx: BackendContext): Record<string, string> {
    return {
      executable: this.config.executable ?? DEFAULT_EXECUTABLE,
      input_file: ctx.inputFile,
      work_dir: ctx.workDir,
    };
  }

  protected commandTemplate(ctx: BackendContext): string {
    return ctx.method.commandTemplate ?? this.config.commandTemplate ?? DEFAULT_COMMAND_TEMPLATE;
  }

  abstract prepare(ctx: BackendContext): LaunchSpec;
}

export class LocalBackend extends BaseBackend<LocalBackendConfig> {
  readonly mode = 'local';

  prepare(ctx: BackendContext): LaunchSpec {
    const env = this.env(ctx);
    return {
      command: fillCommand(this.commandTemplate(ctx), this.variables(ctx), env),
      cwd: ctx.workDir,
      env,
      timeoutSec: this.timeoutSec(ctx),
      files: {},
    };
  }
}

export class DockerBackend extends BaseBackend<DockerBackendConfig> {
  readonly mode = 'docker';

  protected variables(ctx: BackendContext): Record<string, string> {
    return {
      ...super.variables(ctx),
      work_dir: this.config.mountPath,
      mount_path: this.config.mountPath,
      image: this.config.image,
    };
  }

  protected commandTemplate(ctx: BackendContext): string {
    return ctx.method.commandTemplate ?? this.config.commandTemplate ?? this.config.command ?? DEFAULT_COMMAND_TEMPLATE;
  }

  prepare(ctx: BackendContext): LaunchSpec {
    const env = this.env(ctx);
    const inner = fillCommand(this.commandTemplate(ctx), this.variables(ctx), env);
    const mount = this.config.mountPath;
    const parts = ['docker', 'run', '--rm', '-v', shellQuote(`${ctx.workDir}:${mount}`), '-w', shellQuote(mount)];
    for (const [key, value] of Object.entries(this.config.environment)) {
      parts.push('-e', shellQuote(`${key}=${value}`));
    }
    parts.push(shellQuote(this.config.image), inner);
    return {
      command: parts.join(' '),
      cwd: ctx.workDir,
      env,
      timeoutSec: this.timeoutSec(ctx),
      files: {},
    };
  }
}

export class HpcBackend extends BaseBackend<HpcBackendConfig> {
  readonly mode = 'hpc';

  /** Batch script: shebang, scheduler directives, exports, then the command. */
  buildScript(ctx: BackendContext, command: string): string {
    const lines = ['#!/bin/bash'];
    for (const directive of this.config.directives) {
      lines.push(directive.startsWith('#') ? directive : `#SBATCH ${directive}`);
    }
    for (const [key, value] of Object.entries(this.config.environment)) {
      lines.push(`export ${key}=${shellQuote(value)}`);
    }
    lines.push(`cd ${shellQuote(ctx.workDir)}`, command, '');
    return lines.join('\n');
  }

  prepare(ctx: BackendContext): LaunchSpec {
    const env = this.env(ctx);
    const command = fillCommand(this.commandTemplate(ctx), this.variables(ctx), env);
    return {
      command: `${this.config.submitCommand} ${BATCH_SCRIPT}`,
      cwd: ctx.workDir,
      env,
      timeoutSec: this.timeoutSec(ctx),
      files: { [BATCH_SCRIPT]: this.buildScript(ctx, command) },
    };
  }
}

/**
 * Pick the backend for a run: `params.execution_mode`, then the
 * definition's `execution.mode`, then `local` if declared, then the first
 * declared mode.
 */
export function selectBackend(definition: JobDefinition, params: Record<string, unknown>): ExecutionBackend {
  const declared = declaredModes(definition);
  const requested = typeof params.execution_mode === 'string' ? params.execution_mode : definition.execution.mode;
  const mode: string | undefined = requested ?? (declared.includes('local') ? 'local' : declared[0]);

  const { local, docker, hpc } = definition.execution;
  if (mode === 'local' && local) return new LocalBackend(local);
  if (mode === 'docker' && docker) return new DockerBackend(docker);
  if (mode === 'hpc' && hpc) return new HpcBackend(hpc);
  throw new EngineError(unknownBackendError(definition.name, mode ?? '(none)', declared));
}
