/**
 * Process launcher.
 *
 * Runs one shell command in a working directory, capturing output. The
 * default launcher spawns a detached shell so a timeout can SIGKILL the
 * whole process group.
 */

import { ChildProcess, spawn } from 'child_process';
import { logger } from '../logger';

const log = logger.child({ module: 'launcher' });

export interface LaunchSpec {
  /** Shell command line. */
  command: string;
  cwd: string;
  /** Complete environment for the process. */
  env: Record<string, string>;
  timeoutSec: number;
  /** Extra files the backend needs written before launch (e.g. a batch script). */
  files: Record<string, string>;
}

export interface LaunchOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

export interface ProcessLauncher {
  run(spec: LaunchSpec): Promise<LaunchOutcome>;
}

function killGroup(proc: ChildProcess): void {
  if (proc.pid === undefined) return;
  try {
    process.kill(-proc.pid, 'SIGKILL');
  } catch (err) {
    log.debug('Process group kill failed, killing child', {
      pid: proc.pid,
      error: err instanceof Error ? err.message : String(err),
    });
    proc.kill('SIGKILL');
  }
}

export class ShellProcessLauncher implements ProcessLauncher {
  run(spec: LaunchSpec): Promise<LaunchOutcome> {
    return new Promise((resolve, reject) => {
      const started = Date.now();
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const proc = spawn(spec.command, {
        cwd: spec.cwd,
        env: spec.env,
        shell: true,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        log.warn('Command timed out, killing', { command: spec.command, timeoutSec: spec.timeoutSec });
        killGroup(proc);
      }, spec.timeoutSec * 1000);

      // Decoded per stream so a character split across chunks stays whole.
      proc.stdout?.setEncoding('utf8');
      proc.stderr?.setEncoding('utf8');
      proc.stdout?.on('data', (data: string) => {
        stdout += data;
      });
      proc.stderr?.on('data', (data: string) => {
        stderr += data;
      });

      proc.on('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });

      proc.on('close', (code: number | null) => {
        clearTimeout(timer);
        resolve({ exitCode: code, stdout, stderr, durationMs: Date.now() - started, timedOut });
      });
    });
  }
}
