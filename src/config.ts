/**
 * Engine configuration from environment variables.
 */

import os from 'os';
import path from 'path';
import { LogLevel, isLogLevel } from './logger';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface EngineConfig {
  /** Directory scanned for job-definition documents. */
  definitionsDir: string;
  /** Durable ledger file. */
  ledgerPath: string;
  /** Parent directory for per-run working directories. */
  workRoot: string;
  /** Timeout applied when neither method nor backend declares one. */
  defaultTimeoutSec: number;
  logLevel: LogLevel;
  port: number;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

function optionalPositiveInt(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Environment variable ${key} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

/** Read engine configuration, failing fast on malformed values. */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const level = optional(env, 'JOBGRAPH_LOG_LEVEL', LogLevel.Info).toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Environment variable JOBGRAPH_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got: ${level}`,
    );
  }

  return {
    definitionsDir: path.resolve(optional(env, 'JOBGRAPH_DEFINITIONS_DIR', 'definitions')),
    ledgerPath: path.resolve(
      optional(env, 'JOBGRAPH_LEDGER_PATH', path.join(os.homedir(), '.jobgraph', 'ledger.json')),
    ),
    workRoot: path.resolve(optional(env, 'JOBGRAPH_WORK_ROOT', os.tmpdir())),
    defaultTimeoutSec: optionalPositiveInt(env, 'JOBGRAPH_DEFAULT_TIMEOUT_SEC', 60),
    logLevel: level,
    port: optionalPositiveInt(env, 'PORT', 5000),
  };
}
