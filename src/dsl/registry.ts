/**
 * Definition registry: discovers job definitions in a directory and looks
 * them up by normalized name.
 */

import fs from 'fs/promises';
import path from 'path';
import { EngineError, jobNotFoundError } from '../domain/errors';
import { logger } from '../logger';
import { DefinitionError, loadJobDefinitionFile } from './loader';
import { JobDefinition } from './schema';

const log = logger.child({ module: 'registry' });

/** Lowercase, with whitespace runs and dashes folded to underscores. */
export function normalizeJobName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

interface RegistryEntry {
  /** File stem, or the declared name for in-memory definitions. */
  key: string;
  definition: Readonly<JobDefinition>;
}

export interface RegistryLoadFailure {
  file: string;
  message: string;
}

export class DefinitionRegistry {
  private entries: RegistryEntry[] = [];
  private failures: RegistryLoadFailure[] = [];

  private constructor(readonly dir?: string) {}

  /** Load every `*.json` definition in `dir`. Invalid documents are skipped. */
  static async load(dir: string): Promise<DefinitionRegistry> {
    const registry = new DefinitionRegistry(dir);
    await registry.reload();
    return registry;
  }

  static fromDefinitions(definitions: ReadonlyArray<Readonly<JobDefinition>>): DefinitionRegistry {
    const registry = new DefinitionRegistry();
    registry.entries = definitions.map((definition) => ({ key: definition.name, definition }));
    return registry;
  }

  /** Re-scan the directory; a registry built from definitions is left as-is. */
  async reload(): Promise<void> {
    if (this.dir === undefined) return;
    let files: string[];
    try {
      files = (await fs.readdir(this.dir)).filter((file) => file.endsWith('.json')).sort();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        log.warn('Definitions directory not found', { dir: this.dir });
        this.entries = [];
        this.failures = [];
        return;
      }
      throw err;
    }

    const entries: RegistryEntry[] = [];
    const failures: RegistryLoadFailure[] = [];
    for (const file of files) {
      const filePath = path.join(this.dir, file);
      try {
        const definition = await loadJobDefinitionFile(filePath);
        entries.push({ key: path.basename(file, '.json'), definition });
      } catch (err) {
        const message = err instanceof DefinitionError ? err.format() : err instanceof Error ? err.message : String(err);
        failures.push({ file: filePath, message });
        log.error('Skipping invalid job definition', { file: filePath, error: message });
      }
    }
    this.entries = entries;
    this.failures = failures;
    log.info('Job definitions loaded', { dir: this.dir, count: entries.length, failed: failures.length });
  }

  /**
   * Find a definition whose file stem or declared name normalizes to the
   * same form as `name`. Throws CONFIG.JOB_NOT_FOUND listing known names.
   */
  find(name: string): Readonly<JobDefinition> {
    const wanted = normalizeJobName(name);
    if (wanted) {
      const entry =
        this.entries.find((candidate) => normalizeJobName(candidate.key) === wanted) ??
        this.entries.find((candidate) => normalizeJobName(candidate.definition.name) === wanted);
      if (entry) return entry.definition;
    }
    throw new EngineError(jobNotFoundError(name, this.names()));
  }

  has(name: string): boolean {
    const wanted = normalizeJobName(name);
    return this.entries.some(
      (entry) => normalizeJobName(entry.key) === wanted || normalizeJobName(entry.definition.name) === wanted,
    );
  }

  /** Declared job names, in load order. */
  names(): string[] {
    return this.entries.map((entry) => entry.definition.name);
  }

  list(): Array<Readonly<JobDefinition>> {
    return this.entries.map((entry) => entry.definition);
  }

  loadFailures(): RegistryLoadFailure[] {
    return [...this.failures];
  }
}
