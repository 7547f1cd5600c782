import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';

// Dot-file: run ids cannot start with '.'
export const REGISTRY_FILE = '.run-registry.json';

const MAX_ENTRIES = 100;

const RunMetadataSchema = z.object({
  runId: z.string(),
  path: z.string(),             // run.json path for structured access
  reportPath: z.string().optional(),
  timestamp: z.string(),
  tasks: z.array(z.string()),
  winner: z.string().nullable(),
  verdict: z.string(),
  complete: z.boolean(),
  summary: z.string(),          // one line for list views
});

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

const RegistrySchema = z.object({
  runs: z.array(RunMetadataSchema),
  lastUpdated: z.string(),
});

type Registry = z.infer<typeof RegistrySchema>;

/**
 * Index of persisted runs, most recent first
 */
export class RunRegistry {
  readonly file: string;

  constructor(runsDir: string) {
    this.file = join(runsDir, REGISTRY_FILE);
  }

  private ensureDir(): void {
    const dir = dirname(this.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  load(): Registry {
    if (!existsSync(this.file)) {
      return { runs: [], lastUpdated: new Date().toISOString() };
    }

    try {
      return RegistrySchema.parse(JSON.parse(readFileSync(this.file, 'utf-8')));
    } catch (error) {
      console.error(`[Store] Registry ${this.file} unreadable, starting empty:`, errorMessage(error));
      return { runs: [], lastUpdated: new Date().toISOString() };
    }
  }

  private save(registry: Registry): void {
    this.ensureDir();
    registry.lastUpdated = new Date().toISOString();
    writeFileSync(this.file, JSON.stringify(registry, null, 2));
  }

  /**
   * Register a persisted run. Re-persisting a run replaces its entry.
   */
  register(metadata: RunMetadata): void {
    const registry = this.load();

    registry.runs = registry.runs.filter(r => r.runId !== metadata.runId);
    registry.runs.unshift(metadata);

    if (registry.runs.length > MAX_ENTRIES) {
      registry.runs = registry.runs.slice(0, MAX_ENTRIES);
    }

    this.save(registry);
  }

  getAll(limit: number = 20): RunMetadata[] {
    return this.load().runs.slice(0, limit);
  }

  getById(runId: string): RunMetadata | undefined {
    return this.load().runs.find(r => r.runId === runId);
  }

  /**
   * Most recently registered run other than `excludeRunId`
   */
  latest(excludeRunId?: string): RunMetadata | undefined {
    return this.load().runs.find(r => r.runId !== excludeRunId);
  }

  /**
   * Compact listing for agent context
   */
  format(limit: number = 10): string {
    const runs = this.getAll(limit);

    if (runs.length === 0) {
      return 'No persisted runs.';
    }

    const lines = ['PERSISTED RUNS (most recent first):'];
    runs.forEach((r, i) => {
      lines.push(`${i + 1}. [${r.timestamp.slice(0, 10)}] ${r.runId}${r.complete ? '' : ' (incomplete)'}`);
      lines.push(`   ${r.summary}`);
      lines.push(`   Path: ${r.path}`);
    });

    return lines.join('\n');
  }
}
