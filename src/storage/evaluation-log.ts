import { appendFile, readFile } from 'fs/promises';
import { errorMessage } from '../errors.js';
import type { EvaluationFailure, EvaluationRecord } from '../types/index.js';

export type EvaluationLogEntry =
  | { kind: 'evaluation'; at: string; record: EvaluationRecord }
  | { kind: 'failure'; at: string; failure: EvaluationFailure };

function isLogEntry(value: unknown): value is EvaluationLogEntry {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (value.kind === 'evaluation') return 'record' in value;
  return value.kind === 'failure' && 'failure' in value;
}

/**
 * Append-only JSONL log of every evaluation attempt in a run.
 *
 * Appends are chained on one promise so concurrent evaluations never interleave
 * or drop lines.
 */
export class EvaluationLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  append(entry: EvaluationLogEntry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    const write = this.tail.then(() => appendFile(this.path, line, 'utf-8'));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.tail = write.catch(error => {
      console.error(`[Store] Failed to append to ${this.path}:`, errorMessage(error));
    });
    return write;
  }

  /** Resolves once every queued append has settled */
  flush(): Promise<void> {
    return this.tail;
  }

  async readAll(): Promise<EvaluationLogEntry[]> {
    let data: string;
    try {
      data = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    const entries: EvaluationLogEntry[] = [];
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;
      const parsed: unknown = JSON.parse(line);
      if (isLogEntry(parsed)) entries.push(parsed);
    }
    return entries;
  }
}
