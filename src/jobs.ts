import { errorCode, errorMessage } from './errors.js';
import type { RunRecord } from './types/index.js';

export interface BackgroundRun {
  runId: string;
  status: 'running' | 'finished' | 'failed';
  startedAt: number;
  finishedAt?: number;
  error?: { code: string; message: string };
}

// Runs driven by this server process. The run record on disk stays the source of truth.
export const backgroundRuns = new Map<string, BackgroundRun>();

export function isRunning(runId: string): boolean {
  return backgroundRuns.get(runId)?.status === 'running';
}

/**
 * Drive a run in the background and track its outcome
 */
export function launchRun(runId: string, work: () => Promise<RunRecord>): BackgroundRun {
  const entry: BackgroundRun = { runId, status: 'running', startedAt: Date.now() };
  backgroundRuns.set(runId, entry);

  void work().then(
    record => {
      entry.status = 'finished';
      entry.finishedAt = Date.now();
      console.error(`[Run] ${runId} finished in state ${record.state}`);
    },
    error => {
      entry.status = 'failed';
      entry.finishedAt = Date.now();
      entry.error = { code: errorCode(error), message: errorMessage(error) };
      console.error(`[Run] ${runId} stopped:`, entry.error.message);
    }
  );

  return entry;
}
