import { writeFile, readFile, mkdir, rename, access } from 'fs/promises';
import { join, resolve } from 'path';
import { RunAlreadyExistsError, RunNotFoundError } from '../errors.js';
import { RUN_STATES, type RunRecord, type RunState } from '../types/index.js';
import type { RunConfig } from '../config.js';

export const RECORD_FILE = 'run.json';
export const CONFIG_FILE = 'run_config.json';
export const REPORT_FILE = 'report.md';
export const EVALUATION_LOG_FILE = 'evaluations.jsonl';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRunState(value: unknown): value is RunState {
  return RUN_STATES.some(state => state === value);
}

function isRunRecord(value: unknown): value is RunRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('runId' in value) || typeof value.runId !== 'string') return false;
  if (!('state' in value) || !isRunState(value.state)) return false;
  if (!('evaluations' in value) || !Array.isArray(value.evaluations)) return false;
  return 'taskSummaries' in value && Array.isArray(value.taskSummaries);
}

/**
 * File-based run persistence: one directory per run under the runs root.
 */
export class RunStore {
  readonly runsDir: string;

  constructor(runsDir: string) {
    this.runsDir = resolve(runsDir);
  }

  runDir(runId: string): string {
    return join(this.runsDir, runId);
  }

  recordPath(runId: string): string {
    return join(this.runDir(runId), RECORD_FILE);
  }

  reportPath(runId: string): string {
    return join(this.runDir(runId), REPORT_FILE);
  }

  evaluationLogPath(runId: string): string {
    return join(this.runDir(runId), EVALUATION_LOG_FILE);
  }

  async exists(runId: string): Promise<boolean> {
    try {
      await access(this.runDir(runId));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  /**
   * Allocate the run directory and write the initial record and its configuration.
   *
   * @throws RunAlreadyExistsError when the directory is already there
   */
  async create(record: RunRecord, config: RunConfig): Promise<void> {
    await mkdir(this.runsDir, { recursive: true });
    try {
      await mkdir(this.runDir(record.runId));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new RunAlreadyExistsError(record.runId);
      }
      throw error;
    }
    await writeFile(join(this.runDir(record.runId), CONFIG_FILE), JSON.stringify(config, null, 2), 'utf-8');
    await this.save(record);
  }

  /**
   * Save the record (write to a temp file, then rename over run.json)
   */
  async save(record: RunRecord): Promise<void> {
    const target = this.recordPath(record.runId);
    const tmp = `${target}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    await rename(tmp, target);
  }

  async load(runId: string): Promise<RunRecord | null> {
    let data: string;
    try {
      data = await readFile(this.recordPath(runId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const parsed: unknown = JSON.parse(data);
    if (!isRunRecord(parsed)) {
      throw new Error(`Run record ${this.recordPath(runId)} is not a valid run record`);
    }
    return parsed;
  }

  async require(runId: string): Promise<RunRecord> {
    const record = await this.load(runId);
    if (!record) throw new RunNotFoundError(runId);
    return record;
  }

  async writeReport(runId: string, markdown: string): Promise<string> {
    const path = this.reportPath(runId);
    await writeFile(path, markdown, 'utf-8');
    return path;
  }
}
