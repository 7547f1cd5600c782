/**
 * Run Orchestrator end to end, with in-process judges and temp run directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { StaticCaptureSource } from '../capture.js';
import { loadSettings, type Settings } from '../config.js';
import {
  ConfigInvalidError,
  InvalidPhaseTransitionError,
  JudgeResponseMalformedError,
  NoBaselineFoundError,
  PhasePreconditionError,
  RunAlreadyExistsError,
  RunNotFoundError,
} from '../errors.js';
import { LLMError } from '../clients/llm.js';
import { RunOrchestrator, assertTransition, nextPhase } from '../run-orchestrator.js';
import { EvaluationLog } from '../storage/evaluation-log.js';
import { RunRegistry } from '../storage/run-registry.js';
import { RunStore } from '../storage/run-store.js';
import type { ImagePair, RunRecord } from '../types/index.js';
import { FakeJudge, pair } from './helpers/fixtures.js';

let dir: string;
let settings: Settings;
let store: RunStore;
let registry: RunRegistry;
let technical: FakeJudge;
let preference: FakeJudge;
let orchestrator: RunOrchestrator;

function pairsFor(tasks: string[], imagesPerTask: number): ImagePair[] {
  return tasks.flatMap(task => Array.from({ length: imagesPerTask }, (_, i) => pair(task, i + 1)));
}

function config(runId: string, extra: Record<string, unknown> = {}) {
  return { runId, tasks: ['Anime', 'Pop Art'], imagesPerTask: 2, ...extra };
}

const source = new StaticCaptureSource(pairsFor(['Anime', 'Pop Art'], 2));

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'restyle-run-'));
  settings = loadSettings({ RESTYLE_RUNS_DIR: dir, EVAL_PARALLELISM: '2', COMPARE_EPSILON: '0.5' });
  store = new RunStore(dir);
  registry = new RunRegistry(dir);
  technical = new FakeJudge('judge-t', {
    answers: { Anime: { answer: true, confidence: 5 }, 'Pop Art': { answer: true, confidence: 4 } },
  });
  preference = new FakeJudge('judge-p', { preferenceOrder: ['Pop Art', 'Anime'] });
  orchestrator = new RunOrchestrator({
    settings,
    store,
    registry,
    judgeFactory: role => (role === 'technical' ? technical : preference),
  });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('state machine', () => {
  it('allows each phase only from its predecessor', () => {
    expect(() => assertTransition('capture', 'validated')).not.toThrow();
    expect(() => assertTransition('persist', 'persisted')).not.toThrow();
    expect(() => assertTransition('rank', 'captured')).toThrow(InvalidPhaseTransitionError);
    expect(() => assertTransition('evaluate', 'persisted')).toThrow(
      'Cannot run phase "evaluate" from state "persisted" (requires captured)'
    );
    expect(nextPhase('compared')).toBe('persist');
    expect(nextPhase('persisted')).toBeNull();
  });
});

describe('RunOrchestrator', () => {
  it('runs every phase and persists the result', async () => {
    const record = await orchestrator.start(config('run-1'), source);

    expect(record.state).toBe('persisted');
    expect(record.complete).toBe(true);
    expect(technical.evaluated).toHaveLength(4);
    expect(record.taskSummaries.map(s => [s.task, s.avgPercentage, s.avgGrade])).toEqual([
      ['Anime', 100, 'A+'],
      ['Pop Art', 80, 'A'],
    ]);
    expect(record.technicalRanking.map(r => r.task)).toEqual(['Anime', 'Pop Art']);
    expect(record.finalRankings).toEqual([
      { task: 'Anime', technicalRank: 1, preferenceRank: 2, finalScore: 1.5, rank: 1 },
      { task: 'Pop Art', technicalRank: 2, preferenceRank: 1, finalScore: 1.5, rank: 2 },
    ]);
    expect(record.winner).toBe('Anime');
    expect(record.comparison?.summary.verdict).toBe('NO_BASELINE');

    const saved = await store.require('run-1');
    expect(saved.state).toBe('persisted');
    expect(saved.persistedAt).not.toBeNull();

    const report = await readFile(store.reportPath('run-1'), 'utf-8');
    expect(report).toContain('# Restyle Evaluation: run-1');
    expect(report).toContain('| 1 | Anime | 1 | 2 | 1.50 |');

    expect(registry.getById('run-1')?.winner).toBe('Anime');
    expect(await new EvaluationLog(store.evaluationLogPath('run-1')).readAll()).toHaveLength(4);
  });

  it('sends the preference judge one candidate per task', async () => {
    await orchestrator.start(config('run-1'), source);
    expect(preference.rankCalls).toEqual([
      [
        { task: 'Anime', originalImage: 'originals/photo_1.jpg', transformedImage: 'anime/photo_1.png' },
        { task: 'Pop Art', originalImage: 'originals/photo_1.jpg', transformedImage: 'pop art/photo_1.png' },
      ],
    ]);
  });

  it('records a failed pair and finishes the batch', async () => {
    technical = new FakeJudge('judge-t', {
      failImages: { 'pop art/photo_2.png': new JudgeResponseMalformedError('no valid response', 'judge-t', 3) },
    });

    const record = await orchestrator.start(config('run-1'), source);

    expect(record.state).toBe('persisted');
    expect(record.complete).toBe(false);
    expect(record.evaluations).toHaveLength(3);
    expect(record.failures).toEqual([
      { pair: pair('Pop Art', 2), code: 'JUDGE_RESPONSE_MALFORMED', message: 'no valid response', attempts: 3 },
    ]);
    expect(record.taskSummaries.find(s => s.task === 'Pop Art')?.evaluations).toBe(1);

    const log = await new EvaluationLog(store.evaluationLogPath('run-1')).readAll();
    expect(log.filter(e => e.kind === 'failure')).toHaveLength(1);

    const report = await readFile(store.reportPath('run-1'), 'utf-8');
    expect(report).toContain('> Incomplete run: 1 of 4 evaluations failed.');
  });

  it('stops at capture when the pair count is wrong', async () => {
    const short = new StaticCaptureSource(pairsFor(['Anime', 'Pop Art'], 1));

    await expect(orchestrator.start(config('run-1'), short)).rejects.toBeInstanceOf(PhasePreconditionError);

    const saved = await store.require('run-1');
    expect(saved.state).toBe('validated');
    expect(saved.lastError?.phase).toBe('capture');
    expect(saved.lastError?.message).toBe('capture: expected 4 pairs (2 tasks × 2 images), got 2');
    expect(technical.evaluated).toHaveLength(0);
  });

  it('keeps at most EVAL_PARALLELISM judge calls in flight', async () => {
    technical = new FakeJudge('judge-t', { delayMs: 5 });
    const six = new StaticCaptureSource(pairsFor(['Anime', 'Pop Art'], 3));

    const record = await orchestrator.start(config('run-1', { imagesPerTask: 3 }), six);

    expect(technical.evaluated).toHaveLength(6);
    expect(record.evaluations).toHaveLength(6);
    expect(technical.maxInFlight).toBe(2);
  });

  it('rejects a phase out of order', async () => {
    const record = await orchestrator.init(await orchestrator.validate(config('run-1')));
    await expect(orchestrator.rank(record)).rejects.toBeInstanceOf(InvalidPhaseTransitionError);
    expect(record.state).toBe('validated');
  });

  it('refuses to reuse a run id', async () => {
    await orchestrator.start(config('run-1'), source);
    await expect(orchestrator.start(config('run-1'), source)).rejects.toBeInstanceOf(RunAlreadyExistsError);
  });

  it('refuses to rank when every evaluation failed', async () => {
    technical = new FakeJudge('judge-t', {
      failTasks: {
        Anime: new LLMError('LLM call failed: 503', 'judge-t'),
        'Pop Art': new LLMError('LLM call failed: 503', 'judge-t'),
      },
    });

    await expect(orchestrator.start(config('run-1'), source)).rejects.toBeInstanceOf(PhasePreconditionError);

    const saved = await store.require('run-1');
    expect(saved.state).toBe('evaluated');
    expect(saved.complete).toBe(false);
    expect(saved.failures.map(f => f.code)).toEqual(['JUDGE_TRANSPORT', 'JUDGE_TRANSPORT', 'JUDGE_TRANSPORT', 'JUDGE_TRANSPORT']);
    expect(saved.lastError?.phase).toBe('rank');
  });

  it('resumes from the last valid state after a phase fails', async () => {
    preference = new FakeJudge('judge-p', { rankError: new LLMError('LLM call failed: timeout', 'judge-p') });
    await expect(orchestrator.start(config('run-1'), source)).rejects.toBeInstanceOf(LLMError);

    const stopped = await store.require('run-1');
    expect(stopped.state).toBe('evaluated');
    expect(stopped.lastError).toMatchObject({ phase: 'rank', code: 'JUDGE_TRANSPORT' });

    preference = new FakeJudge('judge-p', { preferenceOrder: ['Pop Art', 'Anime'] });
    const resumed = await orchestrator.resume('run-1');

    expect(resumed.state).toBe('persisted');
    expect(resumed.lastError).toBeNull();
    expect(technical.evaluated).toHaveLength(4);
  });

  it('registers a run only once its record is saved as persisted', async () => {
    class FailingStore extends RunStore {
      async save(record: RunRecord): Promise<void> {
        if (record.state === 'persisted') throw new Error('disk full');
        return super.save(record);
      }
    }
    const failing = new RunOrchestrator({
      settings,
      store: new FailingStore(dir),
      registry,
      judgeFactory: role => (role === 'technical' ? technical : preference),
    });

    await expect(failing.start(config('run-1'), source)).rejects.toThrow('disk full');

    expect(registry.getAll()).toEqual([]);
    expect((await store.require('run-1')).state).toBe('compared');
  });

  it('can persist again', async () => {
    const record = await orchestrator.start(config('run-1'), source);
    const again = await orchestrator.persist(record);
    expect(again.state).toBe('persisted');
    expect(registry.getAll().map(r => r.runId)).toEqual(['run-1']);
  });
});

describe('baseline comparison', () => {
  it('compares against the configured baseline', async () => {
    technical = new FakeJudge('judge-t', {
      answers: { Anime: { answer: true, confidence: 3 }, 'Pop Art': { answer: true, confidence: 4 } },
    });
    await orchestrator.start(config('run-1'), source);

    technical = new FakeJudge('judge-t', {
      answers: { Anime: { answer: true, confidence: 5 }, 'Pop Art': { answer: true, confidence: 4 } },
    });
    const record = await orchestrator.start(config('run-2', { baselineRunId: 'run-1' }), source);

    expect(record.comparison?.baselineRunId).toBe('run-1');
    expect(record.comparison?.results).toEqual([
      {
        task: 'Anime',
        status: 'IMPROVED',
        baselinePercentage: 60,
        currentPercentage: 100,
        delta: 40,
        baselineGrade: 'C',
        currentGrade: 'A+',
        scoreDelta: 10,
      },
      {
        task: 'Pop Art',
        status: 'UNCHANGED',
        baselinePercentage: 80,
        currentPercentage: 80,
        delta: 0,
        baselineGrade: 'A',
        currentGrade: 'A',
        scoreDelta: 0,
      },
    ]);
    expect(record.comparison?.summary.verdict).toBe('IMPROVED');
    expect(registry.getById('run-2')?.verdict).toBe('IMPROVED');
  });

  it('picks the latest persisted run with autoBaseline', async () => {
    await orchestrator.start(config('run-1'), source);
    await orchestrator.start(config('run-2'), source);
    const record = await orchestrator.start(config('run-3', { autoBaseline: true }), source);

    expect(record.comparison?.baselineRunId).toBe('run-2');
    expect(record.comparison?.summary.verdict).toBe('UNCHANGED');
  });

  it('records a missing baseline as a notice', async () => {
    const record = await orchestrator.start(config('run-2', { baselineRunId: 'run-0' }), source);

    expect(record.state).toBe('persisted');
    expect(record.comparison?.summary.verdict).toBe('NO_BASELINE');
    expect(record.comparison?.notice).toBe('Baseline run "run-0" has not been persisted');
    expect(record.comparison?.results).toEqual([]);
  });
});

describe('compareStored', () => {
  it('compares two persisted runs', async () => {
    await orchestrator.start(config('run-1'), source);
    await orchestrator.start(config('run-2'), source);

    const report = await orchestrator.compareStored('run-2', 'run-1');

    expect(report.baselineRunId).toBe('run-1');
    expect(report.results.map(r => [r.task, r.status])).toEqual([
      ['Anime', 'UNCHANGED'],
      ['Pop Art', 'UNCHANGED'],
    ]);
    expect(report.summary.verdict).toBe('UNCHANGED');
  });

  it('refuses runs that were never persisted', async () => {
    await orchestrator.init(await orchestrator.validate(config('run-1')));
    await orchestrator.start(config('run-2'), source);

    await expect(orchestrator.compareStored('run-2', 'run-1')).rejects.toBeInstanceOf(NoBaselineFoundError);
    await expect(orchestrator.compareStored('run-1', 'run-2')).rejects.toThrow(
      'compare: run "run-1" has not been persisted (state validated)'
    );
    await expect(orchestrator.compareStored('run-2', 'run-9')).rejects.toBeInstanceOf(RunNotFoundError);
  });
});

describe('validate', () => {
  it('lists every schema problem', async () => {
    try {
      await orchestrator.validate({ runId: 'bad id!', tasks: [], imagesPerTask: 0 });
      expect.unreachable('validate should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvalidError);
      if (error instanceof ConfigInvalidError) {
        expect(error.problems).toHaveLength(3);
        expect(error.problems[0]).toMatch(/^runId: /);
      }
    }
  });

  it('checks judge credentials for the default judges', async () => {
    const real = new RunOrchestrator({ settings, store, registry });
    try {
      await real.validate(config('run-1'));
      expect.unreachable('validate should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvalidError);
      if (error instanceof ConfigInvalidError) {
        expect(error.problems).toEqual([
          'judges.technical: no API key for provider "gemini"',
          'judges.preference: no API key for provider "anthropic"',
        ]);
      }
    }
  });

  it('rejects a run that is its own baseline', async () => {
    await expect(orchestrator.validate(config('run-1', { baselineRunId: 'run-1' }))).rejects.toThrow(
      'baselineRunId: a run cannot be its own baseline'
    );
  });

  it('rejects duplicate tasks', async () => {
    await expect(orchestrator.validate(config('run-1', { tasks: ['Anime', 'Anime'] }))).rejects.toThrow(
      'tasks: duplicate task names Anime'
    );
  });
});
