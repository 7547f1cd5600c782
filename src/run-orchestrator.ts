/**
 * Run Orchestrator
 *
 * validated → captured → evaluated → ranked → synthesized → compared → persisted
 *
 * Every phase checks the run's current state, does its work, and saves the
 * record. A failed phase leaves the record in its last valid state with
 * `lastError` set, so the run can be resumed from there.
 */

import { access, mkdir } from 'fs/promises';
import { constants } from 'fs';
import {
  expectedPairCount,
  parseRunConfig,
  resolveJudgeSpecs,
  type JudgeSpec,
  type RunConfig,
  type Settings,
} from './config.js';
import type { CaptureSource } from './capture.js';
import { compareRuns, summarizeComparison } from './comparison.js';
import {
  ConfigInvalidError,
  InvalidPhaseTransitionError,
  JudgeResponseMalformedError,
  NoBaselineFoundError,
  PhasePreconditionError,
  errorCode,
  errorMessage,
} from './errors.js';
import { formatRunReport, formatComparisonSummary } from './formatting.js';
import { createJudge, type JudgeModel, type JudgeRole, type RankingCandidate } from './judge.js';
import { loadRubricStore, type RubricStore } from './rubric.js';
import { score, summarizeTasks } from './scoring.js';
import { EvaluationLog } from './storage/evaluation-log.js';
import type { RunRegistry } from './storage/run-registry.js';
import type { RunStore } from './storage/run-store.js';
import { computeTechnicalRankings, synthesize } from './synthesis.js';
import type {
  ComparisonReport,
  EvaluationFailure,
  EvaluationRecord,
  ImagePair,
  RunPhase,
  RunRecord,
  RunState,
} from './types/index.js';

const TRANSITIONS: Record<RunPhase, { from: readonly RunState[]; to: RunState }> = {
  capture: { from: ['validated'], to: 'captured' },
  evaluate: { from: ['captured'], to: 'evaluated' },
  rank: { from: ['evaluated'], to: 'ranked' },
  synthesize: { from: ['ranked'], to: 'synthesized' },
  compare: { from: ['synthesized'], to: 'compared' },
  // Persist overwrites in place, so it may be repeated
  persist: { from: ['compared', 'persisted'], to: 'persisted' },
};

const NEXT_PHASE: Record<RunState, RunPhase | null> = {
  validated: 'capture',
  captured: 'evaluate',
  evaluated: 'rank',
  ranked: 'synthesize',
  synthesized: 'compare',
  compared: 'persist',
  persisted: null,
};

export function assertTransition(phase: RunPhase, from: RunState): void {
  const { from: allowed } = TRANSITIONS[phase];
  if (!allowed.includes(from)) {
    throw new InvalidPhaseTransitionError(phase, from, allowed);
  }
}

export function nextPhase(state: RunState): RunPhase | null {
  return NEXT_PHASE[state];
}

export type JudgeFactory = (role: JudgeRole, spec: JudgeSpec, baseDir: string) => JudgeModel;

export interface RunOrchestratorDeps {
  settings: Settings;
  store: RunStore;
  registry: RunRegistry;
  /** Preloaded rubric store; loaded from settings.rubricPath on first use otherwise */
  rubrics?: RubricStore;
  /** Overrides judge construction. API keys are only checked for the default factory. */
  judgeFactory?: JudgeFactory;
}

type PairOutcome = { ok: true; record: EvaluationRecord } | { ok: false; failure: EvaluationFailure };

export class RunOrchestrator {
  private readonly settings: Settings;
  private readonly store: RunStore;
  private readonly registry: RunRegistry;
  private readonly judgeFactory: JudgeFactory;
  private readonly checkCredentials: boolean;
  private rubrics: RubricStore | null;

  constructor(deps: RunOrchestratorDeps) {
    this.settings = deps.settings;
    this.store = deps.store;
    this.registry = deps.registry;
    this.rubrics = deps.rubrics ?? null;
    this.checkCredentials = !deps.judgeFactory;
    this.judgeFactory =
      deps.judgeFactory ?? ((role, spec, baseDir) => createJudge(role, spec, deps.settings, baseDir));
  }

  async getRubrics(): Promise<RubricStore> {
    if (!this.rubrics) {
      this.rubrics = await loadRubricStore(this.settings.rubricPath);
    }
    return this.rubrics;
  }

  /**
   * Check a run configuration before any external call.
   *
   * @throws ConfigInvalidError listing every failed check
   */
  async validate(input: unknown): Promise<RunConfig> {
    const parsed = parseRunConfig(input);
    if ('problems' in parsed) {
      throw new ConfigInvalidError(parsed.problems);
    }
    const config = parsed.config;
    const problems: string[] = [];

    if (config.baselineRunId === config.runId) {
      problems.push('baselineRunId: a run cannot be its own baseline');
    }

    if (this.checkCredentials) {
      const specs = resolveJudgeSpecs(config, this.settings);
      for (const role of ['technical', 'preference'] as const) {
        const provider = specs[role].provider;
        if (!this.settings.apiKeys[provider]) {
          problems.push(`judges.${role}: no API key for provider "${provider}"`);
        }
      }
    }

    try {
      await this.getRubrics();
    } catch (error) {
      problems.push(`rubric store: ${errorMessage(error)}`);
    }

    try {
      await mkdir(this.store.runsDir, { recursive: true });
      await access(this.store.runsDir, constants.W_OK);
    } catch (error) {
      problems.push(`output location ${this.store.runsDir}: ${errorMessage(error)}`);
    }

    if (problems.length > 0) {
      throw new ConfigInvalidError(problems);
    }
    return config;
  }

  /**
   * Allocate the run and write its initial record in state `validated`
   */
  async init(config: RunConfig): Promise<RunRecord> {
    const specs = resolveJudgeSpecs(config, this.settings);
    const now = new Date().toISOString();
    const record: RunRecord = {
      runId: config.runId,
      state: 'validated',
      config,
      outputDir: this.store.runDir(config.runId),
      createdAt: now,
      updatedAt: now,
      judges: { technical: specs.technical.model, preference: specs.preference.model },
      pairs: [],
      evaluations: [],
      failures: [],
      taskSummaries: [],
      technicalRanking: [],
      preferenceRanking: null,
      finalRankings: [],
      winner: null,
      comparison: null,
      complete: true,
      lastError: null,
      persistedAt: null,
    };
    await this.store.create(record, config);
    console.error(`[Run] ${record.runId} initialized at ${record.outputDir}`);
    return record;
  }

  private async runPhase(
    record: RunRecord,
    phase: RunPhase,
    work: () => Promise<Partial<RunRecord>>
  ): Promise<RunRecord> {
    assertTransition(phase, record.state);
    console.error(`[Run] ${record.runId}: ${phase}`);

    let updates: Partial<RunRecord>;
    try {
      updates = await work();
    } catch (error) {
      record.lastError = {
        phase,
        code: errorCode(error),
        message: errorMessage(error),
        at: new Date().toISOString(),
      };
      record.updatedAt = record.lastError.at;
      console.error(`[Run] ${record.runId}: ${phase} failed:`, record.lastError.message);
      await this.store.save(record);
      throw error;
    }

    const next: RunRecord = {
      ...record,
      ...updates,
      state: TRANSITIONS[phase].to,
      lastError: null,
      updatedAt: new Date().toISOString(),
    };
    await this.store.save(next);
    return Object.assign(record, next);
  }

  async capture(record: RunRecord, source: CaptureSource): Promise<RunRecord> {
    return this.runPhase(record, 'capture', async () => {
      const pairs = await source.capture(record.config);
      const expected = expectedPairCount(record.config);
      if (pairs.length !== expected) {
        throw new PhasePreconditionError(
          'capture',
          `expected ${expected} pairs (${record.config.tasks.length} tasks × ${record.config.imagesPerTask} images), got ${pairs.length}`
        );
      }
      return { pairs };
    });
  }

  private async evaluatePair(
    pair: ImagePair,
    judge: JudgeModel,
    rubrics: RubricStore,
    log: EvaluationLog
  ): Promise<PairOutcome> {
    const rubric = rubrics.getRubric(pair.task);
    let outcome: PairOutcome;
    try {
      const results = await judge.evaluate(pair, rubric);
      outcome = { ok: true, record: score(rubric, results, pair, judge.model) };
    } catch (error) {
      outcome = {
        ok: false,
        failure: {
          pair,
          code: errorCode(error),
          message: errorMessage(error),
          ...(error instanceof JudgeResponseMalformedError ? { attempts: error.attempts } : {}),
        },
      };
      console.error(`[Run] ${pair.task} ${pair.transformedImage}: ${outcome.failure.code}`);
    }

    const at = new Date().toISOString();
    await log.append(
      outcome.ok ? { kind: 'evaluation', at, record: outcome.record } : { kind: 'failure', at, failure: outcome.failure }
    );
    return outcome;
  }

  /**
   * Judge and score every captured pair, `parallelism` at a time.
   * Per-pair failures are recorded and never abort the batch.
   */
  async evaluate(record: RunRecord): Promise<RunRecord> {
    return this.runPhase(record, 'evaluate', async () => {
      const judge = this.judgeFor('technical', record);
      const rubrics = await this.getRubrics();
      const log = new EvaluationLog(this.store.evaluationLogPath(record.runId));
      const parallelism = Math.max(1, this.settings.parallelism);

      const evaluations: EvaluationRecord[] = [];
      const failures: EvaluationFailure[] = [];

      for (let i = 0; i < record.pairs.length; i += parallelism) {
        const batch = record.pairs.slice(i, i + parallelism);
        const outcomes = await Promise.all(batch.map(pair => this.evaluatePair(pair, judge, rubrics, log)));
        for (const outcome of outcomes) {
          if (outcome.ok) evaluations.push(outcome.record);
          else failures.push(outcome.failure);
        }
      }
      await log.flush();

      console.error(`[Run] ${record.runId}: ${evaluations.length} evaluations succeeded, ${failures.length} failed`);
      return {
        evaluations,
        failures,
        taskSummaries: summarizeTasks(evaluations),
        complete: failures.length === 0,
      };
    });
  }

  /**
   * Technical ranking from scores plus the preference judge's holistic ranking
   */
  async rank(record: RunRecord): Promise<RunRecord> {
    return this.runPhase(record, 'rank', async () => {
      if (record.evaluations.length === 0) {
        throw new PhasePreconditionError('rank', 'no successful evaluations to rank');
      }
      const technicalRanking = computeTechnicalRankings(record.taskSummaries);

      const candidates: RankingCandidate[] = [];
      for (const summary of record.taskSummaries) {
        const first = record.evaluations.find(e => e.task === summary.task);
        if (first) {
          candidates.push({
            task: summary.task,
            originalImage: first.originalImage,
            transformedImage: first.transformedImage,
          });
        }
      }

      const preferenceRanking = await this.judgeFor('preference', record).rank(candidates);
      return { technicalRanking, preferenceRanking };
    });
  }

  async synthesize(record: RunRecord): Promise<RunRecord> {
    return this.runPhase(record, 'synthesize', async () => {
      if (record.evaluations.length === 0) {
        throw new PhasePreconditionError('synthesize', 'no successful evaluations');
      }
      if (!record.preferenceRanking) {
        throw new PhasePreconditionError('synthesize', 'no preference ranking');
      }
      const finalRankings = synthesize(
        record.technicalRanking,
        record.preferenceRanking.rankings,
        record.config.synthesis
      );
      return { finalRankings, winner: finalRankings[0]?.task ?? null };
    });
  }

  private resolveBaselineId(record: RunRecord): string | null {
    if (record.config.baselineRunId) return record.config.baselineRunId;
    if (!record.config.autoBaseline) return null;
    return this.registry.latest(record.runId)?.runId ?? null;
  }

  /**
   * Compare against the baseline run. A missing baseline is a notice, not a failure.
   */
  async compare(record: RunRecord): Promise<RunRecord> {
    return this.runPhase(record, 'compare', async () => {
      const epsilon = this.settings.compareEpsilon;
      const baselineId = this.resolveBaselineId(record);
      if (!baselineId) {
        return { comparison: summarizeComparison(null, [], epsilon, 'No baseline configured') };
      }

      const baseline = await this.store.load(baselineId);
      if (!baseline || baseline.state !== 'persisted') {
        const notice = new NoBaselineFoundError(baselineId).message;
        console.error(`[Run] ${record.runId}: ${notice}`);
        return { comparison: summarizeComparison(null, [], epsilon, notice) };
      }

      const results = compareRuns(record, baseline, epsilon);
      const comparison = summarizeComparison(baselineId, results, epsilon);
      console.error(`[Run] ${record.runId}: ${formatComparisonSummary(comparison)}`);
      return { comparison };
    });
  }

  /**
   * Compare two persisted runs from their stored summaries. No judge calls.
   *
   * @throws RunNotFoundError for an unknown run id
   * @throws PhasePreconditionError when the current run has not been persisted
   * @throws NoBaselineFoundError when the baseline has not been persisted
   */
  async compareStored(
    runId: string,
    baselineRunId: string,
    epsilon = this.settings.compareEpsilon
  ): Promise<ComparisonReport> {
    const current = await this.store.require(runId);
    if (current.state !== 'persisted') {
      throw new PhasePreconditionError('compare', `run "${runId}" has not been persisted (state ${current.state})`);
    }
    const baseline = await this.store.require(baselineRunId);
    if (baseline.state !== 'persisted') {
      throw new NoBaselineFoundError(baselineRunId);
    }
    return summarizeComparison(baselineRunId, compareRuns(current, baseline, epsilon), epsilon);
  }

  /**
   * Write the final record, report.md and the registry entry. Safe to repeat.
   */
  async persist(record: RunRecord): Promise<RunRecord> {
    let reportPath = this.store.reportPath(record.runId);
    await this.runPhase(record, 'persist', async () => {
      const persistedAt = new Date().toISOString();
      reportPath = await this.store.writeReport(
        record.runId,
        formatRunReport({ ...record, state: 'persisted', persistedAt })
      );
      return { persistedAt };
    });

    // Registered once run.json is saved as persisted
    this.registry.register({
      runId: record.runId,
      path: this.store.recordPath(record.runId),
      reportPath,
      timestamp: record.persistedAt ?? record.updatedAt,
      tasks: record.config.tasks,
      winner: record.winner,
      verdict: record.comparison?.summary.verdict ?? 'NO_BASELINE',
      complete: record.complete,
      summary: `winner ${record.winner ?? 'none'}; ${record.evaluations.length} evaluated, ${record.failures.length} failed`,
    });
    console.error(`[Run] ${record.runId}: report saved to ${reportPath}`);
    return record;
  }

  /**
   * Drive the remaining phases from the record's current state
   */
  async runToCompletion(record: RunRecord, source?: CaptureSource): Promise<RunRecord> {
    for (let phase = nextPhase(record.state); phase; phase = nextPhase(record.state)) {
      switch (phase) {
        case 'capture':
          if (!source) {
            throw new PhasePreconditionError('capture', 'no capture source given');
          }
          await this.capture(record, source);
          break;
        case 'evaluate':
          await this.evaluate(record);
          break;
        case 'rank':
          await this.rank(record);
          break;
        case 'synthesize':
          await this.synthesize(record);
          break;
        case 'compare':
          await this.compare(record);
          break;
        case 'persist':
          await this.persist(record);
          break;
      }
    }
    return record;
  }

  /**
   * Continue a run from its last valid state
   */
  async resume(runId: string, source?: CaptureSource): Promise<RunRecord> {
    const record = await this.store.require(runId);
    return this.runToCompletion(record, source);
  }

  /**
   * validate → init → every remaining phase
   */
  async start(input: unknown, source: CaptureSource): Promise<RunRecord> {
    const config = await this.validate(input);
    const record = await this.init(config);
    return this.runToCompletion(record, source);
  }

  private judgeFor(role: JudgeRole, record: RunRecord): JudgeModel {
    const specs = resolveJudgeSpecs(record.config, this.settings);
    return this.judgeFactory(role, specs[role], record.outputDir);
  }
}
