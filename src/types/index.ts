/**
 * Core domain types shared by the rubric store, judges, scoring, synthesis,
 * comparison and the run orchestrator.
 */

import type { RunConfig } from '../config.js';

export type DimensionKey = 'accuracy' | 'completeness' | 'relevance' | 'usefulness' | 'exceptional';

export const DIMENSION_ORDER: readonly DimensionKey[] = [
  'accuracy',
  'completeness',
  'relevance',
  'usefulness',
  'exceptional',
];

export type DimensionWeights = Record<DimensionKey, number>;

export type Grade = 'A+' | 'A' | 'B' | 'C' | 'F';

/**
 * One yes/no evidence-seeking question.
 * Ids are the dimension letter plus a 1-based position, e.g. "A1", "E5".
 */
export interface Assertion {
  id: string;
  question: string;
  dimension: DimensionKey;
}

export interface Dimension {
  key: DimensionKey;
  weight: number;
  assertions: Assertion[];
}

export interface Rubric {
  task: string;
  description: string;
  generic: boolean;             // true when the task had no entry in the store
  dimensions: Dimension[];      // only dimensions with at least one assertion
}

export interface AssertionResult {
  assertionId: string;
  answer: boolean;
  confidence: number;           // integer 1-5
  evidence: string;
}

export interface DimensionScore {
  dimension: DimensionKey;
  weight: number;
  passed: number;
  total: number;
  passRate: number;
  avgConfidence: number;
  rawScore: number;             // clamped to [0, 5]
  weightedScore: number;
}

/**
 * Identifiers of one captured image pair. Paths are relative to the run directory
 * unless absolute.
 */
export interface ImagePair {
  originalImage: string;
  transformedImage: string;
  task: string;
}

export interface EvaluationRecord {
  originalImage: string;
  transformedImage: string;
  task: string;
  judgeModel: string;
  genericRubric: boolean;
  results: AssertionResult[];
  dimensions: DimensionScore[];
  total: number;
  maxPossible: number;
  percentage: number;
  grade: Grade;
}

export interface TaskRank {
  task: string;
  rank: number;
}

export interface RankingEntry {
  task: string;
  technicalRank: number;
  preferenceRank: number;
  finalScore: number;
  rank: number;
}

export interface SynthesisWeights {
  technical: number;
  preference: number;
}

export interface TaskSummary {
  task: string;
  evaluations: number;
  avgTotal: number;
  avgPercentage: number;
  avgGrade: Grade;
  dimensionAverages: Partial<Record<DimensionKey, number>>;
}

export interface PreferenceRankingItem {
  task: string;
  rank: number;
  appealScore: number;          // 1-10
  reasoning: string;
}

export interface PreferenceRanking {
  judgeModel: string;
  rankings: PreferenceRankingItem[];
}

export interface TechnicalRankingItem extends TaskRank {
  avgPercentage: number;
  avgGrade: Grade;
}

export type ComparisonStatus = 'IMPROVED' | 'REGRESSED' | 'UNCHANGED';

export type ComparisonResult =
  | {
      task: string;
      status: ComparisonStatus;
      baselinePercentage: number;
      currentPercentage: number;
      delta: number;
      baselineGrade: Grade;
      currentGrade: Grade;
      scoreDelta: number;       // avgTotal difference, in rubric points
    }
  | { task: string; status: 'ADDED'; currentPercentage: number; currentGrade: Grade }
  | { task: string; status: 'REMOVED'; baselinePercentage: number; baselineGrade: Grade };

export type ComparisonVerdict = 'REGRESSION_DETECTED' | 'IMPROVED' | 'UNCHANGED' | 'NO_BASELINE';

export interface ComparisonReport {
  baselineRunId: string | null;
  epsilon: number;
  results: ComparisonResult[];
  summary: {
    improved: number;
    regressed: number;
    unchanged: number;
    added: number;
    removed: number;
    verdict: ComparisonVerdict;
  };
  notice?: string;              // e.g. why no baseline was used
}

export type RunState =
  | 'validated'
  | 'captured'
  | 'evaluated'
  | 'ranked'
  | 'synthesized'
  | 'compared'
  | 'persisted';

export type RunPhase = 'capture' | 'evaluate' | 'rank' | 'synthesize' | 'compare' | 'persist';

export interface EvaluationFailure {
  pair: ImagePair;
  code: string;
  message: string;
  attempts?: number;
}

export interface RunError {
  phase: RunPhase;
  code: string;
  message: string;
  at: string;
}

export const RUN_STATES: readonly RunState[] = [
  'validated',
  'captured',
  'evaluated',
  'ranked',
  'synthesized',
  'compared',
  'persisted',
];

/**
 * The durable state of one run, saved as run.json after every phase.
 */
export interface RunRecord {
  runId: string;
  state: RunState;
  config: RunConfig;
  outputDir: string;
  createdAt: string;
  updatedAt: string;
  judges: { technical: string; preference: string };
  pairs: ImagePair[];
  evaluations: EvaluationRecord[];
  failures: EvaluationFailure[];
  taskSummaries: TaskSummary[];
  technicalRanking: TechnicalRankingItem[];
  preferenceRanking: PreferenceRanking | null;
  finalRankings: RankingEntry[];
  winner: string | null;
  comparison: ComparisonReport | null;
  complete: boolean;            // false once any evaluation failed
  lastError: RunError | null;
  persistedAt: string | null;
}
