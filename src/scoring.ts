/**
 * Scoring Engine
 *
 * Turns one judge's assertion results into dimension scores and a weighted grade.
 * Everything here is pure: no clock, no randomness, no I/O.
 */

import { IncompleteEvaluationError } from './errors.js';
import { MAX_CONFIDENCE, allAssertions, computeMaxPossible } from './rubric.js';
import type {
  AssertionResult,
  DimensionKey,
  DimensionScore,
  EvaluationRecord,
  Grade,
  ImagePair,
  Rubric,
  TaskSummary,
} from './types/index.js';

// Lower bound (inclusive) for each grade, best first
export const GRADE_THRESHOLDS: ReadonlyArray<{ min: number; grade: Grade }> = [
  { min: 90, grade: 'A+' },
  { min: 80, grade: 'A' },
  { min: 70, grade: 'B' },
  { min: 60, grade: 'C' },
  { min: 0, grade: 'F' },
];

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function gradeFor(percentage: number): Grade {
  for (const { min, grade } of GRADE_THRESHOLDS) {
    if (percentage >= min) return grade;
  }
  return 'F';
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Check that every assertion has exactly one result and nothing else is present
 */
export function checkCompleteness(rubric: Rubric, results: AssertionResult[]): void {
  const expected = new Set(allAssertions(rubric).map(a => a.id));
  const seen = new Set<string>();
  const duplicated: string[] = [];
  const unexpected: string[] = [];

  for (const result of results) {
    if (!expected.has(result.assertionId)) {
      unexpected.push(result.assertionId);
    } else if (seen.has(result.assertionId)) {
      duplicated.push(result.assertionId);
    }
    seen.add(result.assertionId);
  }

  const missing = [...expected].filter(id => !seen.has(id));
  if (missing.length || unexpected.length || duplicated.length) {
    throw new IncompleteEvaluationError(rubric.task, missing, unexpected, duplicated);
  }
}

/**
 * Score one judged pair against its rubric.
 *
 * @throws IncompleteEvaluationError when results do not cover the rubric exactly
 */
export function score(
  rubric: Rubric,
  results: AssertionResult[],
  pair: ImagePair,
  judgeModel: string
): EvaluationRecord {
  checkCompleteness(rubric, results);

  const byId = new Map(results.map(r => [r.assertionId, r]));
  const dimensions: DimensionScore[] = [];
  let total = 0;

  for (const dimension of rubric.dimensions) {
    const dimResults = dimension.assertions.flatMap(a => {
      const result = byId.get(a.id);
      return result ? [result] : [];
    });
    const passed = dimResults.filter(r => r.answer).length;
    const count = dimResults.length;
    const passRate = passed / count;
    const avgConfidence = dimResults.reduce((sum, r) => sum + r.confidence, 0) / count;
    const rawScore = clamp(passRate * avgConfidence, 0, MAX_CONFIDENCE);
    const weightedScore = rawScore * dimension.weight;

    dimensions.push({
      dimension: dimension.key,
      weight: dimension.weight,
      passed,
      total: count,
      passRate,
      avgConfidence,
      rawScore,
      weightedScore,
    });
    total += weightedScore;
  }

  const maxPossible = computeMaxPossible(rubric);
  const percentage = maxPossible > 0 ? round2((total / maxPossible) * 100) : 0;

  return {
    originalImage: pair.originalImage,
    transformedImage: pair.transformedImage,
    task: pair.task,
    judgeModel,
    genericRubric: rubric.generic,
    results: results.map(r => ({ ...r })),
    dimensions,
    total,
    maxPossible,
    percentage,
    grade: gradeFor(percentage),
  };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Per-task averages over successful evaluations, sorted by task name
 */
export function summarizeTasks(records: EvaluationRecord[]): TaskSummary[] {
  const byTask = new Map<string, EvaluationRecord[]>();
  for (const record of records) {
    const list = byTask.get(record.task) ?? [];
    list.push(record);
    byTask.set(record.task, list);
  }

  return [...byTask.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([task, list]) => {
      const avgPercentage = round2(mean(list.map(r => r.percentage)));

      const perDimension = new Map<DimensionKey, number[]>();
      for (const record of list) {
        for (const d of record.dimensions) {
          const values = perDimension.get(d.dimension) ?? [];
          values.push(d.weightedScore);
          perDimension.set(d.dimension, values);
        }
      }
      const dimensionAverages: Partial<Record<DimensionKey, number>> = {};
      for (const [key, values] of perDimension) {
        dimensionAverages[key] = round2(mean(values));
      }

      return {
        task,
        evaluations: list.length,
        avgTotal: round2(mean(list.map(r => r.total))),
        avgPercentage,
        avgGrade: gradeFor(avgPercentage),
        dimensionAverages,
      };
    });
}
