/**
 * Baseline Comparator: per-task percentage diff between two runs.
 * Reads persisted task summaries only.
 */

import { round2 } from './scoring.js';
import type {
  ComparisonReport,
  ComparisonResult,
  ComparisonVerdict,
  TaskSummary,
} from './types/index.js';

export const DEFAULT_EPSILON = 0.5;

export interface ComparableRun {
  runId: string;
  taskSummaries: TaskSummary[];
}

/**
 * Compare a run against its baseline. A null baseline yields no results.
 *
 * Tasks in both runs are IMPROVED / REGRESSED when |delta| >= epsilon, else UNCHANGED.
 * Tasks only in the current run are ADDED, only in the baseline REMOVED.
 * Grades and the average rubric total travel with each task.
 */
export function compareRuns(
  current: ComparableRun,
  baseline: ComparableRun | null,
  epsilon: number = DEFAULT_EPSILON
): ComparisonResult[] {
  if (!baseline) return [];

  const before = new Map(baseline.taskSummaries.map(s => [s.task, s]));
  const after = new Map(current.taskSummaries.map(s => [s.task, s]));
  const tasks = [...new Set([...before.keys(), ...after.keys()])].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  return tasks.map((task): ComparisonResult => {
    const was = before.get(task);
    const now = after.get(task);
    if (!was) {
      return {
        task,
        status: 'ADDED',
        currentPercentage: now?.avgPercentage ?? 0,
        currentGrade: now?.avgGrade ?? 'F',
      };
    }
    if (!now) {
      return { task, status: 'REMOVED', baselinePercentage: was.avgPercentage, baselineGrade: was.avgGrade };
    }
    const delta = round2(now.avgPercentage - was.avgPercentage);
    const status = Math.abs(delta) < epsilon ? 'UNCHANGED' : delta > 0 ? 'IMPROVED' : 'REGRESSED';
    return {
      task,
      status,
      baselinePercentage: was.avgPercentage,
      currentPercentage: now.avgPercentage,
      delta,
      baselineGrade: was.avgGrade,
      currentGrade: now.avgGrade,
      scoreDelta: round2(now.avgTotal - was.avgTotal),
    };
  });
}

/**
 * Wrap comparison results with counts and an overall verdict
 */
export function summarizeComparison(
  baselineRunId: string | null,
  results: ComparisonResult[],
  epsilon: number,
  notice?: string
): ComparisonReport {
  const count = (status: ComparisonResult['status']) => results.filter(r => r.status === status).length;
  const improved = count('IMPROVED');
  const regressed = count('REGRESSED');

  let verdict: ComparisonVerdict;
  if (baselineRunId === null) {
    verdict = 'NO_BASELINE';
  } else if (regressed > 0) {
    verdict = 'REGRESSION_DETECTED';
  } else if (improved > 0) {
    verdict = 'IMPROVED';
  } else {
    verdict = 'UNCHANGED';
  }

  return {
    baselineRunId,
    epsilon,
    results,
    summary: {
      improved,
      regressed,
      unchanged: count('UNCHANGED'),
      added: count('ADDED'),
      removed: count('REMOVED'),
      verdict,
    },
    ...(notice ? { notice } : {}),
  };
}
