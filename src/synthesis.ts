/**
 * Synthesis Engine: combine the technical and preference rankings into one
 * consensus ranking. Lower final score is better.
 */

import { InvalidSynthesisWeightsError, RankingSetMismatchError } from './errors.js';
import type { RankingEntry, SynthesisWeights, TaskRank, TaskSummary, TechnicalRankingItem } from './types/index.js';

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function validateWeights(weights: SynthesisWeights): void {
  for (const [name, value] of Object.entries(weights)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidSynthesisWeightsError(`Weight "${name}" must be a finite number >= 0, got ${value}`);
    }
  }
  if (weights.technical + weights.preference === 0) {
    throw new InvalidSynthesisWeightsError('Synthesis weights must not both be 0');
  }
}

function indexRanks(rankings: TaskRank[], label: string): Map<string, number> {
  const byTask = new Map<string, number>();
  for (const { task, rank } of rankings) {
    if (byTask.has(task)) {
      throw new RankingSetMismatchError([], [], `task "${task}" appears twice in the ${label} ranking`);
    }
    byTask.set(task, rank);
  }
  return byTask;
}

/**
 * Weighted rank aggregation.
 *
 * Ties on final score fall back to the technical rank, then the task name.
 */
export function synthesize(
  technical: TaskRank[],
  preference: TaskRank[],
  weights: SynthesisWeights
): RankingEntry[] {
  validateWeights(weights);

  const technicalRanks = indexRanks(technical, 'technical');
  const preferenceRanks = indexRanks(preference, 'preference');

  const onlyTechnical = [...technicalRanks.keys()].filter(t => !preferenceRanks.has(t)).sort(compareNames);
  const onlyPreference = [...preferenceRanks.keys()].filter(t => !technicalRanks.has(t)).sort(compareNames);
  if (onlyTechnical.length > 0 || onlyPreference.length > 0) {
    throw new RankingSetMismatchError(onlyTechnical, onlyPreference);
  }

  const entries = [...technicalRanks.entries()].map(([task, technicalRank]) => {
    const preferenceRank = preferenceRanks.get(task) ?? technicalRank;
    return {
      task,
      technicalRank,
      preferenceRank,
      finalScore: weights.technical * technicalRank + weights.preference * preferenceRank,
    };
  });

  entries.sort(
    (a, b) =>
      a.finalScore - b.finalScore ||
      a.technicalRank - b.technicalRank ||
      compareNames(a.task, b.task)
  );

  return entries.map((entry, i) => ({ ...entry, rank: i + 1 }));
}

/**
 * Technical ranking from per-task score averages: best average percentage first
 */
export function computeTechnicalRankings(summaries: TaskSummary[]): TechnicalRankingItem[] {
  return [...summaries]
    .sort((a, b) => b.avgPercentage - a.avgPercentage || compareNames(a.task, b.task))
    .map((summary, i) => ({
      task: summary.task,
      rank: i + 1,
      avgPercentage: summary.avgPercentage,
      avgGrade: summary.avgGrade,
    }));
}
