import { describe, it, expect } from 'vitest';
import { gradeFor, score, summarizeTasks } from '../scoring.js';
import { buildGenericRubric } from '../rubric.js';
import { IncompleteEvaluationError } from '../errors.js';
import { pair, singleDimensionRubric, uniformResults } from './helpers/fixtures.js';
import type { AssertionResult } from '../types/index.js';

describe('score', () => {
  const rubric = buildGenericRubric('Cubism');

  it('gives exactly 100 when every answer is yes with confidence 5', () => {
    const record = score(rubric, uniformResults(rubric, true, 5), pair('Cubism'), 'judge-a');
    expect(record.total).toBe(25);
    expect(record.maxPossible).toBe(25);
    expect(record.percentage).toBe(100);
    expect(record.grade).toBe('A+');
  });

  it('gives 0 when every answer is no', () => {
    const record = score(rubric, uniformResults(rubric, false, 5), pair('Cubism'), 'judge-a');
    expect(record.total).toBe(0);
    expect(record.percentage).toBe(0);
    expect(record.grade).toBe('F');
  });

  it('clamps raw scores to [0, 5] for out-of-range confidences', () => {
    const high = score(rubric, uniformResults(rubric, true, 99), pair('Cubism'), 'judge-a');
    for (const d of high.dimensions) {
      expect(d.rawScore).toBe(5);
    }
    expect(high.percentage).toBe(100);

    const negative = score(rubric, uniformResults(rubric, true, -3), pair('Cubism'), 'judge-a');
    for (const d of negative.dimensions) {
      expect(d.rawScore).toBe(0);
    }
  });

  it('scores 4 yes at confidence 5 and 1 no at confidence 3 as 73.6% (B)', () => {
    const single = singleDimensionRubric('Anime', 5);
    const results: AssertionResult[] = [
      { assertionId: 'A1', answer: true, confidence: 5, evidence: 'e1' },
      { assertionId: 'A2', answer: true, confidence: 5, evidence: 'e2' },
      { assertionId: 'A3', answer: true, confidence: 5, evidence: 'e3' },
      { assertionId: 'A4', answer: true, confidence: 5, evidence: 'e4' },
      { assertionId: 'A5', answer: false, confidence: 3, evidence: 'e5' },
    ];

    const record = score(single, results, pair('Anime'), 'judge-a');
    const [dimension] = record.dimensions;

    expect(dimension.passed).toBe(4);
    expect(dimension.total).toBe(5);
    expect(dimension.passRate).toBe(0.8);
    expect(dimension.avgConfidence).toBeCloseTo(4.6, 10);
    expect(dimension.rawScore).toBeCloseTo(3.68, 10);
    expect(record.maxPossible).toBe(5);
    expect(record.percentage).toBe(73.6);
    expect(record.grade).toBe('B');
  });

  it('averages confidence over all results, not only the passing ones', () => {
    const single = singleDimensionRubric('Anime', 2);
    const record = score(
      single,
      [
        { assertionId: 'A1', answer: true, confidence: 4, evidence: 'e' },
        { assertionId: 'A2', answer: false, confidence: 2, evidence: 'e' },
      ],
      pair('Anime'),
      'judge-a'
    );
    expect(record.dimensions[0].avgConfidence).toBe(3);
    expect(record.dimensions[0].rawScore).toBe(1.5);
    expect(record.percentage).toBe(30);
  });

  it('throws IncompleteEvaluationError naming the missing assertion', () => {
    const results = uniformResults(rubric, true, 5).filter(r => r.assertionId !== 'E1');
    try {
      score(rubric, results, pair('Cubism'), 'judge-a');
      expect.unreachable('score should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteEvaluationError);
      if (error instanceof IncompleteEvaluationError) {
        expect(error.missing).toEqual(['E1']);
        expect(error.code).toBe('INCOMPLETE_EVALUATION');
      }
    }
  });

  it('rejects duplicated and unknown result ids', () => {
    const results = uniformResults(rubric, true, 5);
    expect(() => score(rubric, [...results, results[0]], pair('Cubism'), 'judge-a')).toThrow(
      IncompleteEvaluationError
    );
    expect(() =>
      score(rubric, [...results, { assertionId: 'Z9', answer: true, confidence: 5, evidence: 'e' }], pair('Cubism'), 'judge-a')
    ).toThrow('unknown Z9');
  });

  it('is pure: identical inputs give deep-equal records', () => {
    const results = uniformResults(rubric, true, 4);
    const a = score(rubric, results, pair('Cubism'), 'judge-a');
    const b = score(rubric, results, pair('Cubism'), 'judge-a');
    expect(a).toEqual(b);
    expect(a.genericRubric).toBe(true);
    expect(a.judgeModel).toBe('judge-a');
  });

  it('uses the rubric\'s own weights for maxPossible', () => {
    const weighted = singleDimensionRubric('Pop Art', 3, 2, 'exceptional');
    const record = score(weighted, uniformResults(weighted, true, 5), pair('Pop Art'), 'judge-a');
    expect(record.maxPossible).toBe(10);
    expect(record.total).toBe(10);
    expect(record.percentage).toBe(100);
  });
});

describe('gradeFor', () => {
  it.each([
    [100, 'A+'],
    [90, 'A+'],
    [89.99, 'A'],
    [80, 'A'],
    [79.99, 'B'],
    [70, 'B'],
    [69.99, 'C'],
    [60, 'C'],
    [59.99, 'F'],
    [0, 'F'],
  ])('%s%% is %s', (percentage, grade) => {
    expect(gradeFor(percentage)).toBe(grade);
  });
});

describe('summarizeTasks', () => {
  it('averages per task and sorts by task name', () => {
    const anime = singleDimensionRubric('Anime', 2);
    const pop = singleDimensionRubric('Pop Art', 2);

    const records = [
      score(pop, uniformResults(pop, true, 5), pair('Pop Art', 1), 'j'),
      score(anime, uniformResults(anime, true, 4), pair('Anime', 1), 'j'),
      score(anime, uniformResults(anime, true, 3), pair('Anime', 2), 'j'),
    ];

    const summaries = summarizeTasks(records);

    expect(summaries.map(s => s.task)).toEqual(['Anime', 'Pop Art']);
    expect(summaries[0]).toEqual({
      task: 'Anime',
      evaluations: 2,
      avgTotal: 3.5,
      avgPercentage: 70,
      avgGrade: 'B',
      dimensionAverages: { accuracy: 3.5 },
    });
    expect(summaries[1].avgPercentage).toBe(100);
    expect(summaries[1].avgGrade).toBe('A+');
  });

  it('returns nothing for no records', () => {
    expect(summarizeTasks([])).toEqual([]);
  });
});
