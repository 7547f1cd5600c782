import type { JudgeModel, RankingCandidate } from '../../judge.js';
import type {
  AssertionResult,
  DimensionKey,
  ImagePair,
  PreferenceRanking,
  Rubric,
} from '../../types/index.js';
import { allAssertions } from '../../rubric.js';

const PREFIX: Record<DimensionKey, string> = {
  accuracy: 'A',
  completeness: 'C',
  relevance: 'R',
  usefulness: 'U',
  exceptional: 'E',
};

/**
 * Rubric with one dimension of `count` assertions
 */
export function singleDimensionRubric(
  task: string,
  count: number,
  weight = 1,
  key: DimensionKey = 'accuracy'
): Rubric {
  return {
    task,
    description: `${task} test rubric`,
    generic: false,
    dimensions: [
      {
        key,
        weight,
        assertions: Array.from({ length: count }, (_, i) => ({
          id: `${PREFIX[key]}${i + 1}`,
          question: `Question ${i + 1}?`,
          dimension: key,
        })),
      },
    ],
  };
}

/**
 * One result per assertion with the same answer and confidence
 */
export function uniformResults(rubric: Rubric, answer: boolean, confidence: number): AssertionResult[] {
  return allAssertions(rubric).map(a => ({
    assertionId: a.id,
    answer,
    confidence,
    evidence: `evidence for ${a.id}`,
  }));
}

export function pair(task: string, n = 1): ImagePair {
  return {
    task,
    originalImage: `originals/photo_${n}.jpg`,
    transformedImage: `${task.toLowerCase()}/photo_${n}.png`,
  };
}

export interface FakeJudgeOptions {
  /** Per task: the answer and confidence given to every assertion */
  answers?: Record<string, { answer: boolean; confidence: number }>;
  /** Tasks whose evaluation throws */
  failTasks?: Record<string, Error>;
  /** Transformed images whose evaluation throws */
  failImages?: Record<string, Error>;
  /** Preference order, best first; defaults to the candidate order */
  preferenceOrder?: string[];
  rankError?: Error;
  /** Milliseconds each evaluation takes */
  delayMs?: number;
}

/**
 * In-process judge for orchestrator tests
 */
export class FakeJudge implements JudgeModel {
  readonly evaluated: ImagePair[] = [];
  readonly rankCalls: RankingCandidate[][] = [];
  /** Most evaluations that were in flight at once */
  maxInFlight = 0;
  private inFlight = 0;

  constructor(
    readonly model: string,
    private readonly options: FakeJudgeOptions = {}
  ) {}

  async evaluate(p: ImagePair, rubric: Rubric): Promise<AssertionResult[]> {
    this.evaluated.push(p);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise(r => setTimeout(r, this.options.delayMs ?? 0));
    } finally {
      this.inFlight--;
    }
    const failure = this.options.failImages?.[p.transformedImage] ?? this.options.failTasks?.[p.task];
    if (failure) throw failure;
    const { answer, confidence } = this.options.answers?.[p.task] ?? { answer: true, confidence: 5 };
    return uniformResults(rubric, answer, confidence);
  }

  async rank(candidates: RankingCandidate[]): Promise<PreferenceRanking> {
    this.rankCalls.push(candidates);
    if (this.options.rankError) throw this.options.rankError;
    const order = this.options.preferenceOrder ?? candidates.map(c => c.task);
    const tasks = candidates.map(c => c.task);
    const ranked = order.filter(t => tasks.includes(t));
    return {
      judgeModel: this.model,
      rankings: ranked.map((task, i) => ({ task, rank: i + 1, appealScore: 10 - i, reasoning: `liked ${task}` })),
    };
  }
}
