/**
 * Judge Adapter: vision LLMs as judges.
 *
 * The technical judge answers a rubric's assertions for one image pair; the
 * preference judge ranks one transformed image per task holistically.
 * Transport failures, timeouts and unparsable output are retried with backoff.
 */

import { isAbsolute, resolve } from 'path';
import { callLLM, LLMError, type LLMConfig, type LLMImage } from './clients/llm.js';
import { loadImage } from './clients/images.js';
import type { JudgeSpec, Settings } from './config.js';
import { ConfigInvalidError, JudgeIncompleteResponseError, JudgeResponseMalformedError } from './errors.js';
import { buildEvaluationPrompt, buildRankingPrompt } from './prompt.js';
import { parseAssertionResponse, parseRankingResponse, type ParseOutcome } from './validation.js';
import type { AssertionResult, ImagePair, PreferenceRanking, Rubric } from './types/index.js';

export type JudgeRole = 'technical' | 'preference';

export interface RankingCandidate {
  task: string;
  originalImage: string;
  transformedImage: string;
}

export interface JudgeModel {
  readonly model: string;
  evaluate(pair: ImagePair, rubric: Rubric): Promise<AssertionResult[]>;
  rank(candidates: RankingCandidate[]): Promise<PreferenceRanking>;
}

export interface VisionJudgeOptions {
  llm: LLMConfig;
  maxRetries: number;
  retryBaseDelayMs: number;
  /** Directory relative image paths are resolved against */
  baseDir?: string;
}

function backoffMs(attempt: number, base: number): number {
  const factor = 2 ** (attempt - 1);
  const jitter = Math.floor(Math.random() * base);
  return base * factor + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export class VisionJudge implements JudgeModel {
  readonly model: string;

  constructor(private readonly options: VisionJudgeOptions) {
    this.model = options.llm.model;
  }

  async evaluate(pair: ImagePair, rubric: Rubric): Promise<AssertionResult[]> {
    const images = [
      await loadImage(this.resolvePath(pair.originalImage), 'Image 1 (ORIGINAL):'),
      await loadImage(this.resolvePath(pair.transformedImage), `Image 2 (TRANSFORMED, ${pair.task}):`),
    ];
    const prompt = buildEvaluationPrompt(rubric);

    return this.withRetries(`evaluate ${pair.task} ${pair.transformedImage}`, prompt, images, text =>
      parseAssertionResponse(text, rubric)
    );
  }

  async rank(candidates: RankingCandidate[]): Promise<PreferenceRanking> {
    if (candidates.length === 0) {
      return { judgeModel: this.model, rankings: [] };
    }

    const tasks = candidates.map(c => c.task);
    const images: LLMImage[] = [await loadImage(this.resolvePath(candidates[0].originalImage), 'Image 1 (ORIGINAL):')];
    for (const [i, candidate] of candidates.entries()) {
      images.push(await loadImage(this.resolvePath(candidate.transformedImage), `Image ${i + 2} ("${candidate.task}"):`));
    }

    const rankings = await this.withRetries(`rank ${tasks.length} styles`, buildRankingPrompt(tasks), images, text =>
      parseRankingResponse(text, tasks)
    );
    return { judgeModel: this.model, rankings };
  }

  private resolvePath(path: string): string {
    return isAbsolute(path) || !this.options.baseDir ? path : resolve(this.options.baseDir, path);
  }

  private async withRetries<T>(
    label: string,
    prompt: string,
    images: LLMImage[],
    parse: (text: string) => ParseOutcome<T>
  ): Promise<T> {
    const attempts = this.options.maxRetries + 1;
    let lastProblem = '';
    let lastRaw: string | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        const delay = backoffMs(attempt - 1, this.options.retryBaseDelayMs);
        console.error(`[Judge] ${label}: retry ${attempt - 1}/${this.options.maxRetries} in ${delay}ms`);
        await sleep(delay);
      }

      let text: string;
      try {
        const response = await callLLM(prompt, this.options.llm, { images, jsonOutput: true });
        text = response.content;
      } catch (error) {
        if (!(error instanceof LLMError)) throw error;
        lastProblem = error.message;
        continue;
      }

      const outcome = parse(text);
      if (outcome.ok) {
        return outcome.value;
      }
      if (outcome.kind === 'incomplete') {
        console.error(`[Judge] ${label}: response omitted ${outcome.missing.join(', ')}`);
        throw new JudgeIncompleteResponseError(this.model, outcome.missing);
      }
      lastProblem = outcome.reason;
      lastRaw = text;
      console.error(`[Judge] ${label}: malformed response (attempt ${attempt}/${attempts}): ${outcome.reason}`);
    }

    throw new JudgeResponseMalformedError(
      `Judge ${this.model} gave no valid response after ${attempts} attempts: ${lastProblem}`,
      this.model,
      attempts,
      lastRaw
    );
  }
}

/**
 * Build a judge for a role from its provider/model spec and the environment settings
 */
export function createJudge(role: JudgeRole, spec: JudgeSpec, settings: Settings, baseDir?: string): VisionJudge {
  const apiKey = settings.apiKeys[spec.provider];
  if (!apiKey) {
    throw new ConfigInvalidError([`${role} judge: no API key for provider "${spec.provider}"`]);
  }
  return new VisionJudge({
    llm: {
      provider: spec.provider,
      model: spec.model,
      apiKey,
      timeout: settings.judgeTimeoutMs,
    },
    maxRetries: settings.judgeMaxRetries,
    retryBaseDelayMs: settings.retryBaseDelayMs,
    baseDir,
  });
}
