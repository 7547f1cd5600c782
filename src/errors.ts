/**
 * Error taxonomy for the evaluation pipeline.
 *
 * Per-pair errors (IncompleteEvaluation, JudgeResponseMalformed, JudgeIncompleteResponse)
 * are recorded on the run and never abort a batch. Everything else aborts the phase
 * that raised it.
 */

import type { RunPhase, RunState } from './types/index.js';
import { LLMError } from './clients/llm.js';

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'INCOMPLETE_EVALUATION'
  | 'JUDGE_RESPONSE_MALFORMED'
  | 'JUDGE_INCOMPLETE_RESPONSE'
  | 'RANKING_SET_MISMATCH'
  | 'INVALID_SYNTHESIS_WEIGHTS'
  | 'RUN_ALREADY_EXISTS'
  | 'RUN_NOT_FOUND'
  | 'INVALID_PHASE_TRANSITION'
  | 'PHASE_PRECONDITION'
  | 'NO_BASELINE_FOUND';

export class EvalPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'EvalPipelineError';
  }
}

export class ConfigInvalidError extends EvalPipelineError {
  constructor(public readonly problems: string[]) {
    super(`Configuration invalid:\n${problems.map(p => `  - ${p}`).join('\n')}`, 'CONFIG_INVALID');
    this.name = 'ConfigInvalidError';
  }
}

export class IncompleteEvaluationError extends EvalPipelineError {
  constructor(
    public readonly task: string,
    public readonly missing: string[],
    public readonly unexpected: string[] = [],
    public readonly duplicated: string[] = []
  ) {
    const parts: string[] = [];
    if (missing.length) parts.push(`missing ${missing.join(', ')}`);
    if (unexpected.length) parts.push(`unknown ${unexpected.join(', ')}`);
    if (duplicated.length) parts.push(`duplicated ${duplicated.join(', ')}`);
    super(`Incomplete evaluation for "${task}": ${parts.join('; ')}`, 'INCOMPLETE_EVALUATION');
    this.name = 'IncompleteEvaluationError';
  }
}

export class JudgeResponseMalformedError extends EvalPipelineError {
  constructor(
    message: string,
    public readonly model: string,
    public readonly attempts: number,
    public readonly rawResponse?: string
  ) {
    super(message, 'JUDGE_RESPONSE_MALFORMED');
    this.name = 'JudgeResponseMalformedError';
  }
}

export class JudgeIncompleteResponseError extends EvalPipelineError {
  constructor(
    public readonly model: string,
    public readonly missing: string[]
  ) {
    super(`Judge ${model} omitted assertions: ${missing.join(', ')}`, 'JUDGE_INCOMPLETE_RESPONSE');
    this.name = 'JudgeIncompleteResponseError';
  }
}

export class RankingSetMismatchError extends EvalPipelineError {
  constructor(
    public readonly onlyTechnical: string[],
    public readonly onlyPreference: string[],
    detail?: string
  ) {
    const parts = [
      onlyTechnical.length ? `only in technical: ${onlyTechnical.join(', ')}` : '',
      onlyPreference.length ? `only in preference: ${onlyPreference.join(', ')}` : '',
      detail ?? '',
    ].filter(Boolean);
    super(`Ranking task sets differ (${parts.join('; ')})`, 'RANKING_SET_MISMATCH');
    this.name = 'RankingSetMismatchError';
  }
}

export class InvalidSynthesisWeightsError extends EvalPipelineError {
  constructor(message: string) {
    super(message, 'INVALID_SYNTHESIS_WEIGHTS');
    this.name = 'InvalidSynthesisWeightsError';
  }
}

export class RunAlreadyExistsError extends EvalPipelineError {
  constructor(public readonly runId: string) {
    super(`Run "${runId}" already exists`, 'RUN_ALREADY_EXISTS');
    this.name = 'RunAlreadyExistsError';
  }
}

export class RunNotFoundError extends EvalPipelineError {
  constructor(public readonly runId: string) {
    super(`Run "${runId}" not found`, 'RUN_NOT_FOUND');
    this.name = 'RunNotFoundError';
  }
}

export class InvalidPhaseTransitionError extends EvalPipelineError {
  constructor(
    public readonly phase: RunPhase,
    public readonly from: RunState,
    public readonly required: readonly RunState[]
  ) {
    super(
      `Cannot run phase "${phase}" from state "${from}" (requires ${required.join(' or ')})`,
      'INVALID_PHASE_TRANSITION'
    );
    this.name = 'InvalidPhaseTransitionError';
  }
}

export class PhasePreconditionError extends EvalPipelineError {
  constructor(
    public readonly phase: RunPhase,
    message: string
  ) {
    super(`${phase}: ${message}`, 'PHASE_PRECONDITION');
    this.name = 'PhasePreconditionError';
  }
}

export class NoBaselineFoundError extends EvalPipelineError {
  constructor(public readonly baselineRunId: string) {
    super(`Baseline run "${baselineRunId}" has not been persisted`, 'NO_BASELINE_FOUND');
    this.name = 'NoBaselineFoundError';
  }
}

export function errorCode(error: unknown): string {
  if (error instanceof EvalPipelineError) return error.code;
  if (error instanceof LLMError) return 'JUDGE_TRANSPORT';
  return 'UNEXPECTED';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
