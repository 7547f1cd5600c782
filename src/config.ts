/**
 * Settings (environment) and run configuration schemas.
 */

import { z } from 'zod';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import type { LLMProvider } from './clients/llm.js';

const PACKAGE_ROOT = resolve(fileURLToPath(new URL('.', import.meta.url)), '..');

export const DEFAULT_RUBRIC_PATH = join(PACKAGE_ROOT, 'rubrics', 'style_assertions.json');

export const PIPELINE_VERSION = '1.1.0';
export const RUBRIC_VERSION = 'acrue-v3';

// Pipeline defaults; every one can be overridden from the environment
const DEFAULTS = {
  TECHNICAL_PROVIDER: 'gemini',
  TECHNICAL_MODEL: 'gemini-2.0-flash',
  PREFERENCE_PROVIDER: 'anthropic',
  PREFERENCE_MODEL: 'claude-sonnet-4-20250514',
  JUDGE_TIMEOUT_MS: 90000,
  JUDGE_MAX_RETRIES: 2,
  RETRY_BASE_DELAY_MS: 1000,
  PARALLELISM: 3,
  COMPARE_EPSILON: 0.5,
} as const;

export const ProviderSchema = z.enum(['gemini', 'openai', 'anthropic']);

export const JudgeSpecSchema = z.object({
  provider: ProviderSchema,
  model: z.string().min(1),
});

export type JudgeSpec = z.infer<typeof JudgeSpecSchema>;

export interface Settings {
  apiKeys: Partial<Record<LLMProvider, string>>;
  runsDir: string;
  rubricPath: string;
  judges: { technical: JudgeSpec; preference: JudgeSpec };
  judgeTimeoutMs: number;
  judgeMaxRetries: number;
  retryBaseDelayMs: number;
  parallelism: number;
  compareEpsilon: number;
}

function intFromEnv(value: string | undefined, fallback: number, min: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(value ?? '');
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function providerFromEnv(value: string | undefined, fallback: LLMProvider): LLMProvider {
  const parsed = ProviderSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

/**
 * Read settings from an environment map (process.env at runtime, a literal in tests)
 */
export function loadSettings(env: Record<string, string | undefined>): Settings {
  const apiKeys: Partial<Record<LLMProvider, string>> = {};
  if (env.GEMINI_API_KEY) apiKeys.gemini = env.GEMINI_API_KEY.trim();
  if (env.ANTHROPIC_API_KEY) apiKeys.anthropic = env.ANTHROPIC_API_KEY.trim();
  if (env.OPENAI_API_KEY) apiKeys.openai = env.OPENAI_API_KEY.trim();

  return {
    apiKeys,
    runsDir: env.RESTYLE_RUNS_DIR || join(homedir(), '.restyle-eval', 'runs'),
    rubricPath: env.RESTYLE_RUBRIC_PATH || DEFAULT_RUBRIC_PATH,
    judges: {
      technical: {
        provider: providerFromEnv(env.TECHNICAL_JUDGE_PROVIDER, DEFAULTS.TECHNICAL_PROVIDER),
        model: env.TECHNICAL_JUDGE_MODEL || env.GEMINI_MODEL || DEFAULTS.TECHNICAL_MODEL,
      },
      preference: {
        provider: providerFromEnv(env.PREFERENCE_JUDGE_PROVIDER, DEFAULTS.PREFERENCE_PROVIDER),
        model: env.PREFERENCE_JUDGE_MODEL || DEFAULTS.PREFERENCE_MODEL,
      },
    },
    judgeTimeoutMs: intFromEnv(env.JUDGE_TIMEOUT_MS, DEFAULTS.JUDGE_TIMEOUT_MS, 1),
    judgeMaxRetries: intFromEnv(env.JUDGE_MAX_RETRIES, DEFAULTS.JUDGE_MAX_RETRIES, 0),
    retryBaseDelayMs: intFromEnv(env.JUDGE_RETRY_DELAY_MS, DEFAULTS.RETRY_BASE_DELAY_MS, 0),
    parallelism: intFromEnv(env.EVAL_PARALLELISM, DEFAULTS.PARALLELISM, 1),
    compareEpsilon: floatFromEnv(env.COMPARE_EPSILON, DEFAULTS.COMPARE_EPSILON),
  };
}

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const SynthesisWeightsSchema = z.object({
  technical: z.number().finite().min(0),
  preference: z.number().finite().min(0),
});

export const RunConfigSchema = z.object({
  runId: z.string().regex(RUN_ID_PATTERN, 'runId may only contain letters, digits, ".", "_" and "-"'),
  baselineRunId: z.string().regex(RUN_ID_PATTERN).nullable().default(null),
  /** Use the most recent persisted run as baseline when baselineRunId is null */
  autoBaseline: z.boolean().default(false),
  tasks: z.array(z.string().min(1)).min(1),
  imagesPerTask: z.number().int().min(1),
  synthesis: SynthesisWeightsSchema.default({ technical: 0.5, preference: 0.5 }),
  judges: z
    .object({
      technical: JudgeSpecSchema.optional(),
      preference: JudgeSpecSchema.optional(),
    })
    .default({}),
  pipelineVersion: z.string().default(PIPELINE_VERSION),
  rubricVersion: z.string().default(RUBRIC_VERSION),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Parse a run configuration, returning human-readable problems instead of throwing
 */
export function parseRunConfig(input: unknown): { config: RunConfig } | { problems: string[] } {
  const parsed = RunConfigSchema.safeParse(input);
  if (parsed.success) {
    const duplicates = parsed.data.tasks.filter((t, i, all) => all.indexOf(t) !== i);
    if (duplicates.length > 0) {
      return { problems: [`tasks: duplicate task names ${[...new Set(duplicates)].join(', ')}`] };
    }
    return { config: parsed.data };
  }
  return {
    problems: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

export function expectedPairCount(config: RunConfig): number {
  return config.tasks.length * config.imagesPerTask;
}

export function resolveJudgeSpecs(config: RunConfig, settings: Settings): { technical: JudgeSpec; preference: JudgeSpec } {
  return {
    technical: config.judges.technical ?? settings.judges.technical,
    preference: config.judges.preference ?? settings.judges.preference,
  };
}
