/**
 * Judge response validation: JSON extraction with repair, then schema and
 * semantic checks for assertion answers and preference rankings.
 */

import { z } from 'zod';
import type { AssertionResult, PreferenceRankingItem, Rubric } from './types/index.js';
import { allAssertions, MAX_CONFIDENCE } from './rubric.js';

/**
 * Parse JSON from raw model output.
 * Handles markdown fences, surrounding prose and trailing commas.
 *
 * @returns the parsed value, or undefined when nothing parseable was found
 */
export function safeParseJSON(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '');

  // Step 1: Extract JSON object/array from text
  const jsonMatch = unfenced.match(/\{[\s\S]*\}|\[[\s\S]*\]/);
  if (!jsonMatch) {
    return undefined;
  }

  // Step 2: Try as-is
  try {
    return JSON.parse(jsonMatch[0]);
  } catch {
    // fall through to repair
  }

  // Step 3: Repairs for common LLM output issues
  const cleaned = jsonMatch[0]
    .replace(/,\s*([}\]])/g, '$1')           // Remove trailing commas
    .replace(/([{,]\s*)(\w+)\s*:/g, '$1"$2":') // Quote unquoted keys
    .replace(/:\s*'([^']*)'/g, ': "$1"')     // Single to double quotes in values
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, ' ');

  try {
    return JSON.parse(cleaned);
  } catch {
    return undefined;
  }
}

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: 'malformed'; reason: string }
  | { ok: false; kind: 'incomplete'; missing: string[] };

const AssertionAnswerSchema = z.object({
  id: z.string().min(1),
  answer: z.union([z.boolean(), z.string()]),
  confidence: z.number().optional(),
  evidence: z.string().optional(),
});

export const AssertionResponseSchema = z.object({
  assertions: z.array(AssertionAnswerSchema),
  summary: z.string().optional(),
});

const RankingItemSchema = z.object({
  task: z.string().min(1),
  rank: z.number(),
  appeal_score: z.number().optional(),
  reasoning: z.string().optional(),
});

export const RankingResponseSchema = z.object({
  rankings: z.array(RankingItemSchema),
});

function normalizeAnswer(answer: boolean | string): boolean | undefined {
  if (typeof answer === 'boolean') return answer;
  const value = answer.trim().toLowerCase();
  if (value === 'yes' || value === 'true') return true;
  if (value === 'no' || value === 'false') return false;
  return undefined;
}

function schemaProblem(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
}

/**
 * Validate an assertion-answer response against the rubric it was asked about.
 *
 * Missing assertion ids make the response incomplete. Ids the rubric does not know
 * are passed through so scoring reports them.
 */
export function parseAssertionResponse(text: string, rubric: Rubric): ParseOutcome<AssertionResult[]> {
  const json = safeParseJSON(text);
  if (json === undefined) {
    return { ok: false, kind: 'malformed', reason: 'no JSON object in response' };
  }

  const parsed = AssertionResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, kind: 'malformed', reason: schemaProblem(parsed.error) };
  }

  const results: AssertionResult[] = [];
  for (const item of parsed.data.assertions) {
    const id = item.id.trim().toUpperCase();
    const answer = normalizeAnswer(item.answer);
    if (answer === undefined) {
      return { ok: false, kind: 'malformed', reason: `${id}: answer must be yes or no` };
    }
    const confidence = item.confidence;
    if (confidence === undefined || !Number.isInteger(confidence) || confidence < 1 || confidence > MAX_CONFIDENCE) {
      return { ok: false, kind: 'malformed', reason: `${id}: confidence must be an integer 1-${MAX_CONFIDENCE}` };
    }
    const evidence = item.evidence?.trim() ?? '';
    if (!evidence) {
      return { ok: false, kind: 'malformed', reason: `${id}: evidence is empty` };
    }
    results.push({ assertionId: id, answer, confidence, evidence });
  }

  const answered = new Set(results.map(r => r.assertionId));
  const missing = allAssertions(rubric)
    .map(a => a.id)
    .filter(id => !answered.has(id));
  if (missing.length > 0) {
    return { ok: false, kind: 'incomplete', missing };
  }

  return { ok: true, value: results };
}

/**
 * Validate a preference ranking: every candidate exactly once, ranks a permutation of 1..n
 */
export function parseRankingResponse(text: string, tasks: string[]): ParseOutcome<PreferenceRankingItem[]> {
  const json = safeParseJSON(text);
  if (json === undefined) {
    return { ok: false, kind: 'malformed', reason: 'no JSON object in response' };
  }

  const parsed = RankingResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, kind: 'malformed', reason: schemaProblem(parsed.error) };
  }

  const byKey = new Map(tasks.map(t => [t.trim().toLowerCase(), t]));
  const items: PreferenceRankingItem[] = [];
  const seenTasks = new Set<string>();
  const seenRanks = new Set<number>();

  for (const item of parsed.data.rankings) {
    const task = byKey.get(item.task.trim().toLowerCase());
    if (!task) {
      return { ok: false, kind: 'malformed', reason: `unknown task "${item.task}"` };
    }
    if (seenTasks.has(task)) {
      return { ok: false, kind: 'malformed', reason: `task "${task}" ranked twice` };
    }
    if (!Number.isInteger(item.rank) || item.rank < 1 || item.rank > tasks.length || seenRanks.has(item.rank)) {
      return { ok: false, kind: 'malformed', reason: `rank ${item.rank} for "${task}" is not a permutation of 1-${tasks.length}` };
    }
    seenTasks.add(task);
    seenRanks.add(item.rank);
    items.push({
      task,
      rank: item.rank,
      appealScore: item.appeal_score ?? 0,
      reasoning: item.reasoning?.trim() ?? '',
    });
  }

  if (items.length !== tasks.length) {
    const missing = tasks.filter(t => !seenTasks.has(t));
    return { ok: false, kind: 'malformed', reason: `ranking omits ${missing.join(', ')}` };
  }

  return { ok: true, value: items.sort((a, b) => a.rank - b.rank) };
}
