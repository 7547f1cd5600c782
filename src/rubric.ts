/**
 * Assertion Rubric Store
 *
 * Maps a task (style) name to yes/no assertions grouped into weighted dimensions.
 * Unknown tasks get the generic rubric, which only asks task-agnostic questions.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  DIMENSION_ORDER,
  type Assertion,
  type Dimension,
  type DimensionKey,
  type DimensionWeights,
  type Rubric,
} from './types/index.js';

export const DEFAULT_WEIGHTS: DimensionWeights = {
  accuracy: 1.0,
  completeness: 1.0,
  relevance: 0.5,
  usefulness: 0.5,
  exceptional: 2.0,
};

export const MAX_CONFIDENCE = 5;

const DIMENSION_PREFIX: Record<DimensionKey, string> = {
  accuracy: 'A',
  completeness: 'C',
  relevance: 'R',
  usefulness: 'U',
  exceptional: 'E',
};

const GENERIC_ASSERTIONS: Record<DimensionKey, string[]> = {
  accuracy: [
    'Is the subject recognizable as the same person, animal or scene as in the original?',
    'Are pose, framing and spatial relationships preserved from the original?',
  ],
  completeness: [
    'Is the transformation applied to the whole image, with no untransformed patches?',
    'Are all subjects structurally intact, with no warped faces or broken limbs?',
  ],
  relevance: [
    'Does the output read as the requested transformation rather than a different one?',
  ],
  usefulness: [
    'Is the image free of obvious digital artifacts, glitches or garbled text?',
    'Would a typical user be comfortable sharing this image?',
  ],
  exceptional: [
    'Does the result look polished enough to pass as deliberate, professional work?',
  ],
};

const WeightsSchema = z
  .object({
    accuracy: z.number().finite().min(0),
    completeness: z.number().finite().min(0),
    relevance: z.number().finite().min(0),
    usefulness: z.number().finite().min(0),
    exceptional: z.number().finite().min(0),
  })
  .partial();

const AssertionListSchema = z.array(z.string().min(1));

const StyleEntrySchema = z.object({
  description: z.string().default(''),
  weights: WeightsSchema.optional(),
  assertions: z.object({
    accuracy: AssertionListSchema.optional(),
    completeness: AssertionListSchema.optional(),
    relevance: AssertionListSchema.optional(),
    usefulness: AssertionListSchema.optional(),
    exceptional: AssertionListSchema.optional(),
  }),
});

export const RubricFileSchema = z.object({
  weights: WeightsSchema.optional(),
  styles: z.record(z.string(), StyleEntrySchema),
});

export type RubricFile = z.infer<typeof RubricFileSchema>;
type StyleEntry = z.infer<typeof StyleEntrySchema>;

function buildDimensions(
  assertions: Partial<Record<DimensionKey, string[]>>,
  weights: DimensionWeights
): Dimension[] {
  const dimensions: Dimension[] = [];
  for (const key of DIMENSION_ORDER) {
    const questions = assertions[key] ?? [];
    if (questions.length === 0) continue;
    const items: Assertion[] = questions.map((question, i) => ({
      id: `${DIMENSION_PREFIX[key]}${i + 1}`,
      question,
      dimension: key,
    }));
    dimensions.push({ key, weight: weights[key], assertions: items });
  }
  return dimensions;
}

/**
 * Generic rubric for a task with no entry in the store
 */
export function buildGenericRubric(task: string, weights: DimensionWeights = DEFAULT_WEIGHTS): Rubric {
  return {
    task,
    description: `Generic evaluation for the "${task}" transformation`,
    generic: true,
    dimensions: buildDimensions(GENERIC_ASSERTIONS, weights),
  };
}

/**
 * Σ weight × max confidence over the dimensions that have assertions
 */
export function computeMaxPossible(rubric: Rubric): number {
  let max = 0;
  for (const dimension of rubric.dimensions) {
    max += MAX_CONFIDENCE * dimension.weight;
  }
  return max;
}

export function allAssertions(rubric: Rubric): Assertion[] {
  return rubric.dimensions.flatMap(d => d.assertions);
}

export class RubricStore {
  private readonly byKey = new Map<string, { name: string; entry: StyleEntry }>();
  private readonly weights: DimensionWeights;

  constructor(file: RubricFile) {
    this.weights = { ...DEFAULT_WEIGHTS, ...file.weights };
    for (const [name, entry] of Object.entries(file.styles)) {
      this.byKey.set(name.trim().toLowerCase(), { name, entry });
    }
  }

  /** Style names as written in the store */
  get tasks(): string[] {
    return [...this.byKey.values()].map(v => v.name);
  }

  has(task: string): boolean {
    return this.byKey.has(task.trim().toLowerCase());
  }

  /**
   * Resolve the rubric for a task (case-insensitive); unknown tasks get the generic rubric
   */
  getRubric(task: string): Rubric {
    const found = this.byKey.get(task.trim().toLowerCase());
    if (!found) {
      return buildGenericRubric(task, this.weights);
    }
    const weights = { ...this.weights, ...found.entry.weights };
    const dimensions = buildDimensions(found.entry.assertions, weights);
    if (dimensions.length === 0) {
      return buildGenericRubric(task, weights);
    }
    return {
      task,
      description: found.entry.description,
      generic: false,
      dimensions,
    };
  }
}

/**
 * Load and validate a rubric file. Throws with the zod issues when the file is invalid.
 */
export async function loadRubricStore(path: string): Promise<RubricStore> {
  const raw = await readFile(path, 'utf-8');
  const parsed = RubricFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid rubric file ${path}: ${issues}`);
  }
  console.error(`[Store] Loaded ${Object.keys(parsed.data.styles).length} styles from ${path}`);
  return new RubricStore(parsed.data);
}
