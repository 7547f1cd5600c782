import type { DimensionKey, Rubric } from './types/index.js';

const DIMENSION_TITLES: Record<DimensionKey, string> = {
  accuracy: 'ACCURACY (faithful to the original and to the style)',
  completeness: 'COMPLETENESS (the whole image is transformed and intact)',
  relevance: 'RELEVANCE (matches what a user asking for this style expects)',
  usefulness: 'USEFULNESS (usable and shareable as-is)',
  exceptional: 'EXCEPTIONAL (goes beyond merely acceptable)',
};

/**
 * Populate the evaluation prompt with a rubric's assertions, grouped by dimension
 */
export function buildEvaluationPrompt(rubric: Rubric): string {
  const blocks = rubric.dimensions.map(dimension => {
    const lines = dimension.assertions.map(a => `- ${a.id}: ${a.question}`);
    return `### ${DIMENSION_TITLES[dimension.key]}\n${lines.join('\n')}`;
  });

  const description = rubric.description ? `\n**Style description:** ${rubric.description}\n` : '';

  return `
You are an expert visual evaluator grading an AI image transformation.

Image 1 is the ORIGINAL photo. Image 2 is the TRANSFORMED result for the style "${rubric.task}".
${description}
Answer every assertion below with yes or no by inspecting the images. For each one:
- "answer": "yes" or "no"
- "confidence": integer 1-5 (5 = certain from clear visual evidence, 1 = barely visible)
- "evidence": one sentence naming what you see in the images that decides the answer

Do not answer from expectations about the style. If you cannot point at evidence, answer "no".

${blocks.join('\n\n')}

IMPORTANT: Return ONLY valid JSON with no other text. No markdown code blocks, no explanation.
Include every assertion id exactly once.

Format:
{
  "assertions": [
    { "id": "A1", "answer": "yes", "confidence": 4, "evidence": "..." }
  ],
  "summary": "One sentence overall impression"
}`.trim();
}

/**
 * Prompt for the holistic preference judge. Images are sent in the order of `tasks`.
 */
export function buildRankingPrompt(tasks: string[]): string {
  const list = tasks.map((task, i) => `- Image ${i + 2}: "${task}"`).join('\n');

  return `
You are judging which AI style transformations of the same photo a typical user would prefer.

Image 1 is the ORIGINAL photo. The following images are transformations:
${list}

Rank ALL ${tasks.length} styles from most to least appealing (rank 1 = best). Use each rank exactly once.
Consider overall appeal, how well the person is preserved, and whether you would share the result.

IMPORTANT: Return ONLY valid JSON with no other text. No markdown code blocks, no explanation.

Format:
{
  "rankings": [
    { "task": "<style name>", "rank": 1, "appeal_score": <1-10>, "reasoning": "Short reason" }
  ]
}`.trim();
}
