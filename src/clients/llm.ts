import { z } from 'zod';

export type LLMProvider = 'gemini' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 90000)
  maxOutputTokens?: number;  // Max output tokens (default: 8000)
  temperature?: number;  // Temperature for sampling (default: 0)
}

/**
 * Inline image sent alongside the prompt. `data` is base64 without a data: prefix.
 */
export interface LLMImage {
  label: string;
  mimeType: string;
  data: string;
}

export interface LLMCallOptions {
  images?: LLMImage[];
  /** Ask the provider for a JSON-only response where it supports that */
  jsonOutput?: boolean;
}

export interface LLMResponse {
  model: string;
  content: string;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

async function postJSON(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  timeout: number,
  label: string
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${label} API error: ${response.status} ${response.statusText}`);
    }

    return await response.json();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call Gemini generateContent with inline images
 */
async function callGemini(
  prompt: string,
  config: LLMConfig,
  options: LLMCallOptions,
  timeout: number,
  maxOutputTokens: number,
  temperature: number
): Promise<string> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(config.model)}:generateContent`;

  const parts: Array<Record<string, unknown>> = [];
  for (const image of options.images ?? []) {
    parts.push({ text: image.label });
    parts.push({ inline_data: { mime_type: image.mimeType, data: image.data } });
  }
  parts.push({ text: prompt });

  const data = await postJSON(
    url,
    { 'x-goog-api-key': config.apiKey },
    {
      contents: [{ parts }],
      generationConfig: {
        temperature,
        maxOutputTokens,
        ...(options.jsonOutput ? { responseMimeType: 'application/json' } : {}),
      },
    },
    timeout,
    'Gemini'
  );

  const parsed = GeminiResponseSchema.parse(data);
  return parsed.candidates?.[0]?.content?.parts?.map(p => p.text ?? '').join('') ?? '';
}

/**
 * Call OpenAI chat completions with image_url data parts
 */
async function callOpenAI(
  prompt: string,
  config: LLMConfig,
  options: LLMCallOptions,
  timeout: number,
  maxOutputTokens: number
): Promise<string> {
  const content: Array<Record<string, unknown>> = [];
  for (const image of options.images ?? []) {
    content.push({ type: 'text', text: image.label });
    content.push({ type: 'image_url', image_url: { url: `data:${image.mimeType};base64,${image.data}` } });
  }
  content.push({ type: 'text', text: prompt });

  const data = await postJSON(
    'https://api.openai.com/v1/chat/completions',
    { Authorization: `Bearer ${config.apiKey}` },
    {
      model: config.model,
      messages: [{ role: 'user', content }],
      max_completion_tokens: maxOutputTokens,
      ...(options.jsonOutput ? { response_format: { type: 'json_object' } } : {}),
    },
    timeout,
    'OpenAI'
  );

  const parsed = OpenAIResponseSchema.parse(data);
  return parsed.choices[0]?.message.content ?? '';
}

/**
 * Call Anthropic messages API with base64 image blocks
 */
async function callAnthropic(
  prompt: string,
  config: LLMConfig,
  options: LLMCallOptions,
  timeout: number,
  maxOutputTokens: number,
  temperature: number
): Promise<string> {
  const content: Array<Record<string, unknown>> = [];
  for (const image of options.images ?? []) {
    content.push({ type: 'text', text: image.label });
    content.push({ type: 'image', source: { type: 'base64', media_type: image.mimeType, data: image.data } });
  }
  content.push({ type: 'text', text: prompt });

  const data = await postJSON(
    'https://api.anthropic.com/v1/messages',
    { 'x-api-key': config.apiKey, 'anthropic-version': '2023-06-01' },
    {
      model: config.model,
      messages: [{ role: 'user', content }],
      max_tokens: maxOutputTokens,
      temperature,
    },
    timeout,
    'Anthropic'
  );

  const parsed = AnthropicResponseSchema.parse(data);
  return parsed.content
    .filter(block => block.type === 'text')
    .map(block => block.text ?? '')
    .join('');
}

/**
 * Call a single LLM. Throws LLMError on transport, HTTP or timeout failure.
 */
export async function callLLM(
  prompt: string,
  config: LLMConfig,
  options: LLMCallOptions = {}
): Promise<LLMResponse> {
  const timeout = config.timeout ?? 90000;
  const maxOutputTokens = config.maxOutputTokens ?? 8000;
  const temperature = config.temperature ?? 0;

  try {
    let content: string;

    if (config.provider === 'gemini') {
      content = await callGemini(prompt, config, options, timeout, maxOutputTokens, temperature);
    } else if (config.provider === 'openai') {
      content = await callOpenAI(prompt, config, options, timeout, maxOutputTokens);
    } else {
      content = await callAnthropic(prompt, config, options, timeout, maxOutputTokens, temperature);
    }

    return { model: config.model, content };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[LLM] ${config.model} failed:`, message);
    throw new LLMError(`LLM call failed: ${message}`, config.model, error);
  }
}
