import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { LLMImage } from './llm.js';

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
};

export function mimeTypeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? 'image/jpeg';
}

/**
 * Read an image file into an inline LLM image part
 */
export async function loadImage(path: string, label: string): Promise<LLMImage> {
  const data = await readFile(path);
  return { label, mimeType: mimeTypeFor(path), data: data.toString('base64') };
}
