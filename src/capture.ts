/**
 * Capture collaborators produce the image pairs a run evaluates.
 * Browser automation lives outside this package; it hands over a manifest.
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { z } from 'zod';
import type { RunConfig } from './config.js';
import type { ImagePair } from './types/index.js';

export interface CaptureSource {
  capture(config: RunConfig): Promise<ImagePair[]>;
}

const PairSchema = z.object({
  originalImage: z.string().min(1),
  transformedImage: z.string().min(1),
  task: z.string().min(1),
});

export const ManifestSchema = z.object({
  pairs: z.array(PairSchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Reads pairs from a JSON manifest `{ "pairs": [{ originalImage, transformedImage, task }] }`.
 * Relative image paths are resolved against the manifest's directory.
 * Pairs for tasks the run did not configure are dropped.
 */
export class ManifestCaptureSource implements CaptureSource {
  constructor(private readonly manifestPath: string) {}

  async capture(config: RunConfig): Promise<ImagePair[]> {
    const raw: unknown = JSON.parse(await readFile(this.manifestPath, 'utf-8'));
    const manifest = ManifestSchema.parse(raw);
    const baseDir = dirname(resolve(this.manifestPath));
    const wanted = new Set(config.tasks);

    const pairs = manifest.pairs
      .filter(p => wanted.has(p.task))
      .map(p => ({
        task: p.task,
        originalImage: isAbsolute(p.originalImage) ? p.originalImage : resolve(baseDir, p.originalImage),
        transformedImage: isAbsolute(p.transformedImage) ? p.transformedImage : resolve(baseDir, p.transformedImage),
      }));

    console.error(`[Run] Manifest ${this.manifestPath}: ${pairs.length} pairs for ${wanted.size} tasks`);
    return pairs;
  }
}

/**
 * Pairs supplied directly (e.g. inline in a tool call)
 */
export class StaticCaptureSource implements CaptureSource {
  constructor(private readonly pairs: ImagePair[]) {}

  async capture(config: RunConfig): Promise<ImagePair[]> {
    const wanted = new Set(config.tasks);
    return this.pairs.filter(p => wanted.has(p.task));
  }
}
