/**
 * Sample input streams shipped with the package
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const SampleStreamSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  input: z.string(),
});

const SampleFileSchema = z.object({
  streams: z.array(SampleStreamSchema),
});

export type SampleStream = z.infer<typeof SampleStreamSchema>;

export const SAMPLE_STREAMS_PATH = join(__dirname, 'streams.yaml');

export function parseSampleStreams(text: string): SampleStream[] {
  const raw: unknown = parseYaml(text);
  const validated = SampleFileSchema.safeParse(raw);
  if (!validated.success) {
    const errors = validated.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid sample streams: ${errors.join(', ')}`);
  }
  return validated.data.streams;
}

export function loadSampleStreams(path: string = SAMPLE_STREAMS_PATH): SampleStream[] {
  return parseSampleStreams(readFileSync(path, 'utf8'));
}

export function getSampleStream(id: string): SampleStream {
  const sample = loadSampleStreams().find((s) => s.id === id);
  if (!sample) {
    throw new Error(`Unknown sample stream: ${id}`);
  }
  return sample;
}

export function sampleLines(sample: SampleStream): string[] {
  return sample.input.split('\n');
}
