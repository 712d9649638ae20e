/**
 * Grid Format Configuration
 *
 * Default configuration and factory for the collector, renderer and driver.
 */

import { z } from 'zod';
import { GridFormatConfig } from './model/types';

// =============================================================================
// Board Geometry
// =============================================================================

export const BOARD = {
  size: 9,
  box: 3,
  cells: 81,
} as const;

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_CONFIG: GridFormatConfig = {
  markers: {
    initial: 100,
    solved: 200,
  },
  labels: {
    initial: 'Initial grid:',
    solved: 'Solved grid:',
  },
  placeholder: '.',
  missingSolvedNote: 'Note: Solved grid not found',
  maxGrids: 2,
  logDiscarded: false,
};

// =============================================================================
// Validation
// =============================================================================

export const GridFormatConfigSchema = z
  .object({
    markers: z.object({
      initial: z.number().int(),
      solved: z.number().int(),
    }),
    labels: z.object({
      initial: z.string().min(1),
      solved: z.string().min(1),
    }),
    placeholder: z.string().length(1),
    missingSolvedNote: z.string(),
    maxGrids: z.number().int().min(1).max(2),
    logDiscarded: z.boolean(),
  })
  .refine(c => c.markers.initial !== c.markers.solved, {
    message: 'Initial and solved markers must differ',
    path: ['markers'],
  });

export class GridFormatConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridFormatConfigError';
  }
}

// =============================================================================
// Configuration Factory
// =============================================================================

export interface GridFormatConfigOverrides
  extends Partial<Omit<GridFormatConfig, 'markers' | 'labels'>> {
  markers?: Partial<GridFormatConfig['markers']>;
  labels?: Partial<GridFormatConfig['labels']>;
}

/**
 * Create config with overrides. Throws GridFormatConfigError when the merged
 * result does not validate.
 */
export function createConfig(overrides: GridFormatConfigOverrides = {}): GridFormatConfig {
  const merged: GridFormatConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    markers: {
      ...DEFAULT_CONFIG.markers,
      ...overrides.markers,
    },
    labels: {
      ...DEFAULT_CONFIG.labels,
      ...overrides.labels,
    },
  };

  const validated = GridFormatConfigSchema.safeParse(merged);
  if (!validated.success) {
    const errors = validated.error.issues.map(
      (e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`
    );
    throw new GridFormatConfigError(`Invalid grid format config: ${errors.join(', ')}`);
  }
  return validated.data;
}
