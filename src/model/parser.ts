import { BOARD, DEFAULT_CONFIG } from '../config';
import { DiscardReason, Grid, GridCollector, GridFormatConfig } from './types';

/** Largest value stored as a cell; anything above is a marker or noise */
export const MAX_CELL_VALUE = 99;

const INTEGER_PATTERN = /^[+-]?\d+(?:_\d+)*$/;

/**
 * Parse one input line as an integer.
 *
 * Accepts surrounding whitespace, an optional sign and underscore-separated
 * digit groups ("1_000"). Returns null for anything else.
 */
export function parseCellValue(line: string): number | null {
  const text = line.trim();
  if (!INTEGER_PATTERN.test(text)) return null;
  const value = Number(text.replace(/_/g, ''));
  if (!Number.isFinite(value)) return null;
  return value === 0 ? 0 : value; // normalizes "-0"
}

function logDiscard(line: string, reason: DiscardReason) {
  console.warn(`[Collector] Discarded ${reason === 'noise' ? 'noise value' : 'non-numeric line'}: ${line}`);
}

/**
 * Incremental grid collector. Feed it lines with push() and call finish()
 * once the input is exhausted.
 */
export function createGridCollector(config: GridFormatConfig = DEFAULT_CONFIG): GridCollector {
  const grids: Grid[] = [];
  let buffer: number[] = [];
  let finished = false;

  const append = (grid: Grid) => {
    if (grids.length < config.maxGrids) grids.push(grid);
  };

  const discard = (line: string, reason: DiscardReason) => {
    if (config.logDiscarded) logDiscard(line, reason);
  };

  return {
    push(line: string) {
      if (finished) {
        throw new Error('Collector already finished');
      }
      const trimmed = line.trim();
      if (!trimmed) return;

      const value = parseCellValue(trimmed);
      if (value === null) {
        discard(trimmed, 'not_a_number');
        return;
      }

      if (value === config.markers.initial) {
        // Flushed at whatever length it has reached
        if (buffer.length > 0) append(buffer);
        buffer = [];
        return;
      }

      if (value === config.markers.solved) {
        if (buffer.length >= BOARD.cells) append(buffer.slice(0, BOARD.cells));
        buffer = [];
        return;
      }

      if (value < 0 || value > MAX_CELL_VALUE) {
        discard(trimmed, 'noise');
        return;
      }

      buffer.push(value);
      if (buffer.length >= BOARD.cells) {
        append(buffer.slice(0, BOARD.cells));
        buffer = [];
      }
    },

    finish() {
      if (!finished) {
        finished = true;
        if (buffer.length >= BOARD.cells) append(buffer.slice(0, BOARD.cells));
        buffer = [];
      }
      return [...grids];
    },
  };
}

export function collectGrids(lines: Iterable<string>, config: GridFormatConfig = DEFAULT_CONFIG): Grid[] {
  const collector = createGridCollector(config);
  for (const line of lines) collector.push(line);
  return collector.finish();
}

export async function collectGridsFromStream(
  lines: AsyncIterable<string>,
  config: GridFormatConfig = DEFAULT_CONFIG,
): Promise<Grid[]> {
  const collector = createGridCollector(config);
  for await (const line of lines) collector.push(line);
  return collector.finish();
}
