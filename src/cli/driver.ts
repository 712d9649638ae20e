/**
 * Grid Format Driver
 *
 * Collects grids from a line stream and prints the initial/solved report.
 */

import { createInterface } from 'node:readline';
import { Readable, Writable } from 'node:stream';
import { BOARD, DEFAULT_CONFIG } from '../config';
import { collectGridsFromStream } from '../model/parser';
import { Grid, GridFormatConfig } from '../model/types';
import { formatGrid } from '../render/gridTable';

export interface RunOptions {
  input: Readable;
  output: Writable;
  config?: GridFormatConfig;
}

/**
 * Build the full report for the collected grids.
 *
 * A single undersized grid (possible after an early initial marker) gets no
 * missing-solution note.
 */
export function formatReport(grids: readonly Grid[], config: GridFormatConfig = DEFAULT_CONFIG): string[] {
  const lines: string[] = [];
  const [initial, solved] = grids;

  if (initial) lines.push(...formatGrid(config.labels.initial, initial, config));

  if (solved) {
    lines.push(...formatGrid(config.labels.solved, solved, config));
  } else if (grids.length === 1 && initial.length === BOARD.cells) {
    lines.push('', config.missingSolvedNote);
  }
  return lines;
}

export async function runGridFormat({ input, output, config = DEFAULT_CONFIG }: RunOptions): Promise<Grid[]> {
  const reader = createInterface({ input, crlfDelay: Infinity });
  let rejectRead: (error: Error) => void = () => undefined;
  const readFailed = new Promise<never>((_, reject) => {
    rejectRead = reject;
  });
  // Reject on input errors even when no line has been read yet
  input.once('error', rejectRead);

  let grids: Grid[];
  try {
    grids = await Promise.race([collectGridsFromStream(reader, config), readFailed]);
  } finally {
    input.off('error', rejectRead);
    reader.close();
  }

  for (const line of formatReport(grids, config)) {
    output.write(`${line}\n`);
  }
  return grids;
}
