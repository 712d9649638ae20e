import { BOARD, DEFAULT_CONFIG } from '../config';
import { Grid, GridFormatConfig, WriteFn } from '../model/types';

const FRAME = '='.repeat(37);
const BLOCK_SEPARATOR = '-'.repeat(35);

function cellText(grid: Grid, index: number, placeholder: string): string {
  const value = index < grid.length ? grid[index] : 0;
  return value === 0 ? placeholder : String(value);
}

function formatRow(grid: Grid, row: number, placeholder: string): string {
  let line = '| ';
  for (let c = 0; c < BOARD.size; c++) {
    if (c > 0 && c % BOARD.box === 0) line += '| ';
    line += `${cellText(grid, row * BOARD.size + c, placeholder).padStart(2)} `;
  }
  return `${line}|`;
}

/**
 * Lay out a grid as a bordered 9x9 table with 3x3 block separators.
 * Cells past the end of a short grid show the placeholder.
 */
export function formatGrid(label: string, grid: Grid, config: GridFormatConfig = DEFAULT_CONFIG): string[] {
  const lines = ['', FRAME, label, FRAME];
  for (let r = 0; r < BOARD.size; r++) {
    if (r > 0 && r % BOARD.box === 0) lines.push(BLOCK_SEPARATOR);
    lines.push(formatRow(grid, r, config.placeholder));
  }
  lines.push(FRAME, '');
  return lines;
}

const writeStdout: WriteFn = (chunk) => {
  process.stdout.write(chunk);
};

export function renderGrid(
  label: string,
  grid: Grid,
  write: WriteFn = writeStdout,
  config: GridFormatConfig = DEFAULT_CONFIG,
): void {
  for (const line of formatGrid(label, grid, config)) write(`${line}\n`);
}
