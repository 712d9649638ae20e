export type Grid = readonly number[]; // row-major, 0 = empty

export interface GridMarkers {
  initial: number; // flushes the buffer as-is
  solved: number; // flushes only a full buffer
}

export interface GridLabels {
  initial: string;
  solved: string;
}

export interface GridFormatConfig {
  markers: GridMarkers;
  labels: GridLabels;
  placeholder: string;
  missingSolvedNote: string;
  maxGrids: number;
  logDiscarded: boolean;
}

export type DiscardReason = 'not_a_number' | 'noise';

export interface GridCollector {
  push(line: string): void;
  finish(): Grid[];
}

export type WriteFn = (chunk: string) => void;
