export * from './model/types';
export { BOARD, DEFAULT_CONFIG, GridFormatConfigError, createConfig } from './config';
export type { GridFormatConfigOverrides } from './config';
export { MAX_CELL_VALUE, parseCellValue, createGridCollector, collectGrids, collectGridsFromStream } from './model/parser';
export { formatGrid, renderGrid } from './render/gridTable';
export { formatReport, runGridFormat } from './cli/driver';
export type { RunOptions } from './cli/driver';
