#!/usr/bin/env node
import { runGridFormat } from './driver';

runGridFormat({ input: process.stdin, output: process.stdout }).catch((error: unknown) => {
  console.error('[GridFormat] Failed to read input:', error);
  process.exit(1);
});
