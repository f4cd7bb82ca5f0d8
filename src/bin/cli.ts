#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createProgram } from '../cli/cli';
import { isCancellation } from '../errors';

const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const controller = new AbortController();
process.once('SIGINT', () => {
  process.stderr.write('interrupted: no longer waiting; commands already submitted keep running on the cluster\n');
  controller.abort();
});

createProgram(version, { signal: controller.signal })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`error: ${message}\n`);
    process.exitCode = isCancellation(error) ? 130 : 1;
  });
