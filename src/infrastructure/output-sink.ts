/**
 * Result Sink - keeps verbose command output (job logs) in plain files
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';
import { ValidationError, toError } from '../errors';

export interface OutputSink {
  /**
   * Write `text` to the file `name`, replacing any previous content.
   * Resolves to the path written.
   */
  write(name: string, text: string): Promise<string>;
}

export class FileOutputSink implements OutputSink {
  private readonly logger: Logger;

  constructor(
    private readonly directory: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'FileOutputSink' });
  }

  async write(name: string, text: string): Promise<string> {
    if (name === '' || basename(name) !== name || name === '.' || name === '..') {
      throw new ValidationError(`output file name must be a plain file name: ${name}`, 'outputFile');
    }

    const path = join(this.directory, name);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, text, 'utf8');
    } catch (error) {
      const err = toError(error);
      throw new Error(`writing output file ${path}: ${err.message}`, { cause: err });
    }

    this.logger.info({ path, bytes: Buffer.byteLength(text) }, 'Wrote command output');
    return path;
  }
}
