import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createWriteError, type WriteError } from '../../core/errors.js';

import type { OutputWriter } from '../../core/ports.js';

export interface FsOutputWriterOptions {
  outputDir: string;
}

export const makeFsOutputWriter = (options: FsOutputWriterOptions): OutputWriter => {
  let dirReady: Promise<string | undefined> | null = null;

  return {
    async write(fileName: string, contents: string): Promise<Result<string, WriteError>> {
      const filePath = path.join(options.outputDir, fileName);

      try {
        dirReady ??= fs.mkdir(options.outputDir, { recursive: true });
        await dirReady;
        await fs.writeFile(filePath, contents, 'utf8');
      } catch (error) {
        dirReady = null;
        return err(
          createWriteError(
            filePath,
            `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            error
          )
        );
      }

      return ok(filePath);
    },
  };
};
