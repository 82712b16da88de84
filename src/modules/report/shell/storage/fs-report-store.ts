/**
 * Filesystem Report Store
 *
 * Writes report artifacts as UTF-8 files into a single output directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { describeError } from '@/common/types/errors.js';

import { createReportStorageError, type ReportStorageError } from '../../core/errors.js';

import type { ReportStore } from '../../core/ports.js';
import type { ReportFile } from '../../core/types.js';
import type { Logger } from 'pino';

export interface FsReportStoreConfig {
  /** Directory the files are written to, created on first save */
  outputDir: string;
  logger: Logger;
}

export const makeFsReportStore = (config: FsReportStoreConfig): ReportStore => {
  const outputDir = path.resolve(config.outputDir);
  const log = config.logger.child({ component: 'FsReportStore' });

  return {
    async save(file: ReportFile): Promise<Result<string, ReportStorageError>> {
      if (file.fileName === '' || path.basename(file.fileName) !== file.fileName) {
        return err(createReportStorageError(file.fileName, 'File name must not contain a path'));
      }

      const location = path.join(outputDir, file.fileName);

      try {
        await mkdir(outputDir, { recursive: true });
        await writeFile(location, file.content, 'utf-8');
      } catch (error) {
        return err(
          createReportStorageError(
            file.fileName,
            `Failed to write ${location}: ${describeError(error)}`,
            error
          )
        );
      }

      log.info({ location, bytes: Buffer.byteLength(file.content) }, 'Saved report file');
      return ok(location);
    },
  };
};
