/**
 * Unit tests for the filesystem report store
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeFsReportStore } from '@/modules/report/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';

describe('makeFsReportStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'report-store-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates the output directory and writes the file', async () => {
    const outputDir = path.join(tempDir, 'nested', 'output');
    const store = makeFsReportStore({ outputDir, logger: makeTestLogger() });

    const result = await store.save({ fileName: 'report.html', content: '<p>ग्राम</p>' });

    const location = path.join(outputDir, 'report.html');
    expect(result._unsafeUnwrap()).toBe(location);
    expect(await readFile(location, 'utf-8')).toBe('<p>ग्राम</p>');
  });

  it('overwrites an existing file', async () => {
    const store = makeFsReportStore({ outputDir: tempDir, logger: makeTestLogger() });

    await store.save({ fileName: 'report.txt', content: 'first' });
    await store.save({ fileName: 'report.txt', content: 'second' });

    expect(await readFile(path.join(tempDir, 'report.txt'), 'utf-8')).toBe('second');
  });

  it('rejects file names with a path', async () => {
    const store = makeFsReportStore({ outputDir: tempDir, logger: makeTestLogger() });

    const result = await store.save({ fileName: '../escape.html', content: 'x' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'REPORT_STORAGE',
      fileName: '../escape.html',
      message: 'File name must not contain a path',
    });
  });

  it('rejects an empty file name', async () => {
    const store = makeFsReportStore({ outputDir: tempDir, logger: makeTestLogger() });

    const result = await store.save({ fileName: '', content: 'x' });

    expect(result.isErr()).toBe(true);
  });
});
