import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';

vi.mock('../logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

vi.mock('./workspace', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./workspace')>();
  return { ...actual, releaseRunWorkspace: vi.fn(actual.releaseRunWorkspace) };
});

vi.mock('../merge/store', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../merge/store')>();
  return { ...actual, closeStore: vi.fn(actual.closeStore) };
});

import { ArchiveIOError, TableMergeError } from '../errors';
import { closeStore } from '../merge/store';
import { mergeBackups } from './merger';
import { releaseRunWorkspace } from './workspace';
import { USER_DATA_SCHEMA, buildBackupArchive, insertRow, makeTempDir, rows } from '../test-support/fixtures';

describe('mergeBackups cleanup', () => {
  let workDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    workDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('still returns the merged archive when the workspace cannot be removed', async () => {
    vi.mocked(releaseRunWorkspace).mockRejectedValueOnce(new ArchiveIOError('Could not remove workspace', 'pack'));
    const seen: number[] = [];

    const result = await mergeBackups(await buildBackupArchive(), await buildBackupArchive(), {
      workDir,
      onProgress: (value) => seen.push(value),
    });

    expect(result.archive.length).toBeGreaterThan(0);
    expect(seen[seen.length - 1]).toBe(100);
    expect(releaseRunWorkspace).toHaveBeenCalledTimes(1);
  });

  it('keeps the merge error when closing the stores also fails', async () => {
    const closeFailure = (db: { close(): unknown }): never => {
      db.close();
      throw new ArchiveIOError('Could not close database', 'merge');
    };
    vi.mocked(closeStore).mockImplementationOnce(closeFailure).mockImplementationOnce(closeFailure);

    const source = await buildBackupArchive({
      schema: USER_DATA_SCHEMA.replace(/Label\s+TEXT NOT NULL/, 'Label TEXT'),
      seed: (db) => {
        insertRow(db, 'PlaylistItem', rows.playlistItem({ Label: null }));
      },
    });

    await expect(mergeBackups(source, await buildBackupArchive(), { workDir })).rejects.toBeInstanceOf(TableMergeError);
    expect(closeStore).toHaveBeenCalledTimes(2);
    expect(fs.readdirSync(workDir)).toEqual([]);
  });
});
