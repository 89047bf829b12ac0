import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { Readable } from 'stream';

vi.mock('../logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { ArchiveIOError, IncompatibleInputError, TableMergeError } from '../errors';
import { ENTITY_KINDS } from '../../shared/merge-types';
import { sha256 } from './digest';
import { mergeBackups } from './merger';
import {
  USER_DATA_SCHEMA,
  buildBackupArchive,
  count,
  insertRow,
  makeTempDir,
  openArchive,
  rows,
  selectAll,
  type BackupFixture,
} from '../test-support/fixtures';

const NOW = new Date(2026, 2, 4, 5, 6, 7);

const withNote: BackupFixture = {
  seed: (db) => {
    insertRow(db, 'Location', { LocationId: 1, ...rows.location({ BookNumber: 1, ChapterNumber: 3, Type: 1 }) });
    insertRow(db, 'Note', rows.note({ Guid: 'note-a', LocationId: 1, Content: 'A' }));
  },
};

describe('mergeBackups', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('merges a source note into an empty destination', async () => {
    const source = await buildBackupArchive(withNote);
    const destination = await buildBackupArchive();

    const result = await mergeBackups(source, destination, { workDir, now: () => NOW });
    const merged = await openArchive(result.archive);
    try {
      const [location] = selectAll(merged.db, 'Location');
      const [note] = selectAll(merged.db, 'Note');

      expect(count(merged.db, 'Location')).toBe(1);
      expect(count(merged.db, 'Note')).toBe(1);
      expect(note).toMatchObject({ Content: 'A', LocationId: location.LocationId });
      expect(merged.files).toEqual(['manifest.json', 'userData.db']);
      expect(result.stats.Note).toEqual({ read: 1, inserted: 1, duplicates: 0 });
      expect(result.warnings).toEqual([]);
    } finally {
      merged.close();
    }
  });

  it('names and describes the merged archive', async () => {
    const source = await buildBackupArchive({ ...withNote, lastModifiedDate: '2026-02-01T00:00:00Z' });
    const destination = await buildBackupArchive({ lastModifiedDate: '2026-01-15T00:00:00Z' });

    const result = await mergeBackups(source, destination, { workDir, now: () => NOW });
    const merged = await openArchive(result.archive);
    try {
      expect(result.fileName).toBe('merged_2026-03-04_05-06-07.jwlibrary');
      expect(merged.manifest).toMatchObject({
        name: 'merged_2026-03-04_05-06-07.jwlibrary',
        creationDate: NOW.toISOString(),
        userDataBackup: {
          lastModifiedDate: '2026-02-01T00:00:00Z',
          hash: sha256(merged.databaseBytes),
          schemaVersion: 14,
        },
      });
      expect(result.manifest).toEqual(merged.manifest);
    } finally {
      merged.close();
    }
  });

  it('adds nothing when a backup is merged with itself', async () => {
    const archive = await buildBackupArchive(withNote);

    const result = await mergeBackups(archive, archive, { workDir });
    const merged = await openArchive(result.archive);
    try {
      expect(count(merged.db, 'Location')).toBe(1);
      expect(count(merged.db, 'Note')).toBe(1);
      for (const kind of ENTITY_KINDS) {
        expect(result.stats[kind].inserted).toBe(0);
      }
    } finally {
      merged.close();
    }
  });

  it('accepts stream inputs', async () => {
    const source = Readable.from([await buildBackupArchive(withNote)]);
    const destination = Readable.from([await buildBackupArchive()]);

    const result = await mergeBackups(source, destination, { workDir });
    expect(result.stats.Location.inserted).toBe(1);
  });

  it('reports stages in order and finishes at 100', async () => {
    const seen: Array<[number, string]> = [];
    const source = await buildBackupArchive(withNote);
    const destination = await buildBackupArchive();

    await mergeBackups(source, destination, { workDir, onProgress: (value, message) => seen.push([value, message]) });

    const values = seen.map(([value]) => value);
    expect(values.slice(0, 3)).toEqual([10, 25, 35]);
    expect(values).toContain(85);
    expect([...values].sort((a, b) => a - b)).toEqual(values);
    expect(seen[seen.length - 1]).toEqual([100, 'Merge completed successfully!']);
  });

  it('removes its workspace after a successful run', async () => {
    await mergeBackups(await buildBackupArchive(withNote), await buildBackupArchive(), { workDir });
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('refuses backups with different schema versions and cleans up', async () => {
    const seen: number[] = [];
    const source = await buildBackupArchive({ ...withNote, schemaVersion: 13 });
    const destination = await buildBackupArchive({ schemaVersion: 14 });

    const run = mergeBackups(source, destination, { workDir, onProgress: (value) => seen.push(value) });

    await expect(run).rejects.toBeInstanceOf(IncompatibleInputError);
    await expect(run).rejects.toThrow('Schema versions do not match (source 13, destination 14)');
    expect(seen).toEqual([10, 25]);
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('reports an archive without a manifest', async () => {
    const run = mergeBackups(await buildBackupArchive(withNote), await buildBackupArchive({ omitManifest: true }), { workDir });
    await expect(run).rejects.toThrow('Destination archive has no readable manifest.json');
  });

  it('reports an archive without its database', async () => {
    const run = mergeBackups(await buildBackupArchive({ omitDatabase: true }), await buildBackupArchive(), { workDir });
    await expect(run).rejects.toThrow('Source archive is missing its database userData.db');
  });

  it('reports a database file that is not a store', async () => {
    const source = await buildBackupArchive({
      omitDatabase: true,
      entries: { 'userData.db': 'not a database '.repeat(100) },
    });
    const run = mergeBackups(source, await buildBackupArchive(), { workDir });
    await expect(run).rejects.toBeInstanceOf(IncompatibleInputError);
  });

  it('refuses input that is not an archive', async () => {
    const run = mergeBackups(Buffer.from('plain text'), await buildBackupArchive(), { workDir });
    await expect(run).rejects.toBeInstanceOf(ArchiveIOError);
    await expect(run).rejects.toMatchObject({ phase: 'extract' });
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('refuses entries that escape the workspace', async () => {
    const source = await buildBackupArchive({ ...withNote, entries: { '../escape.txt': 'x' } });
    const run = mergeBackups(source, await buildBackupArchive(), { workDir });
    await expect(run).rejects.toThrow('path traversal');
  });

  it('leaves the destination untouched when the merge is rolled back', async () => {
    const relaxed = USER_DATA_SCHEMA.replace(/Label\s+TEXT NOT NULL/, 'Label TEXT');
    const source = await buildBackupArchive({
      schema: relaxed,
      seed: (db) => {
        insertRow(db, 'Location', rows.location({ BookNumber: 1, ChapterNumber: 1 }));
        insertRow(db, 'PlaylistItem', rows.playlistItem({ Label: null }));
      },
    });
    const destination = await buildBackupArchive();
    const before = Buffer.from(destination);

    const run = mergeBackups(source, destination, { workDir });

    await expect(run).rejects.toBeInstanceOf(TableMergeError);
    await expect(run).rejects.toMatchObject({ code: 'MERGE_FAILURE', entityKind: 'PlaylistItem', phase: 'merge' });
    expect(destination.equals(before)).toBe(true);
    expect(fs.readdirSync(workDir)).toEqual([]);
  });
});
