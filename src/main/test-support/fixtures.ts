/**
 * Builders for user-data stores and backup archives used across the tests.
 * Everything is made in-process: stores with better-sqlite3, archives with
 * jszip, files under a fresh temp directory.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import type { SqlValue } from '../../shared/merge-types';

export const USER_DATA_SCHEMA = fs.readFileSync(path.join(__dirname, 'user-data.sql'), 'utf-8');

export type Row = Record<string, SqlValue>;

function q(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createUserDataDb(file = ':memory:', schema: string = USER_DATA_SCHEMA): Database.Database {
  const db = new Database(file);
  // Fixtures deliberately hold dangling references in some tests.
  db.pragma('foreign_keys = OFF');
  db.exec(schema);
  return db;
}

export function insertRow(db: Database.Database, table: string, values: Row): number {
  const cols = Object.keys(values);
  const sql = `INSERT INTO ${q(table)} (${cols.map(q).join(', ')}) VALUES (${cols.map(() => '?').join(', ')})`;
  return Number(db.prepare(sql).run(...cols.map((c) => values[c])).lastInsertRowid);
}

function toRow(raw: unknown): Record<string, unknown> {
  if (!raw || typeof raw !== 'object') throw new Error('expected a row object');
  return Object.fromEntries(Object.entries(raw));
}

export function selectAll(db: Database.Database, table: string, orderBy?: string): Record<string, unknown>[] {
  const order = orderBy ? ` ORDER BY ${q(orderBy)}` : '';
  return db.prepare(`SELECT * FROM ${q(table)}${order}`).all().map(toRow);
}

export function count(db: Database.Database, table: string): number {
  const row = toRow(db.prepare(`SELECT COUNT(*) AS n FROM ${q(table)}`).get());
  return Number(row.n);
}

/** Rows with the given columns removed, as sorted JSON strings (a comparable row set). */
export function rowSet(db: Database.Database, table: string, without: string[] = []): string[] {
  return selectAll(db, table)
    .map((row) => {
      const kept = Object.entries(row).filter(([key]) => !without.includes(key));
      return JSON.stringify(kept);
    })
    .sort();
}

export const rows = {
  location: (v: Row = {}): Row => ({
    BookNumber: null,
    ChapterNumber: null,
    DocumentId: null,
    Track: null,
    IssueTagNumber: 0,
    KeySymbol: 'nwt',
    MepsLanguage: 0,
    Type: 0,
    Title: null,
    ...v,
  }),
  userMark: (v: Row = {}): Row => ({
    ColorIndex: 1,
    LocationId: 1,
    StyleIndex: 0,
    UserMarkGuid: 'mark-guid-1',
    Version: 1,
    ...v,
  }),
  blockRange: (v: Row = {}): Row => ({
    BlockType: 2,
    Identifier: 1,
    StartToken: 0,
    EndToken: 5,
    UserMarkId: 1,
    ...v,
  }),
  note: (v: Row = {}): Row => ({
    Guid: 'note-guid-1',
    UserMarkId: null,
    LocationId: null,
    Title: null,
    Content: null,
    LastModified: '2026-01-01T00:00:00Z',
    Created: '2026-01-01T00:00:00Z',
    BlockType: 0,
    BlockIdentifier: null,
    ...v,
  }),
  playlistItem: (v: Row = {}): Row => ({
    Label: 'Clip',
    StartTrimOffsetTicks: null,
    EndTrimOffsetTicks: null,
    Accuracy: 1,
    EndAction: 0,
    ThumbnailFilePath: null,
    ...v,
  }),
  tag: (v: Row = {}): Row => ({ Type: 1, Name: 'Favorites', ...v }),
  inputField: (v: Row = {}): Row => ({ LocationId: 1, TextTag: 'tt1', Value: 'answer', ...v }),
  tagMap: (v: Row = {}): Row => ({
    PlaylistItemId: null,
    LocationId: null,
    NoteId: null,
    TagId: 1,
    Position: 0,
    ...v,
  }),
};

export interface BackupFixture {
  schemaVersion?: number;
  lastModifiedDate?: string;
  name?: string;
  schema?: string;
  seed?: (db: Database.Database) => void;
  /** Extra or replacement archive entries. */
  entries?: Record<string, string | Buffer>;
  omitManifest?: boolean;
  omitDatabase?: boolean;
}

export function fixtureManifest(fixture: BackupFixture = {}): Record<string, unknown> {
  return {
    name: fixture.name ?? 'UserDataBackup_2026-01-01_Test.jwlibrary',
    creationDate: '2026-01-01',
    version: 1,
    type: 0,
    userDataBackup: {
      lastModifiedDate: fixture.lastModifiedDate ?? '2026-01-01T10:00:00+00:00',
      deviceName: 'Test',
      databaseName: 'userData.db',
      hash: 'placeholder',
      schemaVersion: fixture.schemaVersion ?? 14,
    },
  };
}

export function makeTempDir(prefix = 'backup-merge-test-'): string {
  return fs.mkdtempSync(path.join(tmpdir(), prefix));
}

export async function buildBackupArchive(fixture: BackupFixture = {}): Promise<Buffer> {
  const dir = makeTempDir('backup-fixture-');
  try {
    const dbPath = path.join(dir, 'userData.db');
    const db = createUserDataDb(dbPath, fixture.schema);
    fixture.seed?.(db);
    db.close();

    const zip = new JSZip();
    if (!fixture.omitManifest) {
      zip.file('manifest.json', JSON.stringify(fixtureManifest(fixture), null, 2));
    }
    if (!fixture.omitDatabase) {
      zip.file('userData.db', fs.readFileSync(dbPath));
    }
    for (const [name, data] of Object.entries(fixture.entries ?? {})) {
      zip.file(name, data, { createFolders: false });
    }
    return await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export interface OpenedArchive {
  files: string[];
  manifest: Record<string, unknown>;
  databaseBytes: Buffer;
  db: Database.Database;
  close(): void;
}

/** Unzips an archive produced by a merge and opens its store read-only. */
export async function openArchive(archive: Buffer): Promise<OpenedArchive> {
  const zip = await JSZip.loadAsync(archive);
  const files = Object.values(zip.files)
    .filter((entry) => !entry.dir)
    .map((entry) => entry.name)
    .sort();

  const manifestEntry = zip.file('manifest.json');
  const dbEntry = zip.file('userData.db');
  if (!manifestEntry || !dbEntry) throw new Error('archive lacks manifest.json or userData.db');

  const manifest = toRow(JSON.parse(await manifestEntry.async('text')));
  const databaseBytes = await dbEntry.async('nodebuffer');

  const dir = makeTempDir('backup-open-');
  const dbPath = path.join(dir, 'userData.db');
  fs.writeFileSync(dbPath, databaseBytes);
  const db = new Database(dbPath, { readonly: true });

  return {
    files,
    manifest,
    databaseBytes,
    db,
    close: () => {
      db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
