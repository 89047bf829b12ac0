import Database from 'better-sqlite3';
import { createLogger } from '../logger';
import { ArchiveIOError, IncompatibleInputError, errorMessage } from '../errors';
import { quoteIdentifier, type EntityKind } from './schema';

const log = createLogger('store');

export interface OpenStoreOptions {
  readonly?: boolean;
  label: string;
}

/**
 * Opens a user-data store for one merge run. Foreign-key enforcement is
 * turned off so an unresolved reference is written as-is instead of failing
 * the run, and the rollback journal stays in its default mode so nothing but
 * the database file is left beside it once closed.
 */
export function openStore(dbPath: string, options: OpenStoreOptions): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(dbPath, { readonly: options.readonly ?? false, fileMustExist: true });
  } catch (err) {
    throw new ArchiveIOError(`Could not open ${options.label} database: ${errorMessage(err)}`, 'merge', { cause: err });
  }

  try {
    // Probes the header; a non-SQLite file fails here rather than mid-merge.
    db.pragma('schema_version');
    db.pragma('foreign_keys = OFF');
  } catch (err) {
    closeStore(db, options.label);
    throw new IncompatibleInputError(`${options.label} database is unreadable: ${errorMessage(err)}`, 'validate', { cause: err });
  }

  log.debug(`Opened ${options.label} database at ${dbPath}`);
  return db;
}

export function closeStore(db: Database.Database, label: string): void {
  if (!db.open) return;
  try {
    db.close();
  } catch (err) {
    throw new ArchiveIOError(`Could not close ${label} database: ${errorMessage(err)}`, 'merge', { cause: err });
  }
}

export function countRows(db: Database.Database, kind: EntityKind): number {
  const row: unknown = db.prepare(`SELECT COUNT(*) AS n FROM ${quoteIdentifier(kind.name)}`).get();
  if (!row || typeof row !== 'object') return 0;
  const n: unknown = Reflect.get(row, 'n');
  return typeof n === 'number' ? n : 0;
}
