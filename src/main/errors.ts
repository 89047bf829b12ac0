import type { EntityKindName, MergePhase } from '../shared/merge-types';

export type BackupMergeErrorCode =
  | 'INCOMPATIBLE_INPUT'
  | 'MERGE_FAILURE'
  | 'CONSTRAINT_VIOLATION'
  | 'IO_FAILURE';

export abstract class BackupMergeError extends Error {
  abstract readonly code: BackupMergeErrorCode;
  readonly phase: MergePhase;

  constructor(message: string, phase: MergePhase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.phase = phase;
  }
}

/** Schema versions differ, or a manifest or store is missing or malformed. */
export class IncompatibleInputError extends BackupMergeError {
  readonly code = 'INCOMPATIBLE_INPUT';
}

/** One entity kind could not be merged; the run is aborted and rolled back. */
export class TableMergeError extends BackupMergeError {
  readonly code = 'MERGE_FAILURE';
  readonly entityKind: EntityKindName;

  constructor(entityKind: EntityKindName, cause: unknown) {
    super(`Error merging table ${entityKind}: ${errorMessage(cause)}`, 'merge', { cause });
    this.entityKind = entityKind;
  }
}

/** The destination transaction as a whole was rejected and rolled back. */
export class ConstraintViolationError extends BackupMergeError {
  readonly code = 'CONSTRAINT_VIOLATION';
  readonly entityKind: EntityKindName | null;

  constructor(entityKind: EntityKindName | null, cause: unknown) {
    const where = entityKind ? ` while merging ${entityKind}` : '';
    super(`Database constraint violation${where}: ${errorMessage(cause)}`, 'merge', { cause });
    this.entityKind = entityKind;
  }
}

/** Archive unpack/pack, workspace or store open/close failure. */
export class ArchiveIOError extends BackupMergeError {
  readonly code = 'IO_FAILURE';
}

export function isBackupMergeError(value: unknown): value is BackupMergeError {
  return value instanceof BackupMergeError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** better-sqlite3 reports constraint failures as SqliteError with an extended code. */
export function sqliteErrorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function isConstraintError(err: unknown): boolean {
  return sqliteErrorCode(err)?.startsWith('SQLITE_CONSTRAINT') ?? false;
}

export function isUniquenessConflict(err: unknown): boolean {
  const code = sqliteErrorCode(err);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/** One line suitable for showing to the person who asked for the merge. */
export function describeError(err: unknown): string {
  if (isBackupMergeError(err)) {
    return `[${err.code}] (${err.phase}) ${err.message}`;
  }
  return `Unexpected error: ${errorMessage(err)}`;
}
