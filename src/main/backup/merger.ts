/**
 * Merge two backup archives into one.
 *
 * The destination archive is the base: every source record not already
 * present in it is added, foreign keys are rewritten to destination ids, and
 * its manifest is refreshed. The temporary workspace is removed whether the
 * run succeeds or fails.
 */

import type Database from 'better-sqlite3';
import { createLogger } from '../logger';
import { ArchiveIOError, describeError, errorMessage, isBackupMergeError } from '../errors';
import type {
  DatabaseMergeResult,
  EntityKindName,
  MergePhase,
  MergeWarning,
  ProgressSink,
  TableMergeStats,
} from '../../shared/merge-types';
import { mergeDatabases } from '../merge/orchestrator';
import { ProgressReporter } from '../merge/progress';
import { closeStore, openStore } from '../merge/store';
import { packWorkspace, readArchiveInput, unpackArchive, type ArchiveInput } from './archive';
import { sha256File } from './digest';
import {
  ARCHIVE_EXTENSION,
  assertCompatible,
  locateDatabase,
  readManifest,
  updateManifest,
  writeManifest,
  type BackupManifest,
} from './manifest';
import { createRunWorkspace, releaseRunWorkspace } from './workspace';

const log = createLogger('merger');

export const STAGE_PROGRESS = {
  extract: 10,
  validate: 25,
  merge: 35,
  finalize: 85,
  done: 100,
} as const;

export interface MergeBackupsOptions {
  onProgress?: ProgressSink;
  /** Parent directory for the run's temporary workspace. */
  workDir?: string;
  /** Clock for the manifest's creation date and the merged name. */
  now?: () => Date;
}

export interface MergeBackupsResult {
  archive: Buffer;
  /** Suggested file name for the merged archive. */
  fileName: string;
  manifest: BackupManifest;
  stats: Record<EntityKindName, TableMergeStats>;
  warnings: MergeWarning[];
}

function collectStats(result: DatabaseMergeResult): Record<EntityKindName, TableMergeStats> {
  const stats: Record<EntityKindName, TableMergeStats> = {
    Location: { read: 0, inserted: 0, duplicates: 0 },
    UserMark: { read: 0, inserted: 0, duplicates: 0 },
    BlockRange: { read: 0, inserted: 0, duplicates: 0 },
    Note: { read: 0, inserted: 0, duplicates: 0 },
    PlaylistItem: { read: 0, inserted: 0, duplicates: 0 },
    Tag: { read: 0, inserted: 0, duplicates: 0 },
    InputField: { read: 0, inserted: 0, duplicates: 0 },
    TagMap: { read: 0, inserted: 0, duplicates: 0 },
  };
  for (const table of result.tables) {
    stats[table.kind] = { read: table.read, inserted: table.inserted, duplicates: table.duplicates };
  }
  return stats;
}

/** Closes a store after the merge; a close failure only surfaces when nothing else went wrong. */
function closeAfterMerge(db: Database.Database | null, label: string, failed: boolean): void {
  if (!db) return;
  try {
    closeStore(db, label);
  } catch (err) {
    if (!failed) throw err;
    log.warn(`Closing ${label} database after a failed merge also failed: ${errorMessage(err)}`);
  }
}

function runDatabaseMerge(sourcePath: string, destinationPath: string, progress: ProgressReporter): DatabaseMergeResult {
  let source: Database.Database | null = null;
  let destination: Database.Database | null = null;
  let failed = true;
  try {
    source = openStore(sourcePath, { readonly: true, label: 'source' });
    destination = openStore(destinationPath, { label: 'destination' });
    const result = mergeDatabases({ source, destination, progress });
    failed = false;
    return result;
  } finally {
    try {
      closeAfterMerge(destination, 'destination', failed);
    } finally {
      closeAfterMerge(source, 'source', failed);
    }
  }
}

export async function mergeBackups(
  sourceInput: ArchiveInput,
  destinationInput: ArchiveInput,
  options: MergeBackupsOptions = {},
): Promise<MergeBackupsResult> {
  const progress = new ProgressReporter(options.onProgress);
  const now = options.now ?? (() => new Date());
  const ws = await createRunWorkspace(options.workDir);
  let phase: MergePhase = 'extract';
  let result: MergeBackupsResult;

  try {
    progress.report(STAGE_PROGRESS.extract, 'Extracting archive files...');
    const [sourceBytes, destinationBytes] = await Promise.all([
      readArchiveInput(sourceInput),
      readArchiveInput(destinationInput),
    ]);
    await unpackArchive(sourceBytes, ws.sourceDir);
    await unpackArchive(destinationBytes, ws.destinationDir);

    phase = 'validate';
    progress.report(STAGE_PROGRESS.validate, 'Validating backup files...');
    const sourceManifest = await readManifest(ws.sourceDir, 'Source');
    const destinationManifest = await readManifest(ws.destinationDir, 'Destination');
    assertCompatible(sourceManifest, destinationManifest);
    const sourceDb = await locateDatabase(ws.sourceDir, sourceManifest, 'Source');
    const destinationDb = await locateDatabase(ws.destinationDir, destinationManifest, 'Destination');

    phase = 'merge';
    progress.report(STAGE_PROGRESS.merge, 'Starting database merge...');
    const merged = runDatabaseMerge(sourceDb, destinationDb, progress);

    phase = 'manifest';
    progress.report(STAGE_PROGRESS.finalize, 'Updating manifest and creating archive...');
    const stamp = now();
    const hash = await sha256File(destinationDb);
    const { manifest, stem } = updateManifest(destinationManifest, sourceManifest, { hash, now: stamp });
    await writeManifest(ws.destinationDir, manifest);

    phase = 'pack';
    const archive = await packWorkspace(ws.destinationDir, { date: stamp });

    if (merged.warnings.length > 0) {
      log.warn(`Merge finished with ${merged.warnings.length} warnings`);
    }
    result = {
      archive,
      fileName: `${stem}${ARCHIVE_EXTENSION}`,
      manifest,
      stats: collectStats(merged),
      warnings: merged.warnings,
    };
  } catch (err) {
    const typed = isBackupMergeError(err)
      ? err
      : new ArchiveIOError(`Unexpected failure during ${phase}: ${errorMessage(err)}`, phase, { cause: err });
    log.error(describeError(typed));
    throw typed;
  } finally {
    // The archive is already in memory; a leftover temp directory does not undo the merge.
    await releaseRunWorkspace(ws).catch((cleanupErr: unknown) => {
      log.warn(`Workspace cleanup failed: ${errorMessage(cleanupErr)}`);
    });
  }

  progress.report(STAGE_PROGRESS.done, 'Merge completed successfully!');
  return result;
}
