import type Database from 'better-sqlite3';
import { createLogger } from '../logger';
import { ConstraintViolationError, isBackupMergeError } from '../errors';
import type { DatabaseMergeResult } from '../../shared/merge-types';
import { IdTranslationTable } from './id-map';
import { ProgressReporter } from './progress';
import { MERGE_SCHEDULE, type EntityKind } from './schema';
import { mergeTable } from './table-merge';

const log = createLogger('merge-orchestrator');

export interface DatabaseMergeOptions {
  source: Database.Database;
  destination: Database.Database;
  progress?: ProgressReporter;
}

function bindingsFor(kind: EntityKind, ids: IdTranslationTable): Map<string, ReadonlyMap<number, number>> {
  const bindings = new Map<string, ReadonlyMap<number, number>>();
  for (const fk of kind.foreignKeys) {
    bindings.set(fk.column, ids.forKind(fk.references));
  }
  return bindings;
}

/**
 * Runs the merge schedule inside one destination transaction. Either every
 * kind is merged and committed, or the transaction is rolled back and a
 * single typed error is thrown: TableMergeError when one kind failed,
 * ConstraintViolationError when the transaction itself was rejected.
 */
export function mergeDatabases(options: DatabaseMergeOptions): DatabaseMergeResult {
  const { source, destination } = options;
  const ids = new IdTranslationTable();
  const progress = options.progress ?? new ProgressReporter();

  const result: DatabaseMergeResult = { tables: [], warnings: [] };

  const run = destination.transaction(() => {
    for (const kind of MERGE_SCHEDULE) {
      progress.report(kind.progress.start, kind.label);

      const tableResult = mergeTable({
        source,
        destination,
        kind,
        bindings: bindingsFor(kind, ids),
        idMap: ids.forKind(kind.name),
      });

      result.tables.push(tableResult);
      result.warnings.push(...tableResult.warnings);
      progress.report(kind.progress.end, kind.label);
    }
  });

  try {
    run();
  } catch (err) {
    log.error('Database merge rolled back', err);
    // Per-kind failures arrive as TableMergeError; anything else failed the transaction itself.
    if (isBackupMergeError(err)) throw err;
    throw new ConstraintViolationError(null, err);
  }

  log.info(`Database merge committed (${result.tables.length} tables, ${result.warnings.length} warnings)`);
  return result;
}
