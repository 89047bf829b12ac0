/**
 * Per-table reconciliation of source rows into the destination store.
 *
 * Rows are matched on their duplicate-detection key, never on primary keys:
 * surrogate ids are local to one store. Foreign keys are rewritten through
 * the translation tables of kinds merged earlier in the run, and the kind's
 * own old -> new mapping is extended for the kinds that follow.
 */

import type Database from 'better-sqlite3';
import { createLogger } from '../logger';
import { TableMergeError, errorMessage, isUniquenessConflict } from '../errors';
import type {
  MergeWarning,
  RecordValues,
  SqlValue,
  TableMergeResult,
} from '../../shared/merge-types';
import { quoteIdentifier, type EntityKind } from './schema';

const log = createLogger('table-merge');

export interface TableMergeInput {
  source: Database.Database;
  destination: Database.Database;
  kind: EntityKind;
  /** Foreign-key column -> translation table of the referenced kind. */
  bindings: ReadonlyMap<string, ReadonlyMap<number, number>>;
  /** This kind's translation table; extended in place. Ignored when the kind has no id column. */
  idMap: Map<number, number>;
}

interface SourceRow {
  oldId: number | null;
  values: RecordValues;
}

function isSqlValue(value: unknown): value is SqlValue {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  );
}

function toSourceRow(row: unknown, kind: EntityKind): SourceRow {
  if (!row || typeof row !== 'object') {
    throw new Error(`Unexpected row shape in ${kind.name}`);
  }

  const read = (column: string): SqlValue => {
    const value: unknown = Reflect.get(row, column);
    if (!isSqlValue(value)) {
      throw new Error(`Column ${kind.name}.${column} is missing or has an unsupported type`);
    }
    return value;
  };

  let oldId: number | null = null;
  if (kind.idColumn) {
    const id = read(kind.idColumn);
    if (typeof id !== 'number') {
      throw new Error(`${kind.name}.${kind.idColumn} is not an integer id: ${String(id)}`);
    }
    oldId = id;
  }

  const values: RecordValues = {};
  for (const column of kind.columns) {
    values[column] = read(column);
  }
  return { oldId, values };
}

/** Column names named in a SQLite "UNIQUE constraint failed: T.a, T.b" message. */
export function parseConflictColumns(message: string, kind: EntityKind): string[] {
  const match = /constraint failed: (.+)$/.exec(message);
  if (!match) return [];

  const columns: string[] = [];
  for (const part of match[1].split(',')) {
    const qualified = part.trim();
    const dot = qualified.lastIndexOf('.');
    const column = dot >= 0 ? qualified.slice(dot + 1) : qualified;
    if (kind.columns.includes(column)) columns.push(column);
  }
  return columns;
}

class TableWriter {
  private readonly statements = new Map<string, Database.Statement>();
  private readonly insertSql: string;
  private readonly table: string;

  constructor(private readonly db: Database.Database, private readonly kind: EntityKind) {
    this.table = quoteIdentifier(kind.name);
    const cols = kind.columns.map(quoteIdentifier).join(', ');
    const placeholders = kind.columns.map(() => '?').join(', ');
    this.insertSql = `INSERT INTO ${this.table} (${cols}) VALUES (${placeholders})`;
  }

  private prepare(sql: string): Database.Statement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statements.set(sql, stmt);
    }
    return stmt;
  }

  /**
   * Finds a row whose key columns equal the given values, comparing NULL with
   * IS NULL. Returns its id, `true` for a match on a kind without ids, or null.
   */
  findExisting(keyColumns: readonly string[], values: RecordValues): number | true | null {
    const conditions: string[] = [];
    const params: SqlValue[] = [];
    for (const column of keyColumns) {
      const value = values[column];
      if (value === null) {
        conditions.push(`${quoteIdentifier(column)} IS NULL`);
      } else {
        conditions.push(`${quoteIdentifier(column)} = ?`);
        params.push(value);
      }
    }

    const selected = this.kind.idColumn ? quoteIdentifier(this.kind.idColumn) : '1';
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT ${selected} AS existing FROM ${this.table}${where} LIMIT 1`;

    const row: unknown = this.prepare(sql).get(...params);
    if (!row || typeof row !== 'object') return null;
    if (!this.kind.idColumn) return true;

    const existing: unknown = Reflect.get(row, 'existing');
    return typeof existing === 'number' ? existing : null;
  }

  insert(values: RecordValues): number {
    const params = this.kind.columns.map((column) => values[column]);
    const info = this.prepare(this.insertSql).run(...params);
    return Number(info.lastInsertRowid);
  }
}

function readSourceRows(source: Database.Database, kind: EntityKind): SourceRow[] {
  const selected = kind.idColumn ? [kind.idColumn, ...kind.columns] : [...kind.columns];
  const order = kind.idColumn ? ` ORDER BY ${quoteIdentifier(kind.idColumn)}` : '';
  const sql = `SELECT ${selected.map(quoteIdentifier).join(', ')} FROM ${quoteIdentifier(kind.name)}${order}`;
  return source.prepare(sql).all().map((row) => toSourceRow(row, kind));
}

function remapForeignKeys(
  row: SourceRow,
  kind: EntityKind,
  bindings: TableMergeInput['bindings'],
  warnings: MergeWarning[],
): void {
  for (const fk of kind.foreignKeys) {
    const mapping = bindings.get(fk.column);
    if (!mapping) continue;

    const oldValue = row.values[fk.column];
    if (oldValue === null) continue;

    const newValue = typeof oldValue === 'number' ? mapping.get(oldValue) : undefined;
    if (newValue === undefined) {
      // Left in place: the destination row may reference a source-side id.
      log.warn(`${kind.name}.${fk.column}: no mapping found for ID ${String(oldValue)}`);
      warnings.push({
        type: 'unresolved-reference',
        kind: kind.name,
        column: fk.column,
        value: oldValue,
        sourceId: row.oldId,
      });
      continue;
    }

    log.debug(`${kind.name}.${fk.column}: mapping ${oldValue} -> ${newValue}`);
    row.values[fk.column] = newValue;
  }
}

/**
 * Merges every source row of one entity kind into the destination. Must run
 * inside the caller's destination transaction; store errors other than a
 * recovered uniqueness conflict surface as TableMergeError.
 */
export function mergeTable(input: TableMergeInput): TableMergeResult {
  const { source, destination, kind, bindings, idMap } = input;
  const result: TableMergeResult = { kind: kind.name, read: 0, inserted: 0, duplicates: 0, warnings: [] };

  try {
    const writer = new TableWriter(destination, kind);
    const rows = readSourceRows(source, kind);
    log.debug(`Found ${rows.length} records in ${kind.name}`);

    for (const row of rows) {
      result.read++;
      remapForeignKeys(row, kind, bindings, result.warnings);

      const keyColumns = kind.duplicateKey(row.values);
      const existing = writer.findExisting(keyColumns, row.values);

      if (existing !== null) {
        result.duplicates++;
        if (row.oldId !== null && typeof existing === 'number') {
          idMap.set(row.oldId, existing);
          log.debug(`Mapped existing ${kind.name}: ${row.oldId} -> ${existing}`);
        }
        continue;
      }

      try {
        const newId = writer.insert(row.values);
        result.inserted++;
        if (row.oldId !== null) {
          idMap.set(row.oldId, newId);
          log.debug(`Created new ${kind.name} mapping: ${row.oldId} -> ${newId}`);
        }
      } catch (err) {
        if (!isUniquenessConflict(err)) throw err;

        result.duplicates++;
        log.warn(`Skipping duplicate record in ${kind.name}: ${errorMessage(err)}`);
        if (row.oldId === null) continue;

        const conflictColumns = parseConflictColumns(errorMessage(err), kind);
        const found =
          (conflictColumns.length > 0 ? writer.findExisting(conflictColumns, row.values) : null) ??
          writer.findExisting(keyColumns, row.values);

        if (typeof found === 'number') {
          idMap.set(row.oldId, found);
          log.debug(`Mapped skipped ${kind.name}: ${row.oldId} -> ${found}`);
        } else {
          result.warnings.push({
            type: 'unmapped-duplicate',
            kind: kind.name,
            sourceId: row.oldId,
            reason: errorMessage(err),
          });
        }
      }
    }
  } catch (err) {
    throw new TableMergeError(kind.name, err);
  }

  log.info(
    `${kind.name}: ${result.read} read, ${result.inserted} inserted, ${result.duplicates} duplicates` +
      (result.warnings.length > 0 ? `, ${result.warnings.length} warnings` : ''),
  );
  return result;
}
