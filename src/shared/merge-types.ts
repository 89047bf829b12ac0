// ---------------------------------------------------------------------------
// Types shared between the merge engine, the pipeline and its callers.
// ---------------------------------------------------------------------------

export const ENTITY_KINDS = [
  'Location',
  'UserMark',
  'BlockRange',
  'Note',
  'PlaylistItem',
  'Tag',
  'InputField',
  'TagMap',
] as const;

export type EntityKindName = (typeof ENTITY_KINDS)[number];

/** A single column value as better-sqlite3 reads and binds it. */
export type SqlValue = number | bigint | string | Buffer | null;

/** Column name -> value, in the entity kind's declared column order. */
export type RecordValues = Record<string, SqlValue>;

/**
 * Caller-owned progress callback. Progress is an integer in 0..100 and never
 * decreases during one run; a successful run ends with 100.
 */
export type ProgressSink = (progress: number, message: string) => void;

export type MergePhase = 'extract' | 'validate' | 'merge' | 'manifest' | 'pack';

export interface UnresolvedReferenceWarning {
  type: 'unresolved-reference';
  kind: EntityKindName;
  column: string;
  /** Source-side value left in place because no translation exists. */
  value: SqlValue;
  sourceId: number | null;
}

export interface UnmappedDuplicateWarning {
  type: 'unmapped-duplicate';
  kind: EntityKindName;
  sourceId: number;
  reason: string;
}

export type MergeWarning = UnresolvedReferenceWarning | UnmappedDuplicateWarning;

export interface TableMergeStats {
  read: number;
  inserted: number;
  duplicates: number;
}

export interface TableMergeResult extends TableMergeStats {
  kind: EntityKindName;
  warnings: MergeWarning[];
}

export interface DatabaseMergeResult {
  tables: TableMergeResult[];
  warnings: MergeWarning[];
}
