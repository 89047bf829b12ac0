/**
 * Static description of the user-data tables that take part in a merge.
 *
 * Column lists follow the store's declared order. The merge never inspects
 * table shape at runtime; a store missing one of these columns fails the
 * kind's merge with a TableMergeError.
 */

import type { EntityKindName, RecordValues } from '../../shared/merge-types';

export interface ForeignKey {
  column: string;
  /** Kind whose translation table resolves this column. */
  references: EntityKindName;
}

export interface EntityKind {
  name: EntityKindName;
  /** Surrogate identifier column, or null when rows have no portable id. */
  idColumn: string | null;
  /** Every non-surrogate column, in store order. */
  columns: readonly string[];
  foreignKeys: readonly ForeignKey[];
  /** Columns whose NULL-aware equality means "already present". */
  duplicateKey(values: RecordValues): readonly string[];
  /** Progress range covered while this kind merges. */
  progress: { start: number; end: number };
  label: string;
}

/** Location.Type reserved for a document with a track (media). */
export const LOCATION_TYPE_DOCUMENT_TRACK = 3;

const LOCATION_TRACK_KEY = ['KeySymbol', 'IssueTagNumber', 'MepsLanguage', 'DocumentId', 'Track', 'Type'] as const;
const LOCATION_DOCUMENT_KEY = ['BookNumber', 'ChapterNumber', 'KeySymbol', 'MepsLanguage', 'Type', 'DocumentId'] as const;
const LOCATION_CHAPTER_KEY = ['BookNumber', 'ChapterNumber', 'KeySymbol', 'MepsLanguage', 'Type'] as const;

export function locationDuplicateKey(values: RecordValues): readonly string[] {
  const type = values.Type;
  if ((typeof type === 'number' || typeof type === 'bigint') && Number(type) === LOCATION_TYPE_DOCUMENT_TRACK) {
    return LOCATION_TRACK_KEY;
  }
  if (values.DocumentId !== null && values.DocumentId !== undefined) {
    return LOCATION_DOCUMENT_KEY;
  }
  return LOCATION_CHAPTER_KEY;
}

function allColumns(columns: readonly string[]): (values: RecordValues) => readonly string[] {
  return () => columns;
}

function defineKind(kind: Omit<EntityKind, 'duplicateKey'> & { duplicateKey?: EntityKind['duplicateKey'] }): EntityKind {
  return { ...kind, duplicateKey: kind.duplicateKey ?? allColumns(kind.columns) };
}

export const LOCATION = defineKind({
  name: 'Location',
  idColumn: 'LocationId',
  columns: ['BookNumber', 'ChapterNumber', 'DocumentId', 'Track', 'IssueTagNumber', 'KeySymbol', 'MepsLanguage', 'Type', 'Title'],
  foreignKeys: [],
  duplicateKey: locationDuplicateKey,
  progress: { start: 35, end: 45 },
  label: 'Merging locations...',
});

export const USER_MARK = defineKind({
  name: 'UserMark',
  idColumn: 'UserMarkId',
  columns: ['ColorIndex', 'LocationId', 'StyleIndex', 'UserMarkGuid', 'Version'],
  foreignKeys: [{ column: 'LocationId', references: 'Location' }],
  progress: { start: 45, end: 55 },
  label: 'Merging user marks...',
});

export const BLOCK_RANGE = defineKind({
  name: 'BlockRange',
  idColumn: 'BlockRangeId',
  columns: ['BlockType', 'Identifier', 'StartToken', 'EndToken', 'UserMarkId'],
  foreignKeys: [{ column: 'UserMarkId', references: 'UserMark' }],
  progress: { start: 55, end: 60 },
  label: 'Merging block ranges...',
});

export const NOTE = defineKind({
  name: 'Note',
  idColumn: 'NoteId',
  columns: ['Guid', 'UserMarkId', 'LocationId', 'Title', 'Content', 'LastModified', 'Created', 'BlockType', 'BlockIdentifier'],
  foreignKeys: [
    { column: 'UserMarkId', references: 'UserMark' },
    { column: 'LocationId', references: 'Location' },
  ],
  progress: { start: 60, end: 70 },
  label: 'Merging notes...',
});

export const PLAYLIST_ITEM = defineKind({
  name: 'PlaylistItem',
  idColumn: 'PlaylistItemId',
  columns: ['Label', 'StartTrimOffsetTicks', 'EndTrimOffsetTicks', 'Accuracy', 'EndAction', 'ThumbnailFilePath'],
  foreignKeys: [],
  progress: { start: 70, end: 75 },
  label: 'Merging playlist items...',
});

export const TAG = defineKind({
  name: 'Tag',
  idColumn: 'TagId',
  columns: ['Type', 'Name'],
  foreignKeys: [],
  progress: { start: 75, end: 78 },
  label: 'Merging tags...',
});

export const INPUT_FIELD = defineKind({
  name: 'InputField',
  idColumn: null,
  columns: ['LocationId', 'TextTag', 'Value'],
  foreignKeys: [{ column: 'LocationId', references: 'Location' }],
  progress: { start: 78, end: 80 },
  label: 'Merging input fields...',
});

export const TAG_MAP = defineKind({
  name: 'TagMap',
  idColumn: 'TagMapId',
  columns: ['PlaylistItemId', 'LocationId', 'NoteId', 'TagId', 'Position'],
  foreignKeys: [
    { column: 'PlaylistItemId', references: 'PlaylistItem' },
    { column: 'LocationId', references: 'Location' },
    { column: 'NoteId', references: 'Note' },
    { column: 'TagId', references: 'Tag' },
  ],
  progress: { start: 80, end: 85 },
  label: 'Merging tag mappings...',
});

/**
 * Merge order. Every kind appears after all kinds its foreign keys reference,
 * so translation lookups only ever hit tables already merged in this run.
 */
export const MERGE_SCHEDULE: readonly EntityKind[] = [
  LOCATION,
  USER_MARK,
  BLOCK_RANGE,
  NOTE,
  PLAYLIST_ITEM,
  TAG,
  INPUT_FIELD,
  TAG_MAP,
];

export function getEntityKind(name: EntityKindName): EntityKind {
  const kind = MERGE_SCHEDULE.find((k) => k.name === name);
  if (!kind) throw new Error(`Unknown entity kind: ${name}`);
  return kind;
}

/** Returns the first kind that references a kind scheduled at or after it, or null. */
export function findScheduleViolation(schedule: readonly EntityKind[]): { kind: EntityKindName; references: EntityKindName } | null {
  const merged = new Set<EntityKindName>();
  for (const kind of schedule) {
    for (const fk of kind.foreignKeys) {
      if (!merged.has(fk.references)) {
        return { kind: kind.name, references: fk.references };
      }
    }
    merged.add(kind.name);
  }
  return null;
}

// A misordered schedule is a programming error; fail at load, never mid-run.
const scheduleViolation = findScheduleViolation(MERGE_SCHEDULE);
if (scheduleViolation) {
  throw new Error(`Merge schedule places ${scheduleViolation.kind} before ${scheduleViolation.references}`);
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
