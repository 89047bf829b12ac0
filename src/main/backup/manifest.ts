/**
 * manifest.json: the description of a user-data backup.
 *
 *   {
 *     "name": "UserDataBackup_2026-03-01_Laptop.jwlibrary",
 *     "creationDate": "2026-03-01",
 *     "version": 1,
 *     "type": 0,
 *     "userDataBackup": {
 *       "lastModifiedDate": "2026-03-01T09:12:44+00:00",
 *       "deviceName": "Laptop",
 *       "databaseName": "userData.db",
 *       "hash": "<sha-256 of the database file>",
 *       "schemaVersion": 14
 *     }
 *   }
 *
 * Keys this module does not know about are kept as they are on rewrite.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../logger';
import { IncompatibleInputError, errorMessage } from '../errors';
import { resolveEntryPath } from './archive';

const log = createLogger('manifest');

export const MANIFEST_FILE = 'manifest.json';
export const DEFAULT_DATABASE_NAME = 'userData.db';
export const ARCHIVE_EXTENSION = '.jwlibrary';

const isoInstant = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO-8601 timestamp' });

const UserDataBackupSchema = z
  .object({
    lastModifiedDate: isoInstant,
    deviceName: z.string().optional(),
    databaseName: z.string().min(1).default(DEFAULT_DATABASE_NAME),
    hash: z.string().optional(),
    schemaVersion: z.number().int().nonnegative(),
  })
  .passthrough();

export const ManifestSchema = z
  .object({
    name: z.string(),
    creationDate: z.string(),
    version: z.number().int().optional(),
    type: z.number().int().optional(),
    userDataBackup: UserDataBackupSchema,
  })
  .passthrough();

export type BackupManifest = z.infer<typeof ManifestSchema>;

export function parseManifest(text: string, label: string): BackupManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IncompatibleInputError(`${label} manifest is not valid JSON: ${errorMessage(err)}`, 'validate', { cause: err });
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    throw new IncompatibleInputError(`${label} manifest is malformed (${where})`, 'validate', { cause: parsed.error });
  }
  return parsed.data;
}

export async function readManifest(dir: string, label: string): Promise<BackupManifest> {
  let text: string;
  try {
    text = await fs.readFile(path.join(dir, MANIFEST_FILE), 'utf-8');
  } catch (err) {
    throw new IncompatibleInputError(`${label} archive has no readable ${MANIFEST_FILE}`, 'validate', { cause: err });
  }
  return parseManifest(text, label);
}

export async function writeManifest(dir: string, manifest: BackupManifest): Promise<void> {
  await fs.writeFile(path.join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
}

/** Absolute path of the store file a manifest names, checked to exist. */
export async function locateDatabase(dir: string, manifest: BackupManifest, label: string): Promise<string> {
  const name = manifest.userDataBackup.databaseName;
  let dbPath: string;
  try {
    dbPath = resolveEntryPath(dir, name);
  } catch (err) {
    throw new IncompatibleInputError(`${label} manifest names an invalid database file: ${name}`, 'validate', { cause: err });
  }

  try {
    const info = await fs.stat(dbPath);
    if (!info.isFile()) throw new Error('not a regular file');
  } catch (err) {
    throw new IncompatibleInputError(`${label} archive is missing its database ${name}`, 'validate', { cause: err });
  }
  return dbPath;
}

/** Both sides must declare the same schema version before anything is merged. */
export function assertCompatible(source: BackupManifest, destination: BackupManifest): void {
  const a = source.userDataBackup.schemaVersion;
  const b = destination.userDataBackup.schemaVersion;
  if (a !== b) {
    throw new IncompatibleInputError(`Schema versions do not match (source ${a}, destination ${b})`, 'validate');
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** merged_YYYY-MM-DD_HH-MM-SS in local time. */
export function mergedBackupName(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `merged_${date}_${time}`;
}

/** The later of two lastModifiedDate strings; the destination's on ties. */
export function laterModifiedDate(source: string, destination: string): string {
  return Date.parse(source) > Date.parse(destination) ? source : destination;
}

export interface ManifestUpdate {
  manifest: BackupManifest;
  /** Display name without the archive extension. */
  stem: string;
}

export function updateManifest(
  destination: BackupManifest,
  source: BackupManifest,
  opts: { hash: string; now: Date },
): ManifestUpdate {
  const stem = mergedBackupName(opts.now);
  const manifest: BackupManifest = {
    ...destination,
    name: `${stem}${ARCHIVE_EXTENSION}`,
    creationDate: opts.now.toISOString(),
    userDataBackup: {
      ...destination.userDataBackup,
      hash: opts.hash,
      lastModifiedDate: laterModifiedDate(
        source.userDataBackup.lastModifiedDate,
        destination.userDataBackup.lastModifiedDate,
      ),
    },
  };
  log.debug('Updated manifest', manifest);
  return { manifest, stem };
}
