/**
 * Backup archive <-> workspace directory.
 *
 * An archive is a zip holding the user-data store and manifest.json. Entries
 * are unpacked only beneath the workspace root; repacking stores every file
 * under the workspace with DEFLATE and forward-slash relative paths.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import JSZip from 'jszip';
import { createLogger } from '../logger';
import { ArchiveIOError, errorMessage } from '../errors';

const log = createLogger('archive');

export type ArchiveInput = Buffer | Uint8Array | Readable;

export interface PackOptions {
  /** Timestamp stamped on every entry; defaults to now. */
  date?: Date;
}

export async function readArchiveInput(input: ArchiveInput): Promise<Buffer> {
  if (Buffer.isBuffer(input)) return input;
  if (input instanceof Uint8Array) return Buffer.from(input);

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of input) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (err) {
    throw new ArchiveIOError(`Failed to read archive stream: ${errorMessage(err)}`, 'extract', { cause: err });
  }
  return Buffer.concat(chunks);
}

/**
 * Resolves an archive entry name to an absolute path under root. Throws for
 * names that are absolute or climb out of the root.
 */
export function resolveEntryPath(root: string, entryName: string): string {
  const normalized = entryName.replace(/\\/g, '/');
  if (normalized.length === 0 || normalized.includes('\0')) {
    throw new ArchiveIOError(`Invalid archive entry name: ${JSON.stringify(entryName)}`, 'extract');
  }
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    throw new ArchiveIOError(`Archive entry has an absolute path: ${entryName}`, 'extract');
  }

  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, normalized);
  const relative = path.relative(resolvedRoot, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ArchiveIOError(`Archive entry escapes the workspace (path traversal): ${entryName}`, 'extract');
  }
  return target;
}

/** Unpacks archive bytes into dir. Returns the relative paths of the files written. */
export async function unpackArchive(data: Buffer, dir: string): Promise<string[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (err) {
    throw new ArchiveIOError(`Not a readable archive: ${errorMessage(err)}`, 'extract', { cause: err });
  }

  const written: string[] = [];
  try {
    await fs.mkdir(dir, { recursive: true });

    for (const entry of Object.values(zip.files)) {
      const rawName = entry.unsafeOriginalName ?? entry.name;
      const target = resolveEntryPath(dir, rawName);

      if (entry.dir) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }

      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await entry.async('nodebuffer'));
      written.push(path.relative(dir, target).split(path.sep).join('/'));
    }
  } catch (err) {
    if (err instanceof ArchiveIOError) throw err;
    throw new ArchiveIOError(`Failed to unpack archive: ${errorMessage(err)}`, 'extract', { cause: err });
  }

  log.debug(`Unpacked ${written.length} files into ${dir}`, written);
  return written.sort();
}

async function walkFiles(root: string, dir: string = root): Promise<string[]> {
  const results: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await walkFiles(root, full)));
    } else if (entry.isFile()) {
      results.push(path.relative(root, full).split(path.sep).join('/'));
    }
  }
  return results;
}

/** Lists every regular file under dir as sorted forward-slash relative paths. */
export async function listWorkspaceFiles(dir: string): Promise<string[]> {
  return (await walkFiles(dir)).sort();
}

/** Packs every file under dir into archive bytes. */
export async function packWorkspace(dir: string, options: PackOptions = {}): Promise<Buffer> {
  const date = options.date ?? new Date();
  try {
    const files = await listWorkspaceFiles(dir);
    const zip = new JSZip();
    for (const relPath of files) {
      zip.file(relPath, await fs.readFile(path.join(dir, relPath)), { date });
    }

    const archive = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
    log.debug(`Packed ${files.length} files (${archive.length} bytes) from ${dir}`);
    return archive;
  } catch (err) {
    throw new ArchiveIOError(`Failed to pack archive: ${errorMessage(err)}`, 'pack', { cause: err });
  }
}
