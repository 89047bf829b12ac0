import * as fs from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { createLogger } from '../logger';
import { ArchiveIOError, errorMessage } from '../errors';

const log = createLogger('workspace');

const WORKSPACE_PREFIX = 'backup-merge-';

export interface RunWorkspace {
  root: string;
  sourceDir: string;
  destinationDir: string;
}

export async function createRunWorkspace(rootDir: string = tmpdir()): Promise<RunWorkspace> {
  try {
    await fs.mkdir(rootDir, { recursive: true });
    const root = await fs.mkdtemp(path.join(rootDir, WORKSPACE_PREFIX));
    const sourceDir = path.join(root, 'source');
    const destinationDir = path.join(root, 'destination');
    await fs.mkdir(sourceDir);
    await fs.mkdir(destinationDir);
    log.debug(`Created workspace ${root}`);
    return { root, sourceDir, destinationDir };
  } catch (err) {
    throw new ArchiveIOError(`Could not create workspace under ${rootDir}: ${errorMessage(err)}`, 'extract', { cause: err });
  }
}

async function measure(dir: string): Promise<{ files: number; bytes: number }> {
  const totals = { files: 0, bytes: 0 };
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const sub = await measure(full);
      totals.files += sub.files;
      totals.bytes += sub.bytes;
    } else if (entry.isFile()) {
      totals.files++;
      totals.bytes += (await fs.stat(full)).size;
    }
  }
  return totals;
}

/** Removes the workspace and everything in it. Safe to call twice. */
export async function releaseRunWorkspace(ws: RunWorkspace): Promise<void> {
  let freed: { files: number; bytes: number };
  try {
    freed = await measure(ws.root);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.debug(`Workspace ${ws.root} already removed`);
      return;
    }
    throw new ArchiveIOError(`Could not inspect workspace ${ws.root}: ${errorMessage(err)}`, 'pack', { cause: err });
  }

  try {
    await fs.rm(ws.root, { recursive: true, force: true });
  } catch (err) {
    throw new ArchiveIOError(`Could not remove workspace ${ws.root}: ${errorMessage(err)}`, 'pack', { cause: err });
  }

  const mb = (freed.bytes / (1024 * 1024)).toFixed(1);
  log.info(`Cleaned up workspace (${freed.files} files, ${mb} MB freed)`);
}
