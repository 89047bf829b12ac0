/**
 * backup-merge: merge two user-data backup archives.
 *
 *   backup-merge merge <source> <destination> [--out <dir>] [--log-level <level>]
 *   backup-merge inspect <archive>
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { loadConfig, type MergeConfig } from '../config';
import { describeError, errorMessage, isBackupMergeError } from '../errors';
import { isLogLevel, setLogLevel } from '../logger';
import { ENTITY_KINDS } from '../../shared/merge-types';
import { mergeBackups } from '../backup/merger';
import { unpackArchive } from '../backup/archive';
import { locateDatabase, readManifest } from '../backup/manifest';
import { createRunWorkspace, releaseRunWorkspace } from '../backup/workspace';
import { getEntityKind } from '../merge/schema';
import { closeStore, countRows, openStore } from '../merge/store';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = `backup-merge: merge two user-data backups

  backup-merge merge <source> <destination> [--out <dir>] [--log-level <level>]
  backup-merge inspect <archive>

The destination backup is the base; records from the source are added to it.`;

export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

/** Positional arguments with every `--flag value` pair removed. */
export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      i++;
      continue;
    }
    out.push(args[i]);
  }
  return out;
}

async function merge(args: string[], config: MergeConfig, io: CliIO): Promise<number> {
  const [sourcePath, destinationPath] = positionals(args);
  if (!sourcePath || !destinationPath) {
    io.err('Usage: backup-merge merge <source> <destination> [--out <dir>] [--log-level <level>]');
    return 1;
  }

  const outputDir = path.resolve(getFlag(args, '--out') ?? config.outputDir);
  const [source, destination] = await Promise.all([fs.readFile(sourcePath), fs.readFile(destinationPath)]);

  io.out(`Source: ${sourcePath}`);
  io.out(`Destination: ${destinationPath}`);

  const result = await mergeBackups(source, destination, {
    workDir: config.workDir,
    onProgress: (progress, message) => io.out(`[${String(progress).padStart(3)}%] ${message}`),
  });

  await fs.mkdir(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, result.fileName);
  await fs.writeFile(outputPath, result.archive);

  io.out(`✓ Merged backup written: ${outputPath}`);
  for (const kind of ENTITY_KINDS) {
    const s = result.stats[kind];
    io.out(`  ${kind.padEnd(14)} ${String(s.inserted).padStart(6)} added  ${String(s.duplicates).padStart(6)} already present`);
  }
  if (result.warnings.length > 0) {
    io.out(`  Warnings: ${result.warnings.length} (see log)`);
  }
  return 0;
}

async function inspect(args: string[], config: MergeConfig, io: CliIO): Promise<number> {
  const [archivePath] = positionals(args);
  if (!archivePath) {
    io.err('Usage: backup-merge inspect <archive>');
    return 1;
  }

  const ws = await createRunWorkspace(config.workDir);
  try {
    await unpackArchive(await fs.readFile(archivePath), ws.sourceDir);
    const manifest = await readManifest(ws.sourceDir, 'Archive');
    const dbPath = await locateDatabase(ws.sourceDir, manifest, 'Archive');

    io.out(`Name: ${manifest.name}`);
    io.out(`Created: ${manifest.creationDate}`);
    io.out(`Last modified: ${manifest.userDataBackup.lastModifiedDate}`);
    io.out(`Schema version: ${manifest.userDataBackup.schemaVersion}`);
    io.out(`Hash: ${manifest.userDataBackup.hash ?? '(none)'}`);
    io.out('');

    const db = openStore(dbPath, { readonly: true, label: 'archive' });
    try {
      for (const kind of ENTITY_KINDS) {
        io.out(`  ${kind.padEnd(14)} ${String(countRows(db, getEntityKind(kind))).padStart(6)} rows`);
      }
    } finally {
      closeStore(db, 'archive');
    }
  } finally {
    await releaseRunWorkspace(ws);
  }
  return 0;
}

const commands: Record<string, (args: string[], config: MergeConfig, io: CliIO) => Promise<number>> = {
  merge,
  inspect,
};

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], io: CliIO = consoleIO, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [command, ...args] = argv;
  const handler = command && Object.hasOwn(commands, command) ? commands[command] : undefined;
  if (!handler) {
    io.out(USAGE);
    return command ? 1 : 0;
  }

  try {
    const config = loadConfig(env);
    const level = getFlag(args, '--log-level') ?? config.logLevel;
    if (!isLogLevel(level)) {
      io.err(`Error: unknown log level ${level}`);
      return 1;
    }
    setLogLevel(level);
    return await handler(args, config, io);
  } catch (err) {
    io.err(`Error: ${isBackupMergeError(err) ? describeError(err) : errorMessage(err)}`);
    return 1;
  }
}
