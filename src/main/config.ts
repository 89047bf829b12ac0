import { tmpdir } from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  // Unrecognised names (staging, ci, ...) run with development defaults, as the logger does.
  NODE_ENV: z
    .string()
    .optional()
    .transform((value) => (value === 'production' || value === 'test' ? value : 'development')),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional(),
  BACKUP_MERGE_WORK_DIR: z.string().min(1).optional(),
  BACKUP_MERGE_OUTPUT_DIR: z.string().min(1).optional(),
});

export interface MergeConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  workDir: string;
  outputDir: string;
}

/** Reads and validates the process environment (or a supplied one). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): MergeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    const allowed = variable === 'LOG_LEVEL' ? ` (expected one of ${LOG_LEVELS.join(', ')})` : '';
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}${allowed}`);
  }

  const values = parsed.data;
  return {
    environment: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'production' ? 'info' : 'debug'),
    workDir: values.BACKUP_MERGE_WORK_DIR ? path.resolve(cwd, values.BACKUP_MERGE_WORK_DIR) : tmpdir(),
    outputDir: path.resolve(cwd, values.BACKUP_MERGE_OUTPUT_DIR ?? '.'),
  };
}
