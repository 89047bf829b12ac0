import { tmpdir } from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from './config';

const cwd = path.resolve('/srv/merge');

describe('loadConfig', () => {
  it('uses development defaults for an empty environment', () => {
    expect(loadConfig({}, cwd)).toEqual({
      environment: 'development',
      logLevel: 'debug',
      workDir: tmpdir(),
      outputDir: cwd,
    });
  });

  it('logs at info in production', () => {
    expect(loadConfig({ NODE_ENV: 'production' }, cwd).logLevel).toBe('info');
  });

  it('accepts LOG_LEVEL in any case', () => {
    expect(loadConfig({ LOG_LEVEL: 'WARN', NODE_ENV: 'production' }, cwd).logLevel).toBe('warn');
  });

  it('resolves directories against the working directory', () => {
    const config = loadConfig({ BACKUP_MERGE_WORK_DIR: 'tmp', BACKUP_MERGE_OUTPUT_DIR: '/data/out' }, cwd);
    expect(config.workDir).toBe(path.join(cwd, 'tmp'));
    expect(config.outputDir).toBe(path.resolve('/data/out'));
  });

  it('rejects an unknown log level and lists the allowed ones', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' }, cwd)).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' }, cwd)).toThrow('(expected one of debug, info, warn, error)');
  });

  it('treats an unknown environment name as development', () => {
    expect(loadConfig({ NODE_ENV: 'staging' }, cwd)).toMatchObject({ environment: 'development', logLevel: 'debug' });
  });
});
