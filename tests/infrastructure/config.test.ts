import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { artifactPath, loadAppConfig, DEFAULT_CONFIG } from '../../src/infrastructure/config.js';
import { ValidationError } from '../../src/domain/index.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-config');

function writeTmpYaml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'baseline-sentry.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadAppConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when file does not exist', () => {
    expect(loadAppConfig('/nonexistent/path.yaml', {})).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for empty file', () => {
    expect(loadAppConfig(writeTmpYaml(''), {})).toEqual(DEFAULT_CONFIG);
  });

  it('merges loaded values over defaults', () => {
    const path = writeTmpYaml('artifacts:\n  directory: out\n  live_log: live.log\n');
    const config = loadAppConfig(path, {});

    expect(config.artifacts).toEqual({ ...DEFAULT_CONFIG.artifacts, directory: 'out', live_log: 'live.log' });
    expect(config.logging.level).toBe('info');
  });

  it('reads the log level', () => {
    const config = loadAppConfig(writeTmpYaml('logging:\n  level: debug\n'), {});
    expect(config.logging.level).toBe('debug');
  });

  it('lets LOG_LEVEL override the file', () => {
    const path = writeTmpYaml('logging:\n  level: debug\n');
    expect(loadAppConfig(path, { LOG_LEVEL: 'warn' }).logging.level).toBe('warn');
  });

  it('ignores an unknown LOG_LEVEL', () => {
    expect(loadAppConfig('/nonexistent/path.yaml', { LOG_LEVEL: 'loud' }).logging.level).toBe('info');
  });

  it('rejects an invalid value', () => {
    const path = writeTmpYaml('logging:\n  level: loud\n');
    expect(() => loadAppConfig(path, {})).toThrow(ValidationError);
  });

  it('rejects malformed YAML', () => {
    const path = writeTmpYaml('artifacts: [unclosed\n');
    expect(() => loadAppConfig(path, {})).toThrow(ValidationError);
  });

  it('does not share nested objects with DEFAULT_CONFIG', () => {
    const config = loadAppConfig('/nonexistent/path.yaml', { LOG_LEVEL: 'error' });
    expect(config.logging.level).toBe('error');
    expect(DEFAULT_CONFIG.logging.level).toBe('info');
  });
});

describe('artifactPath', () => {
  it('resolves an artifact inside the configured directory', () => {
    const config = { ...DEFAULT_CONFIG, artifacts: { ...DEFAULT_CONFIG.artifacts, directory: 'out' } };
    expect(artifactPath(config, 'baseline')).toBe(resolve('out', 'baseline.txt'));
  });
});
