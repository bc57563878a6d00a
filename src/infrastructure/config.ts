import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../domain/index.js';
import { readTextFile } from './files/text-file.js';

/**
 * Application configuration loaded from YAML.
 */
export interface AppConfig {
  artifacts: {
    directory: string;
    history_log: string;
    live_log: string;
    baseline: string;
    baseline_statistics: string;
  };
  logging: { level: LogLevel };
}

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Default configuration — artifacts in the working directory, info logging.
 */
export const DEFAULT_CONFIG: AppConfig = {
  artifacts: {
    directory: '.',
    history_log: 'logs.txt',
    live_log: 'live_logs.txt',
    baseline: 'baseline.txt',
    baseline_statistics: 'baseline_statistics.txt',
  },
  logging: { level: 'info' },
};

const fileName = z.string().min(1);
const defaults = DEFAULT_CONFIG.artifacts;

// Missing keys take their DEFAULT_CONFIG value.
const configFileSchema = z.object({
  artifacts: z
    .object({
      directory: fileName.default(defaults.directory),
      history_log: fileName.default(defaults.history_log),
      live_log: fileName.default(defaults.live_log),
      baseline: fileName.default(defaults.baseline),
      baseline_statistics: fileName.default(defaults.baseline_statistics),
    })
    .default({}),
  logging: z.object({ level: logLevelSchema.default(DEFAULT_CONFIG.logging.level) }).default({}),
});

/**
 * Loads configuration from `config/baseline-sentry.yaml`.
 *
 * A missing file yields DEFAULT_CONFIG; a present but invalid one is a
 * ValidationError. `LOG_LEVEL` in the environment overrides
 * `logging.level`.
 */
export function loadAppConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'baseline-sentry.yaml');

  let config: AppConfig = {
    artifacts: { ...DEFAULT_CONFIG.artifacts },
    logging: { ...DEFAULT_CONFIG.logging },
  };

  if (existsSync(filePath)) {
    let document: unknown;
    try {
      document = parseYaml(readTextFile(filePath));
    } catch (err: unknown) {
      if (err instanceof Error && err.name.startsWith('YAML')) {
        throw new ValidationError(`${filePath}: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const result = configFileSchema.safeParse(document ?? {});
    if (!result.success) {
      const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`${filePath}: ${detail}`);
    }
    config = result.data;
  }

  const envLevel = logLevelSchema.safeParse(env['LOG_LEVEL']);
  if (envLevel.success) config.logging.level = envLevel.data;
  return config;
}

export type ArtifactName = Exclude<keyof AppConfig['artifacts'], 'directory'>;

/** Absolute path of an artifact inside the configured directory. */
export function artifactPath(config: AppConfig, name: ArtifactName): string {
  return resolve(join(config.artifacts.directory, config.artifacts[name]));
}
