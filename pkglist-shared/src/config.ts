/**
 * Layered configuration: defaults < config file < environment < explicit overrides.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logging/logger';
import type { LogLevel } from './logging/logger';
import { getConfigFilePath } from './paths';
import { readJsonFile } from './readers/helpers';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const configSchema = z.object({
  logLevel: logLevelSchema.optional(),
  logFile: z.string().min(1).optional(),
  catalogPath: z.string().min(1).optional(),
  scrollRetryLimit: z.number().int().positive().optional(),
  refreshDelayMs: z.number().int().nonnegative().optional(),
}).strict();

export type PartialConfig = z.infer<typeof configSchema>;

export interface PkgListConfig {
  logLevel: LogLevel;
  logFile?: string;
  catalogPath?: string;
  scrollRetryLimit: number;
  refreshDelayMs: number;
}

export const DEFAULT_CONFIG: PkgListConfig = {
  logLevel: 'info',
  scrollRetryLimit: 200,
  refreshDelayMs: 300,
};

export interface LoadConfigOptions {
  /** Defaults to ~/.config/pkglist/config.json. */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialConfig;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function dropUndefined(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function parsePartial(value: unknown, origin: string): PartialConfig {
  const parsed = configSchema.safeParse(dropUndefined(value));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${origin}: ${describeIssues(parsed.error)}`, { origin });
  }
  return parsed.data;
}

/** Read the `PKGLIST_*` variables. Unknown log levels are a ConfigError. */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const partial: Record<string, unknown> = {};
  const level = env.PKGLIST_LOG_LEVEL;
  if (level) {
    if (!LOG_LEVELS.some(l => l === level)) {
      throw new ConfigError(`PKGLIST_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: level });
    }
    partial.logLevel = level;
  }
  if (env.PKGLIST_LOG_FILE) partial.logFile = env.PKGLIST_LOG_FILE;
  if (env.PKGLIST_CATALOG) partial.catalogPath = env.PKGLIST_CATALOG;
  return parsePartial(partial, 'environment');
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PkgListConfig> {
  const filePath = options.filePath ?? getConfigFilePath();
  const env = options.env ?? process.env;

  let fromFile: PartialConfig = {};
  const read = await readJsonFile(filePath);
  if (read.ok) {
    fromFile = parsePartial(read.value, filePath);
  } else if (read.reason === 'malformed') {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { filePath });
  }
  // A missing or unreadable file falls back to defaults

  const fromEnv = configFromEnv(env);
  const fromArgs = parsePartial(options.overrides ?? {}, 'command-line options');
  const layers = [fromArgs, fromEnv, fromFile];
  const pick = <K extends keyof PartialConfig>(key: K): PartialConfig[K] =>
    layers.map(layer => layer[key]).find(v => v !== undefined);

  return {
    logLevel: pick('logLevel') ?? DEFAULT_CONFIG.logLevel,
    logFile: pick('logFile'),
    catalogPath: pick('catalogPath'),
    scrollRetryLimit: pick('scrollRetryLimit') ?? DEFAULT_CONFIG.scrollRetryLimit,
    refreshDelayMs: pick('refreshDelayMs') ?? DEFAULT_CONFIG.refreshDelayMs,
  };
}
