/**
 * Option handling shared by the commands: configuration layering, logger
 * setup and catalog resolution.
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { setTimeout as delay } from 'timers/promises';
import {
  FILTER_TABS,
  configureLogger,
  createChildLogger,
  isLogLevel,
  loadConfig,
  readCatalog,
  resolveUserPath,
} from 'pkglist-shared';
import type { FilterTab, PackageInfo, PartialConfig, PkgListConfig } from 'pkglist-shared';
import { SAMPLE_CATALOG_PATH } from '../sampleCatalog';

export interface GlobalOptions {
  logFile?: string;
  logLevel?: string;
}

export interface CatalogOptions {
  catalog?: string;
  tab?: FilterTab;
  search?: string;
}

/** commander argument parser for `--tab`. */
export function parseTab(value: string): FilterTab {
  const tab = FILTER_TABS.find(t => t === value);
  if (!tab) {
    throw new InvalidArgumentError(`Expected one of ${FILTER_TABS.join(', ')}.`);
  }
  return tab;
}

/** commander argument parser for `--log-level`. */
export function parseLogLevel(value: string): string {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected fatal, error, warn, info, debug, trace or silent.');
  }
  return value;
}

export function toOverrides(global: GlobalOptions, catalog?: string): PartialConfig {
  const overrides: PartialConfig = {};
  if (global.logFile) overrides.logFile = resolveUserPath(global.logFile);
  if (global.logLevel && isLogLevel(global.logLevel)) overrides.logLevel = global.logLevel;
  if (catalog) overrides.catalogPath = catalog;
  return overrides;
}

export interface CommandContext {
  config: PkgListConfig;
  catalogPath: string;
}

/** Load layered config for a command and point the logger at the configured file. */
export async function prepareCommand(cmd: Command, catalog?: string): Promise<CommandContext> {
  const global: GlobalOptions = cmd.optsWithGlobals();
  const config = await loadConfig({ overrides: toOverrides(global, catalog) });
  configureLogger({ level: config.logLevel, file: config.logFile });

  const catalogPath = config.catalogPath ? resolveUserPath(config.catalogPath) : SAMPLE_CATALOG_PATH;
  createChildLogger('cli').info({ command: cmd.name(), catalogPath }, 'command started');
  return { config, catalogPath };
}

/** Loader that re-reads the catalog on every refresh, after the configured delay. */
export function createCatalogLoader(catalogPath: string, delayMs: number): () => Promise<PackageInfo[]> {
  return async () => {
    if (delayMs > 0) await delay(delayMs);
    return readCatalog(catalogPath);
  };
}
