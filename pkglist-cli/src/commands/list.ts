/**
 * `pkglist list`: print the packages of one filter tab without the TUI.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { PackageDatabase, PackageFiltering, PageManager, computeStatusIcon, getPrimaryVersion } from 'pkglist-shared';
import type { FilterTab, PackageInfo, StatusIcon } from 'pkglist-shared';
import { describeInstallState, fitWidth, truncate } from '../browser/formatters';
import { createCatalogLoader, prepareCommand } from './setup';
import type { CatalogOptions } from './setup';

interface ListOptions extends CatalogOptions {
  json?: boolean;
}

const STATUS_COLORS: Record<StatusIcon, (s: string) => string> = {
  none: chalk.dim,
  installed: chalk.green,
  'update-available': chalk.yellow,
  'in-progress': chalk.cyan,
  error: chalk.red,
};

export interface ListedPackage {
  name: string;
  displayName: string;
  source: string;
  version?: string;
  installed?: string;
  status: StatusIcon;
  errors: string[];
}

export function toListedPackage(pkg: PackageInfo): ListedPackage {
  return {
    name: pkg.name,
    displayName: pkg.displayName,
    source: pkg.source,
    version: getPrimaryVersion(pkg)?.version,
    installed: pkg.versions.find(v => v.uniqueId === pkg.installedVersionId)?.version,
    status: computeStatusIcon(pkg),
    errors: pkg.errors,
  };
}

/** Visible packages of the current page, in display order. */
export function visiblePackages(pages: PageManager, database: PackageDatabase): PackageInfo[] {
  return pages.getCurrentPage().visualStates
    .filter(s => s.visible)
    .flatMap(s => {
      const pkg = database.getPackage(s.packageUniqueId);
      return pkg ? [pkg] : [];
    });
}

export function formatListLine(pkg: PackageInfo, width: number): string {
  const status = computeStatusIcon(pkg);
  const name = chalk.bold(fitWidth(pkg.displayName, 28));
  const state = STATUS_COLORS[status](fitWidth(describeInstallState(pkg), 20));
  const description = chalk.dim(truncate(pkg.description, Math.max(0, width - 52)));
  return `${name}  ${state}  ${description}`.trimEnd();
}

function printList(packages: PackageInfo[], tab: FilterTab, searchText: string): void {
  const width = process.stdout.columns || 100;
  const scope = searchText ? `${tab}, search "${searchText}"` : tab;

  if (packages.length === 0) {
    process.stdout.write(chalk.dim(`No packages (${scope}).\n`));
    return;
  }

  process.stdout.write(chalk.bold(`Packages (${packages.length}) · ${scope}\n`));
  process.stdout.write(chalk.dim('─'.repeat(Math.min(width, 80)) + '\n'));
  for (const pkg of packages) {
    process.stdout.write(formatListLine(pkg, width) + '\n');
    for (const error of pkg.errors) {
      process.stdout.write(chalk.red(`  ! ${error}\n`));
    }
  }
}

export async function listAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts: ListOptions = cmd.opts();
  const { catalogPath } = await prepareCommand(cmd, opts.catalog);

  const database = new PackageDatabase();
  const filtering = new PackageFiltering(opts.tab ?? 'in-project', opts.search ?? '');
  const pages = new PageManager({ database, filtering, loader: createCatalogLoader(catalogPath, 0) });
  await pages.refresh();

  const packages = visiblePackages(pages, database);
  if (opts.json) {
    process.stdout.write(JSON.stringify(packages.map(toListedPackage), null, 2) + '\n');
  } else {
    printList(packages, filtering.currentFilterTab, filtering.currentSearchText);
  }

  pages.dispose();
}
