declare const __CLI_VERSION__: string;

import { Command } from 'commander';
import chalk from 'chalk';
import { getLogger, isPkgListError } from 'pkglist-shared';
import { parseLogLevel, parseTab } from './commands/setup';

const program = new Command();

program
  .name('pkglist')
  .description('Browse a package catalog from the terminal')
  .version(__CLI_VERSION__)
  .option('--log-file <path>', 'Write structured logs to this file (default: no logs)')
  .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug, trace, silent', parseLogLevel);

// Browse command uses dynamic imports: Ink and React load only when it runs
const browseCmd = new Command('browse')
  .description('Full-screen package browser with live refresh')
  .option('--catalog <path>', 'Catalog file (default: config, PKGLIST_CATALOG, or the bundled sample)')
  .option('--tab <tab>', 'Initial filter tab: in-project, registry, store (default: in-project)', parseTab)
  .option('--search <text>', 'Initial search text')
  .option('--logged-in', 'Start signed in, so the store tab is available')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { browseAction } = await import('./commands/browse');
    return browseAction(_opts, cmd);
  });
program.addCommand(browseCmd);

// List command: one tab of the catalog as text or JSON
const listCmd = new Command('list')
  .description('Print the packages of a filter tab')
  .option('--catalog <path>', 'Catalog file (default: config, PKGLIST_CATALOG, or the bundled sample)')
  .option('--tab <tab>', 'Filter tab: in-project, registry, store (default: in-project)', parseTab)
  .option('--search <text>', 'Only packages whose name contains this text')
  .option('--json', 'Output as JSON')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { listAction } = await import('./commands/list');
    return listAction(_opts, cmd);
  });
program.addCommand(listCmd);

program.parseAsync().catch((err: unknown) => {
  getLogger().error({ err }, 'command failed');
  const message = isPkgListError(err) ? err.toString() : err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`Error: ${message}\n`));
  process.exitCode = 1;
});
