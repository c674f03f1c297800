/**
 * `pkglist browse`: full-screen package browser.
 * Uses Ink (React for the terminal) for rendering.
 */

import React from 'react';
import type { Command } from 'commander';
import type { DOMElement } from 'ink';
import { createChildLogger } from 'pkglist-shared';
import { BrowserSession } from '../browser/BrowserSession';
import { PackageBrowser } from '../browser/ink/PackageBrowser';
import { createCatalogLoader, prepareCommand } from './setup';
import type { CatalogOptions } from './setup';

interface BrowseOptions extends CatalogOptions {
  loggedIn?: boolean;
}

export async function browseAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts: BrowseOptions = cmd.opts();
  const { config, catalogPath } = await prepareCommand(cmd, opts.catalog);
  const log = createChildLogger('browse');

  // ── Render with Ink ──
  const { render, measureElement } = await import('ink');

  const session = new BrowserSession<DOMElement>({
    loader: createCatalogLoader(catalogPath, config.refreshDelayMs),
    tab: opts.tab,
    searchText: opts.search,
    loggedIn: opts.loggedIn,
    scrollRetryLimit: config.scrollRetryLimit,
    host: { measure: measureElement },
  });

  const instance = render(React.createElement(PackageBrowser, { session }));
  session.start();
  log.info({ tab: session.filtering.currentFilterTab }, 'browser started');

  // Cleanup handler
  let stopped = false;
  function cleanup() {
    if (stopped) return;
    stopped = true;
    session.dispose();
    log.info('browser stopped');
  }
  process.on('SIGINT', () => instance.unmount());
  process.on('SIGTERM', () => instance.unmount());

  // Wait for exit
  await instance.waitUntilExit();
  cleanup();
}
