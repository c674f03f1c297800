import { describe, it, expect, vi } from 'vitest';
import {
  MAX_SEARCH_TEXT_TO_DISPLAY,
  STATUS_MESSAGES,
  ViewStateController,
  buildStatusMessage,
  resolveViewMode,
} from './ViewStateController';
import type { ViewModeInputs } from './ViewStateController';
import { ConnectService } from '../page/ConnectService';
import { PackageDatabase } from '../page/PackageDatabase';
import { PackageFiltering } from '../page/PackageFiltering';
import { PageManager } from '../page/PageManager';
import { makePackage } from '../testing/fixtures';

const base: ViewModeInputs = {
  filterTab: 'registry',
  isLoggedIn: false,
  visibleCount: 2,
  isInitialFetchingDone: true,
  isRefreshInProgress: false,
  searchText: '',
};

describe('resolveViewMode', () => {
  it('shows entries when something is visible after the first fetch', () => {
    expect(resolveViewMode(base)).toEqual({ kind: 'entries' });
  });

  it('shows the login prompt on the restricted tab while signed out', () => {
    expect(resolveViewMode({ ...base, filterTab: 'store' })).toEqual({ kind: 'login' });
    expect(resolveViewMode({ ...base, filterTab: 'store', isLoggedIn: true })).toEqual({ kind: 'entries' });
  });

  it('prefers the login prompt over any status message', () => {
    expect(resolveViewMode({ ...base, filterTab: 'store', visibleCount: 0, isRefreshInProgress: true }))
      .toEqual({ kind: 'login' });
  });

  it('shows a status until the first fetch completes, even with visible entries', () => {
    expect(resolveViewMode({ ...base, isInitialFetchingDone: false, isRefreshInProgress: true }))
      .toEqual({ kind: 'status', message: STATUS_MESSAGES.fetching });
    expect(resolveViewMode({ ...base, isInitialFetchingDone: false }))
      .toEqual({ kind: 'status', message: '' });
  });

  it('shows a status when nothing is visible', () => {
    expect(resolveViewMode({ ...base, visibleCount: 0 }))
      .toEqual({ kind: 'status', message: STATUS_MESSAGES.noPackages });
    expect(resolveViewMode({ ...base, visibleCount: 0, isRefreshInProgress: true }))
      .toEqual({ kind: 'status', message: STATUS_MESSAGES.refreshing });
  });

  it('is a pure function of its inputs', () => {
    const inputs = { ...base, visibleCount: 0, searchText: 'abc' };
    expect(resolveViewMode(inputs)).toEqual(resolveViewMode({ ...inputs }));
  });
});

describe('buildStatusMessage', () => {
  it('reports a search with no results', () => {
    expect(buildStatusMessage(false, true, 'lodash')).toBe('No results for "lodash"');
  });

  it('truncates long search text to the display limit', () => {
    const text = 'x'.repeat(MAX_SEARCH_TEXT_TO_DISPLAY + 6);
    expect(buildStatusMessage(false, true, text)).toBe(`No results for "${'x'.repeat(64)}..."`);
  });

  it('keeps search text at exactly the limit intact', () => {
    const text = 'y'.repeat(MAX_SEARCH_TEXT_TO_DISPLAY);
    expect(buildStatusMessage(false, true, text)).toBe(`No results for "${text}"`);
  });

  it('says fetching before the first fetch and refreshing afterwards', () => {
    expect(buildStatusMessage(true, false, 'abc')).toBe('Fetching packages...');
    expect(buildStatusMessage(true, true, 'abc')).toBe('Refreshing packages...');
  });

  it('is empty before the first fetch when idle and not searching', () => {
    expect(buildStatusMessage(false, false, '')).toBe('');
  });
});

describe('ViewStateController', () => {
  function setup(searchText = '') {
    const database = new PackageDatabase([
      makePackage('alpha', { versions: ['2.0.0', '1.0.0'] }),
      makePackage('beta'),
    ]);
    const filtering = new PackageFiltering('registry', searchText);
    const connect = new ConnectService(false);
    const pages = new PageManager({ database, filtering, loader: async () => database.all() });
    const scroll = vi.fn();
    const controller = new ViewStateController({ packages: database, pages, filtering, connect }, scroll);
    return { database, filtering, connect, pages, scroll, controller };
  }

  it('selects the first visible package when entering entries mode', async () => {
    const { pages, controller, scroll } = setup();
    await pages.refresh();

    expect(controller.evaluate(true)).toEqual({ kind: 'entries' });
    expect(pages.getSelectedVersion()?.uniqueId).toBe('alpha@2.0.0');
    expect(scroll).toHaveBeenCalledTimes(1);
  });

  it('restores the version remembered on the visual state when auto-selecting', async () => {
    const { database, pages, controller } = setup();
    await pages.refresh();
    const alpha = database.getPackageAndVersion('alpha', 'alpha@1.0.0');
    pages.setSelected(alpha.package, alpha.version);
    pages.clearSelection();

    controller.evaluate(false);

    expect(pages.getSelectedVersion()?.uniqueId).toBe('alpha@1.0.0');
  });

  it('keeps a selection that is still visible', async () => {
    const { database, pages, controller } = setup();
    await pages.refresh();
    const beta = database.getPackageAndVersion('beta');
    pages.setSelected(beta.package, beta.version, true);

    controller.evaluate(false);

    expect(pages.getSelectedVersion()?.uniqueId).toBe('beta@1.0.0');
  });

  it('clears the selection outside entries mode', async () => {
    const { database, filtering, pages, controller } = setup();
    await pages.refresh();
    const beta = database.getPackageAndVersion('beta');
    pages.setSelected(beta.package, beta.version);

    filtering.currentSearchText = 'nothing-matches';
    const mode = controller.evaluate(true);

    expect(mode).toEqual({ kind: 'status', message: 'No results for "nothing-matches"' });
    expect(pages.getSelectedVersion()).toBeUndefined();
  });

  it('does not scroll unless entries are shown', () => {
    const { controller, scroll } = setup();

    controller.evaluate(true);

    expect(controller.mode).toEqual({ kind: 'status', message: '' });
    expect(scroll).not.toHaveBeenCalled();
  });

  it('announces mode changes once', async () => {
    const { pages, controller } = setup();
    const modes: string[] = [];
    controller.onDidChangeMode(mode => modes.push(mode.kind));
    await pages.refresh();

    controller.evaluate(false);
    controller.evaluate(false);

    expect(modes).toEqual(['entries']);
  });
});
