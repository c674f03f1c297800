import { describe, it, expect, vi } from 'vitest';
import { makePackage } from 'pkglist-shared/testing';
import type { FilterTab, PackageInfo } from 'pkglist-shared';
import { BrowserSession } from './BrowserSession';

interface FakeNode {
  height: number;
}

interface SetupOptions {
  tab?: FilterTab;
  loggedIn?: boolean;
  loader?: () => Promise<PackageInfo[]>;
}

function setup(packages: PackageInfo[], options: SetupOptions = {}) {
  const idle: Array<() => void> = [];
  const session = new BrowserSession<FakeNode>({
    loader: options.loader ?? (async () => packages),
    tab: options.tab ?? 'registry',
    loggedIn: options.loggedIn,
    host: {
      measure: node => node,
      schedule: task => { idle.push(task); },
    },
  });
  const flushIdle = () => {
    const tasks = idle.splice(0);
    for (const task of tasks) task();
  };
  return { session, idle, flushIdle };
}

const sixPackages = () => ['alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta'].map(n => makePackage(n));

describe('BrowserSession', () => {
  it('shows the fetched packages as rows with the first one selected', async () => {
    const { session } = setup(sixPackages());
    session.start();
    await session.pages.refresh();

    const snap = session.snapshot();
    expect(snap.mode).toEqual({ kind: 'entries' });
    expect(snap.rows.map(r => r.key)).toEqual([
      'package:alpha',
      'package:beta',
      'package:delta',
      'package:epsilon',
      'package:gamma',
      'package:zeta',
    ]);
    expect(snap.selectedKey).toBe('package:alpha');
    expect(snap.entryCount).toBe(6);
  });

  it('scrolls the window to follow the keyboard selection', async () => {
    const { session, flushIdle } = setup(sixPackages());
    session.setViewportHeight(3);
    session.host.markLaidOut();
    session.start();
    await session.pages.refresh();
    flushIdle();

    for (let i = 0; i < 4; i++) session.handleKey('down');

    const snap = session.snapshot();
    expect(snap.selectedKey).toBe('package:gamma');
    expect(snap.offset).toBe(2);
    expect(snap.windowRows.map(r => r.key)).toEqual(['package:delta', 'package:epsilon', 'package:gamma']);
  });

  it('keeps the selection in the window when a search drops rows above it', async () => {
    const names = ['apple', 'apricot', 'avocado', 'banana', 'blueberry', 'boysenberry', 'breadfruit', 'butternut'];
    const { session, flushIdle } = setup(names.map(n => makePackage(n)));
    session.setViewportHeight(3);
    session.host.markLaidOut();
    session.start();
    await session.pages.refresh();
    flushIdle();

    for (let i = 0; i < 4; i++) session.handleKey('down');
    expect(session.snapshot().selectedKey).toBe('package:blueberry');
    expect(session.snapshot().offset).toBe(2);

    session.setSearchText('b');
    flushIdle();

    const snap = session.snapshot();
    expect(snap.selectedKey).toBe('package:blueberry');
    expect(snap.offset).toBe(1);
    expect(snap.windowRows.map(r => r.key)).toEqual([
      'package:blueberry',
      'package:boysenberry',
      'package:breadfruit',
    ]);
  });

  it('defers scrolling until the first layout and honours only the latest request', async () => {
    const { session, idle, flushIdle } = setup(sixPackages());
    session.setViewportHeight(2);
    session.start();
    await session.pages.refresh();

    session.handleKey('down');
    session.handleKey('down');
    session.handleKey('down');
    expect(session.snapshot().offset).toBe(0);
    expect(idle.length).toBeGreaterThan(0);

    session.host.markLaidOut();
    flushIdle();

    expect(session.snapshot().offset).toBe(2);
    expect(session.snapshot().selectedKey).toBe('package:epsilon');
  });

  it('reports the items per page from the viewport height', () => {
    const { session } = setup([]);
    const changed = vi.fn();
    session.onDidChange(changed);

    session.setViewportHeight(12);

    expect(session.preferences.numItemsPerPage).toBe(12);
    expect(session.snapshot().itemsPerPage).toBe(12);
    expect(changed).toHaveBeenCalledTimes(1);
  });

  it('announces a selection made outside the list', async () => {
    const { session } = setup(sixPackages());
    session.start();
    await session.pages.refresh();
    const changed = vi.fn();
    session.onDidChange(changed);

    session.pages.setSelected(session.database.getPackage('beta'));

    expect(changed).toHaveBeenCalledTimes(1);
    expect(session.snapshot().selectedKey).toBe('package:beta');
  });

  it('signs in from the login prompt', async () => {
    const { session } = setup([makePackage('vault', { source: 'store' })], { tab: 'store' });
    session.start();
    await session.pages.refresh();
    expect(session.snapshot().mode).toEqual({ kind: 'login' });

    session.requestLogin();

    const snap = session.snapshot();
    expect(snap.loggedIn).toBe(true);
    expect(snap.mode).toEqual({ kind: 'entries' });
    expect(snap.selectedKey).toBe('package:vault');
  });

  it('shows the no-results status for a search that matches nothing', async () => {
    const { session } = setup(sixPackages());
    session.start();
    await session.pages.refresh();

    session.setSearchText('zzz');

    const snap = session.snapshot();
    expect(snap.mode).toEqual({ kind: 'status', message: 'No results for "zzz"' });
    expect(snap.rows).toEqual([]);
    expect(snap.selectedKey).toBeUndefined();
  });

  it('expands the selected package into version rows', async () => {
    const { session } = setup([makePackage('alpha', { versions: ['2.0.0', '1.0.0'] }), makePackage('beta')]);
    session.start();
    await session.pages.refresh();

    session.handleKey('right');

    expect(session.snapshot().rows.map(r => r.key)).toEqual([
      'package:alpha',
      'version:alpha@1.0.0',
      'package:beta',
    ]);
  });

  it('steps the selected package through progress states', async () => {
    const { session } = setup(sixPackages());
    session.start();
    await session.pages.refresh();

    session.cycleSelectedProgress();

    expect(session.database.getPackage('alpha')?.progress).toBe('downloading');
    expect(session.list.getEntry('alpha')?.statusIcon).toBe('in-progress');
  });

  it('rebuilds the rows on a tab change', async () => {
    const { session } = setup([makePackage('alpha', { installed: '1.0.0' }), makePackage('beta')]);
    session.start();
    await session.pages.refresh();

    session.cycleTab(-1);

    expect(session.snapshot().tab).toBe('in-project');
    expect(session.snapshot().rows.map(r => r.key)).toEqual(['package:alpha']);
  });

  it('surfaces a failed refresh as an error message', async () => {
    const { session } = setup([], {
      loader: async () => {
        throw new Error('catalog unavailable');
      },
    });
    session.start();

    await expect(session.pages.refresh()).rejects.toThrow('catalog unavailable');

    expect(session.snapshot().error).toBe('catalog unavailable');
    expect(session.snapshot().refreshing).toBe(false);
  });
});
