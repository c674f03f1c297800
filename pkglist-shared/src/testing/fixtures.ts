/**
 * Builders and in-process stand-ins shared by the package list tests.
 */

import { PackageList } from '../list/PackageList';
import type { PackageListOptions } from '../list/PackageList';
import type { ListElement } from '../list/PackageItem';
import type { ListHost } from '../list/types';
import { ConnectService } from '../page/ConnectService';
import { ListPreferences } from '../page/ListPreferences';
import { PackageDatabase } from '../page/PackageDatabase';
import { PackageFiltering } from '../page/PackageFiltering';
import { PageManager } from '../page/PageManager';
import { toPackageInfo } from '../readers/catalog';
import type { FilterTab, Page, PackageInfo, PackageSourceKind, PackageVersion, VisualState } from '../types/package';

export interface MakePackageOptions {
  displayName?: string;
  source?: PackageSourceKind;
  versions?: string[];
  installed?: string;
}

export function makePackage(name: string, options: MakePackageOptions = {}): PackageInfo {
  return toPackageInfo({
    name,
    displayName: options.displayName,
    source: options.source ?? 'registry',
    description: '',
    versions: options.versions ?? ['1.0.0'],
    installed: options.installed,
  });
}

export function visualState(packageUniqueId: string, visible = true, expanded = false): VisualState {
  return { packageUniqueId, visible, expanded };
}

export function makePage(
  states: VisualState[],
  tab: FilterTab = 'registry',
  selected: () => PackageVersion | undefined = () => undefined,
): Page {
  const byId = new Map(states.map(s => [s.packageUniqueId, s]));
  return {
    tab,
    visualStates: states,
    getVisualState: id => byId.get(id),
    getSelectedVersion: selected,
  };
}

/** Host whose layout is driven by the test; idle tasks run only when flushed. */
export class FakeHost implements ListHost {
  /** Height reported for elements without an explicit entry; null means not laid out. */
  defaultHeight: number | null = 1;
  readonly heights = new Map<string, number | null>();
  readonly scrolled: string[] = [];
  private _idle: Array<() => void> = [];

  get idleCount(): number {
    return this._idle.length;
  }

  measureHeight(element: ListElement): number | null {
    if (this.heights.has(element.key)) return this.heights.get(element.key) ?? null;
    return this.defaultHeight;
  }

  scrollIntoView(element: ListElement): void {
    this.scrolled.push(element.key);
  }

  requestIdle(task: () => void): void {
    this._idle.push(task);
  }

  /** Run the tasks queued so far; tasks they queue wait for the next call. */
  runIdle(): number {
    const tasks = this._idle;
    this._idle = [];
    for (const task of tasks) task();
    return tasks.length;
  }
}

export interface HarnessOptions {
  tab?: FilterTab;
  searchText?: string;
  loggedIn?: boolean;
  list?: PackageListOptions;
}

export interface ListHarness {
  database: PackageDatabase;
  filtering: PackageFiltering;
  connect: ConnectService;
  preferences: ListPreferences;
  pages: PageManager;
  host: FakeHost;
  list: PackageList;
  /** What the next `pages.refresh()` will load. */
  setCatalog(packages: PackageInfo[]): void;
  entryIds(): string[];
}

/** Wire a PackageList to real page collaborators seeded with `packages`. */
export function createListHarness(packages: PackageInfo[], options: HarnessOptions = {}): ListHarness {
  let catalog = packages;
  const database = new PackageDatabase(packages);
  const filtering = new PackageFiltering(options.tab ?? 'registry', options.searchText ?? '');
  const connect = new ConnectService(options.loggedIn ?? false);
  const preferences = new ListPreferences();
  const pages = new PageManager({ database, filtering, loader: async () => catalog });
  const host = new FakeHost();
  const list = new PackageList(
    { packages: database, pages, filtering, connect, preferences },
    host,
    options.list,
  );

  return {
    database,
    filtering,
    connect,
    preferences,
    pages,
    host,
    list,
    setCatalog: next => {
      catalog = next;
    },
    entryIds: () => list.entries.map(e => e.uniqueId),
  };
}
