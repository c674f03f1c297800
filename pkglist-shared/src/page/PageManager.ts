/**
 * Builds the page for the current filter tab and search text, owns the
 * selection, and emits the change notifications the package list consumes.
 */

import { DisposableStore, Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import { createChildLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import type { ListUpdate, PageSource } from '../types/collaborators';
import { getPrimaryVersion } from '../types/package';
import type { FilterTab, Page, PackageInfo, PackageVersion, VisualState } from '../types/package';
import type { PackageDatabase } from './PackageDatabase';
import type { PackageFiltering } from './PackageFiltering';

export type PackageLoader = () => Promise<PackageInfo[]>;

interface StoredState {
  selectedVersionId?: string;
  expanded: boolean;
}

interface SelectionRef {
  packageUniqueId: string;
  versionId?: string;
}

class PageModel implements Page {
  private readonly _byId: Map<string, VisualState>;

  constructor(
    readonly tab: FilterTab,
    readonly visualStates: readonly VisualState[],
    private readonly _selected: () => PackageVersion | undefined,
  ) {
    this._byId = new Map(visualStates.map(s => [s.packageUniqueId, s]));
  }

  getVisualState(packageUniqueId: string): VisualState | undefined {
    return this._byId.get(packageUniqueId);
  }

  getSelectedVersion(): PackageVersion | undefined {
    return this._selected();
  }

  get ids(): string[] {
    return this.visualStates.map(s => s.packageUniqueId);
  }
}

export function belongsToTab(pkg: PackageInfo, tab: FilterTab): boolean {
  switch (tab) {
    case 'in-project': return pkg.installedVersionId !== undefined;
    case 'registry': return pkg.source === 'registry' || pkg.source === 'builtin';
    case 'store': return pkg.source === 'store';
  }
}

export function matchesSearch(pkg: PackageInfo, searchText: string): boolean {
  const needle = searchText.trim().toLowerCase();
  if (!needle) return true;
  return pkg.name.toLowerCase().includes(needle) || pkg.displayName.toLowerCase().includes(needle);
}

function compareByDisplayName(a: PackageInfo, b: PackageInfo): number {
  return a.displayName.localeCompare(b.displayName) || a.uniqueId.localeCompare(b.uniqueId);
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

export interface PageManagerOptions {
  database: PackageDatabase;
  filtering: PackageFiltering;
  loader: PackageLoader;
  logger?: Logger;
}

export class PageManager implements PageSource {
  private readonly _database: PackageDatabase;
  private readonly _filtering: PackageFiltering;
  private readonly _loader: PackageLoader;
  private readonly _log: Logger;
  private readonly _subscriptions = new DisposableStore();

  private readonly _states = new Map<string, StoredState>();
  private _page: PageModel;
  private _selection: SelectionRef | undefined;
  private _explicitSelection = false;
  private _initialFetchingDone = false;
  private _refreshing: Promise<void> | undefined;

  private readonly _onRefreshOperationStart = new Emitter<void>();
  readonly onRefreshOperationStart: Event<void> = this._onRefreshOperationStart.event;
  private readonly _onRefreshOperationFinish = new Emitter<void>();
  readonly onRefreshOperationFinish: Event<void> = this._onRefreshOperationFinish.event;
  private readonly _onVisualStateChange = new Emitter<readonly VisualState[]>();
  readonly onVisualStateChange: Event<readonly VisualState[]> = this._onVisualStateChange.event;
  private readonly _onListRebuild = new Emitter<Page>();
  readonly onListRebuild: Event<Page> = this._onListRebuild.event;
  private readonly _onListUpdate = new Emitter<ListUpdate>();
  readonly onListUpdate: Event<ListUpdate> = this._onListUpdate.event;
  private readonly _onSelectionChange = new Emitter<PackageVersion | undefined>();
  readonly onSelectionChange: Event<PackageVersion | undefined> = this._onSelectionChange.event;

  constructor(options: PageManagerOptions) {
    this._database = options.database;
    this._filtering = options.filtering;
    this._loader = options.loader;
    this._log = options.logger ?? createChildLogger('page-manager');
    this._page = this.buildPage();

    this._subscriptions.add(this._filtering.onFilterTabChange(() => this.rebuild()));
    this._subscriptions.add(this._filtering.onSearchTextChange(() => this.applySearch()));
  }

  getCurrentPage(): Page {
    return this._page;
  }

  isInitialFetchingDone(): boolean {
    return this._initialFetchingDone;
  }

  isRefreshInProgress(): boolean {
    return this._refreshing !== undefined;
  }

  // ── Selection ──

  getSelectedVersion(): PackageVersion | undefined {
    if (!this._selection) return undefined;
    const { package: pkg, version } = this._database.getPackageAndVersion(
      this._selection.packageUniqueId,
      this._selection.versionId,
    );
    return pkg ? version : undefined;
  }

  /** Whether the current selection came from the user rather than an automatic pick. */
  isExplicitSelection(): boolean {
    return this._selection !== undefined && this._explicitSelection;
  }

  setSelected(pkg: PackageInfo | undefined, version?: PackageVersion, isExplicitSelection = false): void {
    if (!pkg) {
      this.clearSelection();
      return;
    }
    const versionId = (version ?? getPrimaryVersion(pkg))?.uniqueId;
    const unchanged = this._selection?.packageUniqueId === pkg.uniqueId && this._selection.versionId === versionId;
    this._selection = { packageUniqueId: pkg.uniqueId, versionId };
    this._explicitSelection = isExplicitSelection;
    this.storedState(pkg.uniqueId).selectedVersionId = versionId;
    const current = this._page.getVisualState(pkg.uniqueId);
    if (current && current.selectedVersionId !== versionId) {
      this.replaceState({ ...current, selectedVersionId: versionId });
    }
    if (!unchanged) this._onSelectionChange.fire(this.getSelectedVersion());
  }

  clearSelection(): void {
    if (!this._selection) return;
    this._selection = undefined;
    this._explicitSelection = false;
    this._onSelectionChange.fire(undefined);
  }

  setExpanded(packageUniqueId: string, expanded: boolean): void {
    const stored = this.storedState(packageUniqueId);
    if (stored.expanded === expanded) return;
    stored.expanded = expanded;

    const current = this._page.getVisualState(packageUniqueId);
    if (!current) return;
    const next: VisualState = { ...current, expanded };
    this.replaceState(next);
    this._onVisualStateChange.fire([next]);
  }

  // ── Page changes ──

  /** Reload packages through the loader and publish the difference. */
  refresh(): Promise<void> {
    if (this._refreshing) return this._refreshing;
    const run = this.runRefresh().finally(() => {
      this._refreshing = undefined;
      this._onRefreshOperationFinish.fire();
    });
    this._refreshing = run;
    this._onRefreshOperationStart.fire();
    return run;
  }

  /** Rebuild the whole page for the current tab and announce it. */
  rebuild(): void {
    this._page = this.buildPage();
    this._log.debug({ tab: this._page.tab, packages: this._page.visualStates.length }, 'page rebuilt');
    this._onListRebuild.fire(this._page);
  }

  dispose(): void {
    this._subscriptions.dispose();
    this._onRefreshOperationStart.dispose();
    this._onRefreshOperationFinish.dispose();
    this._onVisualStateChange.dispose();
    this._onListRebuild.dispose();
    this._onListUpdate.dispose();
    this._onSelectionChange.dispose();
  }

  private async runRefresh(): Promise<void> {
    let packages: PackageInfo[];
    try {
      packages = await this._loader();
    } catch (err) {
      this._log.error({ err }, 'package refresh failed');
      throw err;
    }

    const previous = this._page;
    const diff = this._database.setPackages(packages);
    const next = this.buildPage();
    this._page = next;
    this._initialFetchingDone = true;

    const nextIds = new Set(next.ids);
    const previousIds = new Set(previous.ids);
    // Page order, so appended entries already sit where the page wants them
    const changed = new Map([...diff.added, ...diff.updated].map(p => [p.uniqueId, p]));
    const addedOrUpdated = next.ids.flatMap(id => {
      const pkg = changed.get(id);
      return pkg ? [pkg] : [];
    });
    const removedById = new Map(diff.removed.map(p => [p.uniqueId, p]));
    const removed: PackageInfo[] = [];
    for (const id of previous.ids) {
      if (nextIds.has(id)) continue;
      const pkg = removedById.get(id) ?? this._database.getPackage(id);
      if (pkg) removed.push(pkg);
    }

    // New entries are appended; anything else out of place needs a reorder
    const expected = [
      ...previous.ids.filter(id => nextIds.has(id)),
      ...next.ids.filter(id => !previousIds.has(id)),
    ];
    const reorder = !sameSequence(expected, next.ids);

    this._log.info({
      added: diff.added.length,
      updated: diff.updated.length,
      removed: removed.length,
      reorder,
    }, 'packages refreshed');

    if (addedOrUpdated.length > 0 || removed.length > 0 || reorder) {
      this._onListUpdate.fire({ page: next, addedOrUpdated, removed, reorder });
    }
  }

  private applySearch(): void {
    const next = this.buildPage();
    const changed = next.visualStates.filter(s => this._page.getVisualState(s.packageUniqueId)?.visible !== s.visible);
    this._page = next;
    this._log.debug({ searchText: this._filtering.currentSearchText, changed: changed.length }, 'search applied');
    if (changed.length > 0) this._onVisualStateChange.fire(changed);
  }

  private buildPage(): PageModel {
    const tab = this._filtering.currentFilterTab;
    const searchText = this._filtering.currentSearchText;
    const states = this._database.all()
      .filter(pkg => belongsToTab(pkg, tab))
      .sort(compareByDisplayName)
      .map((pkg): VisualState => {
        const stored = this._states.get(pkg.uniqueId);
        return {
          packageUniqueId: pkg.uniqueId,
          selectedVersionId: stored?.selectedVersionId,
          visible: matchesSearch(pkg, searchText),
          expanded: stored?.expanded ?? false,
        };
      });
    return new PageModel(tab, states, () => this.getSelectedVersion());
  }

  private replaceState(next: VisualState): void {
    this._page = new PageModel(
      this._page.tab,
      this._page.visualStates.map(s => (s.packageUniqueId === next.packageUniqueId ? next : s)),
      () => this.getSelectedVersion(),
    );
  }

  private storedState(packageUniqueId: string): StoredState {
    let stored = this._states.get(packageUniqueId);
    if (!stored) {
      stored = { expanded: false };
      this._states.set(packageUniqueId, stored);
    }
    return stored;
  }
}
