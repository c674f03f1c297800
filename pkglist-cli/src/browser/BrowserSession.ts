/**
 * Wires the package list to its page collaborators and the terminal host,
 * and exposes what the Ink components draw as a single snapshot.
 */

import {
  ConnectService,
  DisposableStore,
  Emitter,
  ListPreferences,
  PackageDatabase,
  PackageFiltering,
  PackageList,
  PageManager,
  createChildLogger,
} from 'pkglist-shared';
import type { Event, FilterTab, ListKey, Logger, PackageInfo, ViewMode } from 'pkglist-shared';
import { nextProgress } from './formatters';
import { InkListHost } from './InkListHost';
import type { InkListHostOptions } from './InkListHost';
import { buildRows } from './rows';
import type { BrowserRow } from './rows';

export interface BrowserSessionOptions<TNode> {
  loader: () => Promise<PackageInfo[]>;
  tab?: FilterTab;
  searchText?: string;
  loggedIn?: boolean;
  scrollRetryLimit?: number;
  host: InkListHostOptions<TNode>;
  logger?: Logger;
}

export interface BrowserSnapshot {
  mode: ViewMode;
  tab: FilterTab;
  searchText: string;
  loggedIn: boolean;
  refreshing: boolean;
  rows: readonly BrowserRow[];
  windowRows: readonly BrowserRow[];
  offset: number;
  selectedKey?: string;
  entryCount: number;
  itemsPerPage: number;
  error?: string;
}

export class BrowserSession<TNode> {
  readonly database = new PackageDatabase();
  readonly filtering: PackageFiltering;
  readonly connect: ConnectService;
  readonly preferences = new ListPreferences();
  readonly pages: PageManager;
  readonly host: InkListHost<TNode>;
  readonly list: PackageList;

  private readonly _log: Logger;
  private readonly _subscriptions = new DisposableStore();
  private _error: string | undefined;

  private readonly _onDidChange = new Emitter<void>();
  /** Fired whenever the snapshot may have changed. */
  readonly onDidChange: Event<void> = this._onDidChange.event;

  constructor(options: BrowserSessionOptions<TNode>) {
    this._log = options.logger ?? createChildLogger('browser');
    this.filtering = new PackageFiltering(options.tab, options.searchText);
    this.connect = new ConnectService(options.loggedIn);
    this.pages = new PageManager({ database: this.database, filtering: this.filtering, loader: options.loader });
    this.host = new InkListHost(options.host);
    this.list = new PackageList(
      {
        packages: this.database,
        pages: this.pages,
        filtering: this.filtering,
        connect: this.connect,
        preferences: this.preferences,
      },
      this.host,
      { scrollRetryLimit: options.scrollRetryLimit, logger: this._log },
    );
    this.host.bindRows(() => buildRows(this.list.entries));

    this._subscriptions.add(this.list.onDidChange(() => this.syncRows()));
    this._subscriptions.add(this.list.onDidChangeMode(() => this._onDidChange.fire()));
    this._subscriptions.add(this.host.onDidScroll(() => this._onDidChange.fire()));
    this._subscriptions.add(this.pages.onSelectionChange(version => {
      this._log.debug({ version: version?.uniqueId }, 'selection changed');
      this._onDidChange.fire();
    }));
    this._subscriptions.add(this.preferences.onDidChange(itemsPerPage => {
      this._log.debug({ itemsPerPage }, 'items per page changed');
      this._onDidChange.fire();
    }));
    // Signing in is simulated: a login request succeeds immediately
    this._subscriptions.add(this.connect.onLoginRequested(() => this.connect.setLoggedIn(true)));
  }

  /** Attach the list and kick off the first fetch. */
  start(): void {
    this.list.activate();
    this.requestRefresh();
  }

  requestRefresh(): void {
    this.pages.refresh().then(
      () => {
        if (this._error === undefined) return;
        this._error = undefined;
        this._onDidChange.fire();
      },
      (err: unknown) => {
        this._error = err instanceof Error ? err.message : String(err);
        this._onDidChange.fire();
      },
    );
  }

  setViewportHeight(height: number): void {
    this.host.setViewportHeight(height);
    this.list.onGeometryChange(height);
  }

  handleKey(key: ListKey): boolean {
    return this.list.handleKey(key);
  }

  cycleTab(direction: 1 | -1 = 1): void {
    this.filtering.cycleTab(direction);
  }

  setSearchText(text: string): void {
    this.filtering.currentSearchText = text;
  }

  toggleLogin(): void {
    this.connect.setLoggedIn(!this.connect.isUserLoggedIn);
    this._onDidChange.fire();
  }

  requestLogin(): void {
    if (this.list.viewMode.kind !== 'login') return;
    this.list.requestLogin();
  }

  /** Step the selected package through the demo progress states. */
  cycleSelectedProgress(): void {
    const pkg = this.list.getSelectedItem()?.package;
    if (!pkg) return;
    const next = nextProgress(pkg.progress);
    this._log.debug({ package: pkg.uniqueId, progress: next }, 'progress changed');
    this.database.setProgress(pkg.uniqueId, next);
  }

  snapshot(): BrowserSnapshot {
    return {
      mode: this.list.viewMode,
      tab: this.filtering.currentFilterTab,
      searchText: this.filtering.currentSearchText,
      loggedIn: this.connect.isUserLoggedIn,
      refreshing: this.pages.isRefreshInProgress(),
      rows: this.host.rows,
      windowRows: this.host.windowRows,
      offset: this.host.offset,
      selectedKey: this.list.getSelectedItem()?.element.key,
      entryCount: this.list.entries.length,
      itemsPerPage: this.preferences.numItemsPerPage,
      error: this._error,
    };
  }

  dispose(): void {
    this._subscriptions.dispose();
    this.list.dispose();
    this.pages.dispose();
    this.host.dispose();
    this.database.dispose();
    this.filtering.dispose();
    this.connect.dispose();
    this.preferences.dispose();
    this._onDidChange.dispose();
  }

  private syncRows(): void {
    this.host.syncRows();
    this._onDidChange.fire();
  }
}
