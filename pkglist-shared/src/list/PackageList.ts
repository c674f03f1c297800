/**
 * Live package list: keeps its entries in step with the page, picks the
 * display mode, and moves the keyboard selection.
 *
 * Handlers are attached by `activate()` and released by `deactivate()`; all
 * registry mutation happens synchronously inside those handlers.
 */

import { DisposableStore, Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import { createChildLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import type {
  ConnectSource,
  FilterSource,
  ItemsPerPageSink,
  ListUpdate,
  PackageSource,
  PageSource,
} from '../types/collaborators';
import { isRestrictedTab } from '../types/package';
import type { Page, PackageInfo, VisualState } from '../types/package';
import { EntryRegistry } from './EntryRegistry';
import { PackageItem } from './PackageItem';
import type { Selectable } from './PackageItem';
import { Reconciler } from './Reconciler';
import type { PackageRegistry } from './Reconciler';
import { DEFAULT_SCROLL_RETRY_LIMIT, ScrollIntoView } from './ScrollIntoView';
import { SelectionNavigator } from './SelectionNavigator';
import type { ListHost, ListKey, ViewMode } from './types';
import { ViewStateController } from './ViewStateController';

/** Fixed height of one entry row, in host units (terminal rows for the CLI). */
export const DEFAULT_ENTRY_HEIGHT = 1;

export interface PackageListCollaborators {
  packages: PackageSource;
  pages: PageSource;
  filtering: FilterSource;
  connect: ConnectSource;
  preferences: ItemsPerPageSink;
}

export interface PackageListOptions {
  entryHeight?: number;
  scrollRetryLimit?: number;
  logger?: Logger;
}

export type ListChangeReason =
  | 'rebuild'
  | 'update'
  | 'visual-state'
  | 'progress'
  | 'refresh-operation'
  | 'login'
  | 'selection'
  | 'expansion';

export class PackageList {
  private readonly _registry: PackageRegistry = new EntryRegistry<PackageInfo, PackageItem>(pkg => new PackageItem(pkg));
  private readonly _subscriptions = new DisposableStore();
  private readonly _reconciler: Reconciler;
  private readonly _viewState: ViewStateController;
  private readonly _navigator: SelectionNavigator;
  private readonly _scroller: ScrollIntoView;
  private readonly _entryHeight: number;
  private readonly _log: Logger;
  private _active = false;

  private readonly _onDidChange = new Emitter<ListChangeReason>();
  /** Fired after any pass that may have changed what a renderer shows. */
  readonly onDidChange: Event<ListChangeReason> = this._onDidChange.event;

  constructor(
    private readonly _collaborators: PackageListCollaborators,
    host: ListHost,
    options: PackageListOptions = {},
  ) {
    this._log = options.logger ?? createChildLogger('package-list');
    this._entryHeight = options.entryHeight ?? DEFAULT_ENTRY_HEIGHT;
    this._scroller = new ScrollIntoView(host, this._log, options.scrollRetryLimit ?? DEFAULT_SCROLL_RETRY_LIMIT);
    this._navigator = new SelectionNavigator(this._registry, _collaborators.pages, this._scroller);
    this._viewState = new ViewStateController(_collaborators, () => this._navigator.scrollToSelection());
    this._reconciler = new Reconciler(
      this._registry,
      _collaborators.packages,
      updateScrollPosition => this.refreshList(updateScrollPosition),
      this._log,
    );
  }

  get isActive(): boolean {
    return this._active;
  }

  get viewMode(): ViewMode {
    return this._viewState.mode;
  }

  readonly onDidChangeMode: Event<ViewMode> = listener => this._viewState.onDidChangeMode(listener);

  /** Materialized entries in display order. */
  get entries(): PackageItem[] {
    return this._registry.all();
  }

  getEntry(uniqueId: string | undefined): PackageItem | undefined {
    return this._registry.get(uniqueId);
  }

  activate(): void {
    if (this._active) return;
    this._active = true;

    const { packages, pages, connect } = this._collaborators;
    this._subscriptions.add(packages.onPackageProgressUpdate(pkg => this.handlePackageProgressUpdate(pkg)));
    this._subscriptions.add(pages.onRefreshOperationStart(() => this.handleRefreshOperation()));
    this._subscriptions.add(pages.onRefreshOperationFinish(() => this.handleRefreshOperation()));
    this._subscriptions.add(pages.onVisualStateChange(states => this.handleVisualStateChange(states)));
    this._subscriptions.add(pages.onListRebuild(page => this.handleListRebuild(page)));
    this._subscriptions.add(pages.onListUpdate(update => this.handleListUpdate(update)));
    this._subscriptions.add(connect.onUserLoginStateChange(loggedIn => this.handleUserLoginStateChange(loggedIn)));

    this._log.debug('activated');
    // Build the entries once up front so the view reflects the current page
    this.handleListRebuild(pages.getCurrentPage());
  }

  deactivate(): void {
    if (!this._active) return;
    this._active = false;
    this._subscriptions.dispose();
    this._scroller.cancel();
    this._log.debug('deactivated');
  }

  dispose(): void {
    this.deactivate();
    this._viewState.dispose();
    this._onDidChange.dispose();
  }

  // ── Host surface ──

  selectBy(delta: number): boolean {
    const moved = this._navigator.selectBy(delta);
    if (moved) this._onDidChange.fire('selection');
    return moved;
  }

  getSelectableItems(): Selectable[] {
    return this._navigator.getSelectableItems();
  }

  getSelectedItem(): Selectable | undefined {
    return this._navigator.getSelectedItem();
  }

  /**
   * Arrow-key handling while the entries are shown. Returns true when the key
   * was consumed and must not propagate further.
   */
  handleKey(key: ListKey): boolean {
    if (this._viewState.mode.kind !== 'entries') return false;

    switch (key) {
      case 'right':
      case 'left':
        this._navigator.setSelectedItemExpanded(key === 'right');
        this._onDidChange.fire('expansion');
        return true;
      case 'up':
        return this.selectBy(-1);
      case 'down':
        return this.selectBy(1);
    }
  }

  onFocusGained(): void {
    this._navigator.scrollToSelection();
  }

  /** Recompute how many entries fit; a NaN height means layout has not happened yet. */
  onGeometryChange(containerHeight: number): void {
    if (Number.isNaN(containerHeight)) return;
    this._collaborators.preferences.numItemsPerPage = Math.floor(containerHeight / this._entryHeight);
  }

  requestLogin(): void {
    this._collaborators.connect.showLogin();
  }

  // ── Event handlers ──

  private handlePackageProgressUpdate(pkg: PackageInfo): void {
    const item = this._registry.get(pkg.uniqueId);
    if (!item) return;
    item.updateStatusIcon();
    this._onDidChange.fire('progress');
  }

  private handleRefreshOperation(): void {
    this.refreshList(false);
    this._onDidChange.fire('refresh-operation');
  }

  private handleVisualStateChange(states: readonly VisualState[]): void {
    if (states.length === 0) return;
    this._reconciler.onVisualStateChange(states);
    this._onDidChange.fire('visual-state');
  }

  private handleListRebuild(page: Page): void {
    this._reconciler.onRebuild(page);
    this._onDidChange.fire('rebuild');
  }

  private handleListUpdate(update: ListUpdate): void {
    this._reconciler.onUpdate(update);
    this._onDidChange.fire('update');
  }

  private handleUserLoginStateChange(loggedIn: boolean): void {
    if (!isRestrictedTab(this._collaborators.filtering.currentFilterTab)) return;
    this._log.debug({ loggedIn }, 'login state changed on restricted tab');
    this.refreshList(false);
    this._onDidChange.fire('login');
  }

  private refreshList(updateScrollPosition: boolean): void {
    this._viewState.evaluate(updateScrollPosition);
  }
}
