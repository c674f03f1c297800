/**
 * Applies page change notifications to the entry registry.
 *
 * Display order only ever comes from `page.visualStates` (full rebuild or an
 * explicit reorder) or is kept from the registry; the arrival order of updated
 * packages is never used.
 */

import type { Logger } from '../logging/logger';
import type { ListUpdate, PackageSource } from '../types/collaborators';
import type { Page, PackageInfo, VisualState } from '../types/package';
import type { EntryRegistry } from './EntryRegistry';
import type { PackageItem } from './PackageItem';

export type PackageRegistry = EntryRegistry<PackageInfo, PackageItem>;

/** Called once per pass that needs the view re-evaluated. */
export type RefreshRequest = (updateScrollPosition: boolean) => void;

export class Reconciler {
  constructor(
    private readonly _registry: PackageRegistry,
    private readonly _packages: PackageSource,
    private readonly _refresh: RefreshRequest,
    private readonly _log: Logger,
  ) {}

  /** Baseline resynchronization: drop everything and rebuild in page order. */
  onRebuild(page: Page): void {
    this._registry.clear();

    let unresolved = 0;
    for (const state of page.visualStates) {
      const pkg = this._packages.getPackage(state.packageUniqueId);
      if (!pkg) {
        unresolved++;
        continue;
      }
      this._registry.upsert(pkg).updateVisualState(state);
    }

    this._log.debug({ entries: this._registry.size, unresolved }, 'list rebuilt');
    this._refresh(true);
  }

  onUpdate(update: ListUpdate): void {
    const { page, reorder } = update;
    const removed = update.removed ?? [];
    const addedOrUpdated = update.addedOrUpdated ?? [];

    let count = this._registry.size;
    for (const pkg of removed) {
      this._registry.remove(pkg.uniqueId);
    }
    const itemsRemoved = count !== this._registry.size;

    count = this._registry.size;
    for (const pkg of addedOrUpdated) {
      this._registry.upsert(pkg).updateVisualState(page.getVisualState(pkg.uniqueId));
    }
    const itemsAdded = count !== this._registry.size;

    if (reorder) {
      const skipped = this._registry.reorderTo(page.visualStates.map(s => s.packageUniqueId));
      if (skipped.length > 0) {
        this._log.warn({ skipped }, 'reorder referenced packages with no entry');
      }
    }

    this._log.debug({
      removed: removed.length,
      addedOrUpdated: addedOrUpdated.length,
      reorder,
      entries: this._registry.size,
    }, 'list update applied');

    // Attribute-only updates and same-size reorders leave the scroll position alone
    if (itemsRemoved || itemsAdded) this._refresh(true);
  }

  onVisualStateChange(states: readonly VisualState[]): void {
    if (states.length === 0) return;

    for (const state of states) {
      this._registry.get(state.packageUniqueId)?.updateVisualState(state);
    }
    this._refresh(true);
  }
}
