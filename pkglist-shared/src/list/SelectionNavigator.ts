/**
 * Keyboard selection over the flattened list of selectable rows.
 */

import type { PageSource } from '../types/collaborators';
import { isSameVersion } from './PackageItem';
import type { Selectable } from './PackageItem';
import type { PackageRegistry } from './Reconciler';
import type { ScrollIntoView } from './ScrollIntoView';

export class SelectionNavigator {
  constructor(
    private readonly _registry: PackageRegistry,
    private readonly _pages: PageSource,
    private readonly _scroller: ScrollIntoView,
  ) {}

  /** Every row in display order: each entry followed by its version rows. */
  getSelectableItems(): Selectable[] {
    return this._registry.all().flatMap(item => item.getSelectableItems());
  }

  /** The row backing the externally selected version, if it is materialized. */
  getSelectedItem(): Selectable | undefined {
    const selectedVersion = this._pages.getSelectedVersion();
    const item = this._registry.get(selectedVersion?.packageUniqueId);
    if (!item) return undefined;
    if (isSameVersion(item.targetVersion, selectedVersion)) return item;
    return item.versionItems.find(v => isSameVersion(v.targetVersion, selectedVersion));
  }

  /**
   * Move the selection by `delta` visible rows. Returns false, leaving the
   * selection untouched, when the walk would leave the list first. With no
   * current selection there is nothing to move and the result is true.
   */
  selectBy(delta: number): boolean {
    const selection = this.getSelectedItem();
    if (!selection) return true;

    const list = this.getSelectableItems();
    const direction = Math.sign(delta);
    const steps = Math.abs(delta);
    let index = list.indexOf(selection);
    let next: Selectable | undefined;
    let visibleHits = 0;

    while (visibleHits < steps) {
      index += direction;
      if (index < 0 || index >= list.length) return false;
      next = list[index];
      if (next.element.visible) visibleHits++;
    }

    if (!next) return true;
    this._pages.setSelected(next.package, next.targetVersion, true);
    this._scroller.request(next.element);
    return true;
  }

  /** Re-issue scroll-into-view for the current selection. */
  scrollToSelection(): void {
    this._scroller.request(this.getSelectedItem()?.element);
  }

  setSelectedItemExpanded(expanded: boolean): void {
    const item = this._registry.get(this._pages.getSelectedVersion()?.packageUniqueId);
    if (!item) return;
    item.setExpanded(expanded);
    this._pages.setExpanded(item.uniqueId, expanded);
  }
}
