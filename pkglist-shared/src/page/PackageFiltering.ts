/**
 * Current filter tab and search text.
 */

import { Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import type { FilterSource } from '../types/collaborators';
import { FILTER_TABS } from '../types/package';
import type { FilterTab } from '../types/package';

export class PackageFiltering implements FilterSource {
  private _tab: FilterTab;
  private _searchText: string;

  private readonly _onFilterTabChange = new Emitter<FilterTab>();
  readonly onFilterTabChange: Event<FilterTab> = this._onFilterTabChange.event;

  private readonly _onSearchTextChange = new Emitter<string>();
  readonly onSearchTextChange: Event<string> = this._onSearchTextChange.event;

  constructor(tab: FilterTab = 'in-project', searchText = '') {
    this._tab = tab;
    this._searchText = searchText;
  }

  get currentFilterTab(): FilterTab {
    return this._tab;
  }

  set currentFilterTab(tab: FilterTab) {
    if (tab === this._tab) return;
    this._tab = tab;
    this._onFilterTabChange.fire(tab);
  }

  get currentSearchText(): string {
    return this._searchText;
  }

  set currentSearchText(text: string) {
    if (text === this._searchText) return;
    this._searchText = text;
    this._onSearchTextChange.fire(text);
  }

  /** Step to the next (or previous) tab, wrapping around. */
  cycleTab(direction: 1 | -1 = 1): FilterTab {
    const idx = FILTER_TABS.indexOf(this._tab);
    this.currentFilterTab = FILTER_TABS[(idx + direction + FILTER_TABS.length) % FILTER_TABS.length];
    return this._tab;
  }

  dispose(): void {
    this._onFilterTabChange.dispose();
    this._onSearchTextChange.dispose();
  }
}
