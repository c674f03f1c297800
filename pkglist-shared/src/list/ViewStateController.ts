/**
 * Decides whether the list shows its entries, the login prompt or a status
 * message, and keeps the external selection consistent with that choice.
 */

import { Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import type { ConnectSource, FilterSource, PackageSource, PageSource } from '../types/collaborators';
import { isRestrictedTab } from '../types/package';
import type { FilterTab } from '../types/package';
import { sameViewMode } from './types';
import type { ViewMode } from './types';

export const MAX_SEARCH_TEXT_TO_DISPLAY = 64;

export const STATUS_MESSAGES = {
  fetching: 'Fetching packages...',
  refreshing: 'Refreshing packages...',
  noPackages: 'There are no packages.',
} as const;

export interface ViewModeInputs {
  filterTab: FilterTab;
  isLoggedIn: boolean;
  visibleCount: number;
  isInitialFetchingDone: boolean;
  isRefreshInProgress: boolean;
  searchText: string;
}

export function buildStatusMessage(
  isRefreshInProgress: boolean,
  isInitialFetchingDone: boolean,
  searchText: string,
): string {
  if (isRefreshInProgress) {
    return isInitialFetchingDone ? STATUS_MESSAGES.refreshing : STATUS_MESSAGES.fetching;
  }
  if (!searchText) {
    return isInitialFetchingDone ? STATUS_MESSAGES.noPackages : '';
  }
  const shown = searchText.length > MAX_SEARCH_TEXT_TO_DISPLAY
    ? searchText.substring(0, MAX_SEARCH_TEXT_TO_DISPLAY) + '...'
    : searchText;
  return `No results for "${shown}"`;
}

export function resolveViewMode(inputs: ViewModeInputs): ViewMode {
  if (isRestrictedTab(inputs.filterTab) && !inputs.isLoggedIn) {
    return { kind: 'login' };
  }
  if (inputs.visibleCount === 0 || !inputs.isInitialFetchingDone) {
    return {
      kind: 'status',
      message: buildStatusMessage(inputs.isRefreshInProgress, inputs.isInitialFetchingDone, inputs.searchText),
    };
  }
  return { kind: 'entries' };
}

export interface ViewStateCollaborators {
  packages: PackageSource;
  pages: PageSource;
  filtering: FilterSource;
  connect: ConnectSource;
}

export class ViewStateController {
  private _mode: ViewMode = { kind: 'status', message: '' };
  private readonly _onDidChangeMode = new Emitter<ViewMode>();
  readonly onDidChangeMode: Event<ViewMode> = this._onDidChangeMode.event;

  constructor(
    private readonly _collaborators: ViewStateCollaborators,
    private readonly _scrollToSelection: () => void,
  ) {}

  get mode(): ViewMode {
    return this._mode;
  }

  /** Re-derive the mode and apply its selection side effects. */
  evaluate(updateScrollPosition: boolean): ViewMode {
    const { packages, pages, filtering, connect } = this._collaborators;
    const page = pages.getCurrentPage();
    const mode = resolveViewMode({
      filterTab: filtering.currentFilterTab,
      isLoggedIn: connect.isUserLoggedIn,
      visibleCount: page.visualStates.filter(s => s.visible).length,
      isInitialFetchingDone: pages.isInitialFetchingDone(),
      isRefreshInProgress: pages.isRefreshInProgress(),
      searchText: filtering.currentSearchText,
    });

    if (mode.kind === 'entries') {
      const selected = pages.getSelectedVersion();
      const selectedState = selected ? page.getVisualState(selected.packageUniqueId) : undefined;
      if (selectedState?.visible !== true) {
        const firstVisible = page.visualStates.find(s => s.visible);
        if (firstVisible) {
          const resolved = packages.getPackageAndVersion(firstVisible.packageUniqueId, firstVisible.selectedVersionId);
          pages.setSelected(resolved.package, resolved.version);
        } else {
          pages.clearSelection();
        }
      }
    } else {
      pages.clearSelection();
    }

    this.setMode(mode);
    if (mode.kind === 'entries' && updateScrollPosition) this._scrollToSelection();
    return mode;
  }

  dispose(): void {
    this._onDidChangeMode.dispose();
  }

  private setMode(mode: ViewMode): void {
    if (sameViewMode(this._mode, mode)) return;
    this._mode = mode;
    this._onDidChangeMode.fire(mode);
  }
}
