/**
 * Contracts of the collaborators the package list consumes.
 * The list only reads these and issues the few commands listed here.
 */

import type { Event } from '../events/Emitter';
import type { FilterTab, Page, PackageInfo, PackageVersion, VisualState } from './package';

export interface ListUpdate {
  page: Page;
  addedOrUpdated?: readonly PackageInfo[];
  removed?: readonly PackageInfo[];
  /** When set, display order must be re-derived from `page.visualStates`. */
  reorder: boolean;
}

export interface ResolvedPackage {
  package?: PackageInfo;
  version?: PackageVersion;
}

export interface PackageSource {
  getPackage(uniqueId: string): PackageInfo | undefined;
  /** Resolves the package and one of its versions; the primary version when `versionId` is omitted. */
  getPackageAndVersion(packageUniqueId: string, versionId?: string): ResolvedPackage;
  readonly onPackageProgressUpdate: Event<PackageInfo>;
}

export interface PageSource {
  getCurrentPage(): Page;
  getSelectedVersion(): PackageVersion | undefined;
  setSelected(pkg: PackageInfo | undefined, version?: PackageVersion, isExplicitSelection?: boolean): void;
  clearSelection(): void;
  setExpanded(packageUniqueId: string, expanded: boolean): void;
  isInitialFetchingDone(): boolean;
  isRefreshInProgress(): boolean;

  readonly onRefreshOperationStart: Event<void>;
  readonly onRefreshOperationFinish: Event<void>;
  readonly onVisualStateChange: Event<readonly VisualState[]>;
  readonly onListRebuild: Event<Page>;
  readonly onListUpdate: Event<ListUpdate>;
}

export interface FilterSource {
  readonly currentFilterTab: FilterTab;
  readonly currentSearchText: string;
}

export interface ConnectSource {
  readonly isUserLoggedIn: boolean;
  showLogin(): void;
  readonly onUserLoginStateChange: Event<boolean>;
}

export interface ItemsPerPageSink {
  numItemsPerPage: number;
}
