/**
 * Package domain types shared by the list core, the page collaborators and the CLI.
 */

export type PackageSourceKind = 'registry' | 'store' | 'builtin';

export type PackageProgress = 'none' | 'refreshing' | 'downloading' | 'installing' | 'removing';

/** Filter scope of the current page. `store` requires a signed-in user. */
export type FilterTab = 'in-project' | 'registry' | 'store';

export const FILTER_TABS: readonly FilterTab[] = ['in-project', 'registry', 'store'];

export interface PackageVersion {
  /** `<name>@<version>`, unique across the catalog. */
  uniqueId: string;
  packageUniqueId: string;
  version: string;
  isInstalled: boolean;
  releasedAt?: string;
}

export interface PackageInfo {
  /** Stable identity; never changes when metadata does. */
  uniqueId: string;
  name: string;
  displayName: string;
  source: PackageSourceKind;
  description: string;
  /** Newest first. */
  versions: PackageVersion[];
  installedVersionId?: string;
  progress: PackageProgress;
  errors: string[];
}

/** Presentation state of one package as dictated by the page. */
export interface VisualState {
  packageUniqueId: string;
  selectedVersionId?: string;
  visible: boolean;
  expanded: boolean;
}

/** Ordered source of truth for which packages exist and how they are shown. */
export interface Page {
  readonly tab: FilterTab;
  /** Display order. */
  readonly visualStates: readonly VisualState[];
  getVisualState(packageUniqueId: string): VisualState | undefined;
  getSelectedVersion(): PackageVersion | undefined;
}

/** The version an entry shows by default: the installed one, else the newest. */
export function getPrimaryVersion(pkg: PackageInfo): PackageVersion | undefined {
  if (pkg.installedVersionId) {
    const installed = pkg.versions.find(v => v.uniqueId === pkg.installedVersionId);
    if (installed) return installed;
  }
  return pkg.versions[0];
}

export function isRestrictedTab(tab: FilterTab): boolean {
  return tab === 'store';
}
