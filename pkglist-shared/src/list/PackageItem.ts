/**
 * View entries of the package list.
 *
 * A PackageItem is the materialized view of one package identity. Its other
 * versions are VersionItem sub-rows, shown while the item is expanded. Both are
 * keyboard-navigable and together form the Selectable union.
 */

import { getPrimaryVersion } from '../types/package';
import type { PackageInfo, PackageVersion, VisualState } from '../types/package';

export type StatusIcon = 'none' | 'installed' | 'update-available' | 'in-progress' | 'error';

/** Element handle of a selectable row. */
export class ListElement {
  constructor(
    readonly key: string,
    private readonly _isVisible: () => boolean,
  ) {}

  get visible(): boolean {
    return this._isVisible();
  }
}

interface SelectableBase {
  readonly owner: PackageItem;
  readonly package: PackageInfo;
  readonly targetVersion: PackageVersion | undefined;
  readonly element: ListElement;
}

export class VersionItem implements SelectableBase {
  readonly kind = 'version' as const;
  readonly element: ListElement;

  constructor(
    readonly owner: PackageItem,
    readonly targetVersion: PackageVersion,
  ) {
    this.element = new ListElement(
      `version:${targetVersion.uniqueId}`,
      () => owner.visible && owner.expanded,
    );
  }

  get package(): PackageInfo {
    return this.owner.package;
  }
}

export function computeStatusIcon(pkg: PackageInfo): StatusIcon {
  if (pkg.progress !== 'none') return 'in-progress';
  if (pkg.errors.length > 0) return 'error';
  if (!pkg.installedVersionId) return 'none';
  const newest = pkg.versions[0];
  return newest && newest.uniqueId !== pkg.installedVersionId ? 'update-available' : 'installed';
}

export class PackageItem implements SelectableBase {
  readonly kind = 'package' as const;
  readonly element: ListElement;

  private _package: PackageInfo;
  private _visualState: VisualState | undefined;
  private _expanded = false;
  private _versionItems: VersionItem[] = [];
  private _statusIcon: StatusIcon;

  constructor(pkg: PackageInfo) {
    this._package = pkg;
    this._statusIcon = computeStatusIcon(pkg);
    this.element = new ListElement(`package:${pkg.uniqueId}`, () => this.visible);
    this.rebuildVersionItems();
  }

  get uniqueId(): string {
    return this._package.uniqueId;
  }

  get owner(): PackageItem {
    return this;
  }

  get package(): PackageInfo {
    return this._package;
  }

  /** The version remembered by the visual state, else the primary version. */
  get targetVersion(): PackageVersion | undefined {
    const selectedId = this._visualState?.selectedVersionId;
    const selected = selectedId === undefined
      ? undefined
      : this._package.versions.find(v => v.uniqueId === selectedId);
    return selected ?? getPrimaryVersion(this._package);
  }

  get visualState(): VisualState | undefined {
    return this._visualState;
  }

  /** Hidden until a visual state says otherwise. */
  get visible(): boolean {
    return this._visualState?.visible ?? false;
  }

  get expanded(): boolean {
    return this._expanded;
  }

  get versionItems(): readonly VersionItem[] {
    return this._versionItems;
  }

  get statusIcon(): StatusIcon {
    return this._statusIcon;
  }

  /** Replace the backing package in place; identity is unchanged. */
  setPackage(pkg: PackageInfo): void {
    this._package = pkg;
    this._statusIcon = computeStatusIcon(pkg);
    this.rebuildVersionItems();
  }

  updateVisualState(state: VisualState | undefined): void {
    if (!state) return;
    const retarget = state.selectedVersionId !== this._visualState?.selectedVersionId;
    this._visualState = state;
    this._expanded = state.expanded;
    if (retarget) this.rebuildVersionItems();
  }

  setExpanded(value: boolean): void {
    if (this._expanded === value) return;
    this._expanded = value;
  }

  updateStatusIcon(): void {
    this._statusIcon = computeStatusIcon(this._package);
  }

  /** The entry itself followed by every version row, visible or not. */
  getSelectableItems(): Selectable[] {
    return [this, ...this._versionItems];
  }

  private rebuildVersionItems(): void {
    const target = this.targetVersion;
    const previous = new Map(this._versionItems.map(v => [v.targetVersion.uniqueId, v]));
    this._versionItems = this._package.versions
      .filter(v => v.uniqueId !== target?.uniqueId)
      .map(v => {
        const existing = previous.get(v.uniqueId);
        // Keep the row when the version is unchanged so its element handle stays stable
        return existing && existing.targetVersion === v ? existing : new VersionItem(this, v);
      });
  }
}

export type Selectable = PackageItem | VersionItem;

export function isSameVersion(a: PackageVersion | undefined, b: PackageVersion | undefined): boolean {
  return a !== undefined && b !== undefined && a.uniqueId === b.uniqueId;
}
