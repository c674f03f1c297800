/**
 * In-memory package store keyed by identity.
 */

import { Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import type { PackageSource, ResolvedPackage } from '../types/collaborators';
import { getPrimaryVersion } from '../types/package';
import type { PackageInfo, PackageProgress } from '../types/package';

export interface PackageDiff {
  added: PackageInfo[];
  updated: PackageInfo[];
  removed: PackageInfo[];
}

function samePackage(a: PackageInfo, b: PackageInfo): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class PackageDatabase implements PackageSource {
  private _packages = new Map<string, PackageInfo>();

  private readonly _onPackageProgressUpdate = new Emitter<PackageInfo>();
  readonly onPackageProgressUpdate: Event<PackageInfo> = this._onPackageProgressUpdate.event;

  constructor(packages: readonly PackageInfo[] = []) {
    this.setPackages(packages);
  }

  get size(): number {
    return this._packages.size;
  }

  getPackage(uniqueId: string): PackageInfo | undefined {
    return this._packages.get(uniqueId);
  }

  getPackageAndVersion(packageUniqueId: string, versionId?: string): ResolvedPackage {
    const pkg = this._packages.get(packageUniqueId);
    if (!pkg) return {};
    const version = versionId
      ? pkg.versions.find(v => v.uniqueId === versionId) ?? getPrimaryVersion(pkg)
      : getPrimaryVersion(pkg);
    return { package: pkg, version };
  }

  /** Packages in insertion order. */
  all(): PackageInfo[] {
    return [...this._packages.values()];
  }

  /**
   * Replace the contents and report what changed. Unchanged packages keep
   * their existing objects.
   */
  setPackages(packages: readonly PackageInfo[]): PackageDiff {
    const diff: PackageDiff = { added: [], updated: [], removed: [] };
    const next = new Map<string, PackageInfo>();

    for (const pkg of packages) {
      const existing = this._packages.get(pkg.uniqueId);
      if (!existing) {
        diff.added.push(pkg);
        next.set(pkg.uniqueId, pkg);
      } else if (!samePackage(existing, pkg)) {
        diff.updated.push(pkg);
        next.set(pkg.uniqueId, pkg);
      } else {
        next.set(pkg.uniqueId, existing);
      }
    }
    for (const [id, pkg] of this._packages) {
      if (!next.has(id)) diff.removed.push(pkg);
    }

    this._packages = next;
    return diff;
  }

  /** Record an operation's progress on the stored package and notify listeners. */
  setProgress(uniqueId: string, progress: PackageProgress): boolean {
    const pkg = this._packages.get(uniqueId);
    if (!pkg) return false;
    pkg.progress = progress;
    this._onPackageProgressUpdate.fire(pkg);
    return true;
  }

  dispose(): void {
    this._onPackageProgressUpdate.dispose();
  }
}
