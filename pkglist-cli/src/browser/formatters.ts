/**
 * Formatting helpers for package rows and the plain-text listing.
 */

import type { PackageInfo, PackageProgress, PackageVersion, StatusIcon } from 'pkglist-shared';

/** Truncate text to maxLength, appending "..." if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.substring(0, maxLength);
  return text.substring(0, maxLength - 3) + '...';
}

/** Pad or cut text to exactly `width` columns. */
export function fitWidth(text: string, width: number): string {
  return truncate(text, width).padEnd(Math.max(0, width));
}

export const STATUS_GLYPHS: Record<StatusIcon, { glyph: string; color: string }> = {
  none: { glyph: ' ', color: 'gray' },
  installed: { glyph: '✓', color: 'green' },
  'update-available': { glyph: '↑', color: 'yellow' },
  'in-progress': { glyph: '◌', color: 'cyan' },
  error: { glyph: '✗', color: 'red' },
};

const PROGRESS_LABELS: Record<PackageProgress, string> = {
  none: '',
  refreshing: 'refreshing',
  downloading: 'downloading',
  installing: 'installing',
  removing: 'removing',
};

export function progressLabel(progress: PackageProgress): string {
  return PROGRESS_LABELS[progress];
}

/** Order `p` steps the selected package through. */
const PROGRESS_CYCLE: readonly PackageProgress[] = ['none', 'downloading', 'installing'];

export function nextProgress(current: PackageProgress): PackageProgress {
  const idx = PROGRESS_CYCLE.indexOf(current);
  return PROGRESS_CYCLE[(idx + 1) % PROGRESS_CYCLE.length];
}

/** "1.2.0", with the installed marker when it is the installed one. */
export function formatVersionLabel(version: PackageVersion | undefined): string {
  if (!version) return '-';
  return version.isInstalled ? `${version.version} (installed)` : version.version;
}

/** Short summary of a package's install state for the listing. */
export function describeInstallState(pkg: PackageInfo): string {
  const installed = pkg.versions.find(v => v.uniqueId === pkg.installedVersionId);
  if (!installed) return 'not installed';
  const newest = pkg.versions[0];
  if (newest && newest.uniqueId !== installed.uniqueId) {
    return `${installed.version} → ${newest.version}`;
  }
  return installed.version;
}

/** "page 2/3" for a window starting at `offset`; empty when nothing is paged. */
export function formatPageIndicator(offset: number, totalRows: number, itemsPerPage: number): string {
  if (itemsPerPage <= 0 || totalRows === 0) return '';
  const page = Math.floor(offset / itemsPerPage) + 1;
  const pages = Math.ceil(totalRows / itemsPerPage);
  return `page ${Math.min(page, pages)}/${pages}`;
}
