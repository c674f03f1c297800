/**
 * Flattens the list entries into the rows the terminal actually draws:
 * each visible entry, followed by its version rows while it is expanded.
 */

import type { PackageItem, Selectable } from 'pkglist-shared';

export interface BrowserRow {
  /** Element key of the backing selectable. */
  key: string;
  depth: 0 | 1;
  item: Selectable;
}

export function buildRows(entries: readonly PackageItem[]): BrowserRow[] {
  const rows: BrowserRow[] = [];
  for (const entry of entries) {
    if (!entry.visible) continue;
    rows.push({ key: entry.element.key, depth: 0, item: entry });
    if (!entry.expanded) continue;
    for (const version of entry.versionItems) {
      rows.push({ key: version.element.key, depth: 1, item: version });
    }
  }
  return rows;
}

export function findRowIndex(rows: readonly BrowserRow[], key: string | undefined): number {
  if (!key) return -1;
  return rows.findIndex(r => r.key === key);
}
