/**
 * Host-facing types of the package list.
 */

import type { ListElement } from './PackageItem';

/** What the list surface shows. */
export type ViewMode =
  | { kind: 'login' }
  | { kind: 'status'; message: string }
  | { kind: 'entries' };

export type ListKey = 'left' | 'right' | 'up' | 'down';

/** Layout and scheduling services supplied by whatever renders the list. */
export interface ListHost {
  /** Rendered height of the element, or null while its layout is pending. */
  measureHeight(element: ListElement): number | null;
  /** Bring the element within the visible bounds of its scrollable ancestors. */
  scrollIntoView(element: ListElement): void;
  /** Run the task on a later turn of the event loop, once the UI is idle. */
  requestIdle(task: () => void): void;
}

export function sameViewMode(a: ViewMode, b: ViewMode): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'status' && b.kind === 'status') return a.message === b.message;
  return true;
}
