/**
 * Scroll-window arithmetic for the package list viewport.
 */

/** Smallest offset change that brings `index` into a viewport of `viewportHeight` rows. */
export function ensureVisible(index: number, currentOffset: number, totalItems: number, viewportHeight: number): number {
  if (viewportHeight <= 0 || totalItems <= 0) return 0;
  let offset = currentOffset;
  // Above the viewport: scroll up to it
  if (index < offset) offset = index;
  // Below the viewport: scroll down until it is the last row
  if (index >= offset + viewportHeight) offset = index - viewportHeight + 1;
  return clampOffset(offset, totalItems, viewportHeight);
}

export function clampOffset(offset: number, totalItems: number, viewportHeight: number): number {
  const maxOffset = Math.max(0, totalItems - Math.max(0, viewportHeight));
  return Math.max(0, Math.min(offset, maxOffset));
}
