/**
 * ListHost backed by the Ink layout.
 *
 * Rows outside the scroll window are not mounted, so they report the fixed
 * row height as long as they are part of the row model. Anything the model
 * does not know yet, or anything asked about before the first layout pass,
 * is reported as not laid out.
 *
 * With a bound row source the host re-reads the rows before every layout
 * query, so a scroll requested in the middle of a reconcile pass sees the
 * entries that pass produced.
 */

import { Emitter } from 'pkglist-shared';
import type { Event, ListElement, ListHost } from 'pkglist-shared';
import type { BrowserRow } from './rows';
import { clampOffset, ensureVisible } from './windowing';

export const ROW_HEIGHT = 1;

export interface InkListHostOptions<TNode> {
  measure: (node: TNode) => { height: number };
  schedule?: (task: () => void) => void;
}

export class InkListHost<TNode> implements ListHost {
  private _rows: readonly BrowserRow[] = [];
  private _offset = 0;
  private _viewportHeight = 0;
  private _laidOut = false;
  private _rowSource: (() => readonly BrowserRow[]) | undefined;
  private readonly _mounted = new Map<string, TNode>();
  private readonly _measure: (node: TNode) => { height: number };
  private readonly _schedule: (task: () => void) => void;

  private readonly _onDidScroll = new Emitter<number>();
  readonly onDidScroll: Event<number> = this._onDidScroll.event;

  constructor(options: InkListHostOptions<TNode>) {
    this._measure = options.measure;
    this._schedule = options.schedule ?? (task => { setImmediate(task); });
  }

  get rows(): readonly BrowserRow[] {
    return this._rows;
  }

  get offset(): number {
    return this._offset;
  }

  get viewportHeight(): number {
    return this._viewportHeight;
  }

  /** Rows inside the current scroll window. */
  get windowRows(): readonly BrowserRow[] {
    return this._rows.slice(this._offset, this._offset + this._viewportHeight);
  }

  setRows(rows: readonly BrowserRow[]): void {
    this._rows = rows;
    this.setOffset(clampOffset(this._offset, rows.length, this._viewportHeight));
  }

  /** Take rows from `source` from now on, starting with its current rows. */
  bindRows(source: () => readonly BrowserRow[]): void {
    this._rowSource = source;
    this.setRows(source());
  }

  /** Re-read the bound row source; a no-op without one. */
  syncRows(): void {
    if (this._rowSource) this.setRows(this._rowSource());
  }

  setViewportHeight(height: number): void {
    this._viewportHeight = Math.max(0, height);
    this.setOffset(clampOffset(this._offset, this._rows.length, this._viewportHeight));
  }

  /** Called once the renderer has committed a frame. */
  markLaidOut(): void {
    this._laidOut = true;
  }

  /** Ref callback target: attach or detach the rendered node of a row. */
  mount(key: string, node: TNode | null): void {
    if (node) this._mounted.set(key, node);
    else this._mounted.delete(key);
  }

  // ── ListHost ──

  measureHeight(element: ListElement): number | null {
    if (!this._laidOut) return null;
    this.syncRows();
    if (!this._rows.some(r => r.key === element.key)) return null;
    const node = this._mounted.get(element.key);
    if (!node) return ROW_HEIGHT;
    const { height } = this._measure(node);
    return height > 0 ? height : null;
  }

  scrollIntoView(element: ListElement): void {
    this.syncRows();
    const index = this._rows.findIndex(r => r.key === element.key);
    if (index < 0) return;
    this.setOffset(ensureVisible(index, this._offset, this._rows.length, this._viewportHeight));
  }

  requestIdle(task: () => void): void {
    this._schedule(task);
  }

  dispose(): void {
    this._mounted.clear();
    this._onDidScroll.dispose();
  }

  private setOffset(offset: number): void {
    if (offset === this._offset) return;
    this._offset = offset;
    this._onDidScroll.fire(offset);
  }
}
