/**
 * Scroll-into-view that waits for layout.
 *
 * While the host cannot measure the target yet, the same request is re-posted
 * on the host's next idle tick. Retries are capped; a newer request replaces
 * any older one still waiting.
 */

import type { Logger } from '../logging/logger';
import type { ListElement } from './PackageItem';
import type { ListHost } from './types';

export const DEFAULT_SCROLL_RETRY_LIMIT = 200;

export class ScrollIntoView {
  private _generation = 0;
  private _pending = false;

  constructor(
    private readonly _host: ListHost,
    private readonly _log: Logger,
    private readonly _retryLimit: number = DEFAULT_SCROLL_RETRY_LIMIT,
  ) {}

  /** True while a deferred request is waiting for layout. */
  get pending(): boolean {
    return this._pending;
  }

  request(element: ListElement | undefined): void {
    if (!element) return;
    const generation = ++this._generation;
    this.attempt(element, generation, 0);
  }

  /** Drop any deferred request. */
  cancel(): void {
    this._generation++;
    this._pending = false;
  }

  private attempt(element: ListElement, generation: number, retries: number): void {
    if (generation !== this._generation) return;

    const height = this._host.measureHeight(element);
    if (height === null || Number.isNaN(height)) {
      if (retries >= this._retryLimit) {
        this._pending = false;
        this._log.warn({ element: element.key, retries }, 'scroll-into-view dropped: element never laid out');
        return;
      }
      this._pending = true;
      this._host.requestIdle(() => this.attempt(element, generation, retries + 1));
      return;
    }

    this._pending = false;
    this._host.scrollIntoView(element);
  }
}
