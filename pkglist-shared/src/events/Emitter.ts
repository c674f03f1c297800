/**
 * Minimal typed event channel with explicit subscription handles.
 *
 * Producers own an `Emitter<T>` privately and expose its `event` property;
 * consumers subscribe with `event(listener)` and must `dispose()` the returned
 * handle. Listeners are held strongly until disposed.
 */

import { getLogger } from '../logging/logger';

export interface Disposable {
  dispose(): void;
}

export type Event<T> = (listener: (payload: T) => void) => Disposable;

export class Emitter<T> implements Disposable {
  private _listeners = new Set<(payload: T) => void>();
  private _disposed = false;

  readonly event: Event<T> = (listener) => {
    if (this._disposed) return { dispose: () => undefined };
    // Wrap so the same function can be subscribed twice and released independently
    const entry = (payload: T) => listener(payload);
    this._listeners.add(entry);
    return {
      dispose: () => {
        this._listeners.delete(entry);
      },
    };
  };

  /**
   * Deliver a payload to every current listener, in subscription order. A
   * listener that throws is logged and the remaining listeners still run.
   */
  fire(payload: T): void {
    // Snapshot: listeners added or removed during delivery apply to the next fire
    for (const listener of [...this._listeners]) {
      if (!this._listeners.has(listener)) continue;
      try {
        listener(payload);
      } catch (err) {
        getLogger().error({ err }, 'event listener failed');
      }
    }
  }

  get listenerCount(): number {
    return this._listeners.size;
  }

  dispose(): void {
    this._disposed = true;
    this._listeners.clear();
  }
}

/** Collects subscription handles and releases them together. */
export class DisposableStore implements Disposable {
  private _items: Disposable[] = [];

  add<D extends Disposable>(item: D): D {
    this._items.push(item);
    return item;
  }

  get size(): number {
    return this._items.length;
  }

  dispose(): void {
    const items = this._items;
    this._items = [];
    for (const item of items) item.dispose();
  }
}
