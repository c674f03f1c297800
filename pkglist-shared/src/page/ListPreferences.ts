/**
 * View preferences written by the list and read by whoever pages the data.
 */

import { Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import type { ItemsPerPageSink } from '../types/collaborators';

export class ListPreferences implements ItemsPerPageSink {
  private _numItemsPerPage = 0;

  private readonly _onDidChange = new Emitter<number>();
  readonly onDidChange: Event<number> = this._onDidChange.event;

  get numItemsPerPage(): number {
    return this._numItemsPerPage;
  }

  set numItemsPerPage(value: number) {
    if (value === this._numItemsPerPage) return;
    this._numItemsPerPage = value;
    this._onDidChange.fire(value);
  }

  dispose(): void {
    this._onDidChange.dispose();
  }
}
