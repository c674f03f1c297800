/**
 * Sign-in state for the restricted (store) tab.
 */

import { Emitter } from '../events/Emitter';
import type { Event } from '../events/Emitter';
import type { ConnectSource } from '../types/collaborators';

export class ConnectService implements ConnectSource {
  private _loggedIn: boolean;

  private readonly _onUserLoginStateChange = new Emitter<boolean>();
  readonly onUserLoginStateChange: Event<boolean> = this._onUserLoginStateChange.event;

  private readonly _onLoginRequested = new Emitter<void>();
  /** Fired by `showLogin()`; whoever owns the login UI listens here. */
  readonly onLoginRequested: Event<void> = this._onLoginRequested.event;

  constructor(loggedIn = false) {
    this._loggedIn = loggedIn;
  }

  get isUserLoggedIn(): boolean {
    return this._loggedIn;
  }

  setLoggedIn(loggedIn: boolean): void {
    if (loggedIn === this._loggedIn) return;
    this._loggedIn = loggedIn;
    this._onUserLoginStateChange.fire(loggedIn);
  }

  showLogin(): void {
    this._onLoginRequested.fire();
  }

  dispose(): void {
    this._onUserLoginStateChange.dispose();
    this._onLoginRequested.dispose();
  }
}
