/**
 * Subscribes a component to a BrowserSession and returns its latest snapshot.
 */

import { useEffect, useState } from 'react';
import type { BrowserSession, BrowserSnapshot } from '../BrowserSession';

export function useBrowserSnapshot<TNode>(session: BrowserSession<TNode>): BrowserSnapshot {
  const [snapshot, setSnapshot] = useState<BrowserSnapshot>(() => session.snapshot());

  useEffect(() => {
    const subscription = session.onDidChange(() => setSnapshot(session.snapshot()));
    // Catch up on anything that changed between the first render and subscribing
    setSnapshot(session.snapshot());
    return () => subscription.dispose();
  }, [session]);

  return snapshot;
}
