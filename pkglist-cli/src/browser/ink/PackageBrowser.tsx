/**
 * Full-screen package browser: tab bar, package list pane and status bar.
 */

import React, { useEffect, useReducer } from 'react';
import { Box, useApp, useInput } from 'ink';
import type { DOMElement } from 'ink';
import type { BrowserSession } from '../BrowserSession';
import { PackageListView } from './PackageListView';
import { SearchOverlay } from './SearchOverlay';
import { StatusBar } from './StatusBar';
import { TabBar } from './TabBar';
import { useBrowserSnapshot } from './useBrowserSnapshot';
import { useTerminalSize } from './useTerminalSize';

// ── State ──

interface BrowserState {
  overlay: 'search' | null;
  searchDraft: string;
  /** Search text to restore when the search is cancelled. */
  searchBefore: string;
}

type BrowserAction =
  | { type: 'OPEN_SEARCH'; current: string }
  | { type: 'SET_DRAFT'; value: string }
  | { type: 'CLOSE_OVERLAY' };

const initialState: BrowserState = {
  overlay: null,
  searchDraft: '',
  searchBefore: '',
};

function reducer(state: BrowserState, action: BrowserAction): BrowserState {
  switch (action.type) {
    case 'OPEN_SEARCH':
      return { overlay: 'search', searchDraft: action.current, searchBefore: action.current };
    case 'SET_DRAFT':
      return { ...state, searchDraft: action.value };
    case 'CLOSE_OVERLAY':
      return { ...state, overlay: null };
  }
}

// Tab bar + status bar
const CHROME_ROWS = 2;
// Border (2) + title row (1)
const PANE_CHROME_ROWS = 3;

// ── Component ──

interface PackageBrowserProps {
  session: BrowserSession<DOMElement>;
}

export function PackageBrowser({ session }: PackageBrowserProps): React.ReactElement {
  const [state, dispatch] = useReducer(reducer, initialState);
  const { exit } = useApp();
  const { columns, rows } = useTerminalSize();
  const snapshot = useBrowserSnapshot(session);

  const paneHeight = Math.max(PANE_CHROME_ROWS + 1, rows - CHROME_ROWS);
  const viewportHeight = paneHeight - PANE_CHROME_ROWS;

  useEffect(() => {
    session.setViewportHeight(viewportHeight);
  }, [session, viewportHeight]);

  // Every committed frame has a layout the host can measure
  useEffect(() => {
    session.host.markLaidOut();
  });

  const updateSearch = (value: string) => {
    dispatch({ type: 'SET_DRAFT', value });
    session.setSearchText(value);
  };

  const closeSearch = () => {
    dispatch({ type: 'CLOSE_OVERLAY' });
    session.list.onFocusGained();
  };

  // ── Keyboard input ──
  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      exit();
      return;
    }

    // Search overlay captures all input
    if (state.overlay === 'search') {
      if (key.escape) {
        session.setSearchText(state.searchBefore);
        closeSearch();
        return;
      }
      if (key.return) {
        closeSearch();
        return;
      }
      if (key.backspace || key.delete) {
        updateSearch(state.searchDraft.slice(0, -1));
        return;
      }
      if (input && !key.ctrl && !key.meta) {
        updateSearch(state.searchDraft + input);
      }
      return;
    }

    if (input === 'q') {
      exit();
      return;
    }

    if (key.upArrow) { session.handleKey('up'); return; }
    if (key.downArrow) { session.handleKey('down'); return; }
    if (key.leftArrow) { session.handleKey('left'); return; }
    if (key.rightArrow) { session.handleKey('right'); return; }

    if (key.tab) {
      session.cycleTab(key.shift ? -1 : 1);
      return;
    }
    if (key.return) {
      session.requestLogin();
      return;
    }

    switch (input) {
      case '/':
        dispatch({ type: 'OPEN_SEARCH', current: snapshot.searchText });
        break;
      case 'r':
        session.requestRefresh();
        break;
      case 'l':
        session.toggleLogin();
        break;
      case 'p':
        session.cycleSelectedProgress();
        break;
    }
  });

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <TabBar activeTab={snapshot.tab} loggedIn={snapshot.loggedIn} />
      <PackageListView
        snapshot={snapshot}
        width={columns}
        height={paneHeight}
        onMount={(rowKey, node) => session.host.mount(rowKey, node)}
      />
      {state.overlay === 'search' ? (
        <SearchOverlay text={state.searchDraft} matchCount={snapshot.rows.filter(r => r.depth === 0).length} />
      ) : (
        <StatusBar snapshot={snapshot} />
      )}
    </Box>
  );
}
