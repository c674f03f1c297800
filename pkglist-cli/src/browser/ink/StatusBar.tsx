/**
 * Status bar (bottom row) with segmented zones:
 * Left: brand + version | Center: refresh state, search, errors | Right: keybinding hints
 */

declare const __CLI_VERSION__: string;

import React from 'react';
import { Box, Text } from 'ink';
import type { BrowserSnapshot } from '../BrowserSession';
import { formatPageIndicator } from '../formatters';

interface StatusBarProps {
  snapshot: BrowserSnapshot;
}

export function StatusBar({ snapshot }: StatusBarProps): React.ReactElement {
  const { refreshing, searchText, error, rows, entryCount, offset, itemsPerPage } = snapshot;
  const pageIndicator = formatPageIndicator(offset, rows.length, itemsPerPage);

  return (
    <Box height={1} width="100%">
      {/* Left zone: brand + version */}
      <Box>
        <Text bold color="magenta">{'⬢'} PKGLIST</Text>
        <Text dimColor> v{__CLI_VERSION__}</Text>
      </Box>

      {/* Center zone: refresh state, search, errors */}
      <Box flexGrow={1} justifyContent="center">
        <Text dimColor> {'│'} </Text>
        {refreshing ? <Text color="cyan">refreshing...</Text> : <Text>{entryCount} packages</Text>}
        {pageIndicator !== '' && <Text dimColor>  {pageIndicator}</Text>}
        {searchText !== '' && (
          <Text color="yellow">  search: "{searchText}" ({rows.length}/{entryCount})</Text>
        )}
        {error && (
          <Text color="red">  {error}</Text>
        )}
      </Box>

      {/* Right zone: keybinding hints */}
      <Box>
        <Text dimColor>{'│'} </Text>
        <Text>
          <Text bold>{'↑↓'}</Text><Text dimColor> nav </Text>
          <Text bold>{'←→'}</Text><Text dimColor> versions </Text>
          <Text bold>Tab</Text><Text dimColor> tab </Text>
          <Text bold>/</Text><Text dimColor> search </Text>
          <Text bold>r</Text><Text dimColor> refresh </Text>
          <Text bold>l</Text><Text dimColor> login </Text>
          <Text bold>q</Text><Text dimColor> quit</Text>
        </Text>
      </Box>
    </Box>
  );
}
