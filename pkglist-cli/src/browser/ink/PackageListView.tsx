/**
 * Bordered package list pane. Shows the windowed rows, the login prompt or a
 * status message, depending on the list's view mode.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { DOMElement } from 'ink';
import type { BrowserSnapshot } from '../BrowserSession';
import { PackageRow } from './PackageRow';
import { TAB_LABELS } from './TabBar';

interface PackageListViewProps {
  snapshot: BrowserSnapshot;
  width: number;
  height: number;
  onMount: (key: string, node: DOMElement | null) => void;
}

export function PackageListView({ snapshot, width, height, onMount }: PackageListViewProps): React.ReactElement {
  const { mode, rows, windowRows, offset } = snapshot;
  // Inner width minus border (2)
  const innerWidth = Math.max(1, width - 2);
  const hasMoreAbove = offset > 0;
  const hasMoreBelow = offset + windowRows.length < rows.length;

  return (
    <Box
      width={width}
      height={height}
      flexDirection="column"
      borderStyle="single"
      borderColor="magenta"
      overflow="hidden"
    >
      <Box width={innerWidth}>
        <Box flexGrow={1}>
          <Text color="magenta"> {TAB_LABELS[snapshot.tab]} ({rows.length}) </Text>
        </Box>
        <Text color="gray">{hasMoreAbove ? '▲' : ' '}{hasMoreBelow ? '▼' : ' '} </Text>
      </Box>

      {mode.kind === 'entries' && windowRows.map(row => (
        <PackageRow
          key={row.key}
          row={row}
          selected={row.key === snapshot.selectedKey}
          width={innerWidth}
          onMount={onMount}
        />
      ))}

      {mode.kind === 'login' && (
        <Box flexDirection="column" alignItems="center" marginTop={1} width={innerWidth}>
          <Text>The store is only available to signed-in users.</Text>
          <Text>
            <Text color="gray">Press </Text><Text color="magenta" bold>Enter</Text><Text color="gray"> to sign in</Text>
          </Text>
        </Box>
      )}

      {mode.kind === 'status' && mode.message.length > 0 && (
        <Box justifyContent="center" marginTop={1} width={innerWidth}>
          <Text color="gray">{mode.message}</Text>
        </Box>
      )}
    </Box>
  );
}
