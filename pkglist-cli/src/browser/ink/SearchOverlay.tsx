/**
 * Search input shown in place of the status bar while editing the search text.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface SearchOverlayProps {
  text: string;
  matchCount: number;
}

export function SearchOverlay({ text, matchCount }: SearchOverlayProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Text bold color="magenta">/ </Text>
      <Text>{text}</Text>
      <Text color="gray">█</Text>
      <Box flexGrow={1} justifyContent="flex-end">
        <Text color={matchCount > 0 ? 'gray' : 'yellow'}>{matchCount} match{matchCount === 1 ? '' : 'es'} </Text>
        <Text bold>Enter</Text><Text dimColor> keep </Text>
        <Text bold>Esc</Text><Text dimColor> cancel</Text>
      </Box>
    </Box>
  );
}
