/**
 * Tab bar showing the filter tabs: In Project  Registry  Store.
 * Active tab highlighted with magenta.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { FILTER_TABS, isRestrictedTab } from 'pkglist-shared';
import type { FilterTab } from 'pkglist-shared';

export const TAB_LABELS: Record<FilterTab, string> = {
  'in-project': 'In Project',
  registry: 'Registry',
  store: 'Store',
};

interface TabBarProps {
  activeTab: FilterTab;
  loggedIn: boolean;
}

export function TabBar({ activeTab, loggedIn }: TabBarProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Box flexGrow={1}>
        {FILTER_TABS.map(tab => {
          const label = `${TAB_LABELS[tab]}${isRestrictedTab(tab) && !loggedIn ? ' 🔒' : ''}`;
          return (
            <Box key={tab} marginRight={2}>
              {tab === activeTab ? (
                <Text bold color="magenta">[{label}]</Text>
              ) : (
                <Text color="gray"> {label} </Text>
              )}
            </Box>
          );
        })}
      </Box>
      <Box>
        {loggedIn ? (
          <Text color="green">● signed in</Text>
        ) : (
          <Text color="gray">○ signed out</Text>
        )}
      </Box>
    </Box>
  );
}
