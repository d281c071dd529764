/**
 * Header component - title, clock and open-alert count.
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import { formatClock } from '../format.js';

interface HeaderProps {
  openCount: number;
  clock: Date;
  refreshing: boolean;
}

export function Header({ openCount, clock, refreshing }: HeaderProps) {
  return (
    <Box borderStyle="round" borderColor="blue" paddingX={1} justifyContent="space-between">
      <Text bold color="cyan">
        Jira Service Management Alerts
      </Text>
      <Box>
        {refreshing && (
          <Text color="cyan">
            <Spinner type="dots" />{' '}
          </Text>
        )}
        <Text color="gray">Open alerts: {openCount}  </Text>
        <Text color="gray">{formatClock(clock)}</Text>
      </Box>
    </Box>
  );
}
