import React from 'react';
import { Box, Text } from 'ink';
import type { NotificationLevel } from '../../types/index.js';

export interface Notice {
  level: NotificationLevel;
  message: string;
}

const LEVEL_COLORS: Record<NotificationLevel, string> = {
  info: 'green',
  warning: 'yellow',
  error: 'red',
};

export function StatusLine({ notice }: { notice: Notice | null }) {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={notice ? LEVEL_COLORS[notice.level] : 'gray'} wrap="truncate-end">
        {notice ? notice.message : ' '}
      </Text>
      <Text color="gray" dimColor>
        r: refresh | a: acknowledge | c: close | v/Enter: view | ↑↓/jk: move | q: quit
      </Text>
    </Box>
  );
}
