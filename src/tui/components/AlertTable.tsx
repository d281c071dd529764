/**
 * AlertTable component - one row per open alert, cursor row highlighted.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { AlertRow } from '../../alerts/types.js';
import { fitColumn, truncateCell } from '../../utils/format.js';
import { statusColor } from '../format.js';

export const COLUMN_WIDTHS = {
  priority: 6,
  status: 14,
  age: 5,
  acknowledgedBy: 18,
  tags: 10,
} as const;

interface AlertTableProps {
  rows: AlertRow[];
  cursor: number;
  pendingIds: ReadonlySet<string>;
}

function HeaderRow() {
  return (
    <Box>
      <Text bold color="cyan">
        {fitColumn('Prio', COLUMN_WIDTHS.priority)} {fitColumn('Status', COLUMN_WIDTHS.status)}{' '}
        {fitColumn('Age', COLUMN_WIDTHS.age)} {fitColumn('Acked By', COLUMN_WIDTHS.acknowledgedBy)}{' '}
        {fitColumn('Tags', COLUMN_WIDTHS.tags)} Message
      </Text>
    </Box>
  );
}

export function AlertTable({ rows, cursor, pendingIds }: AlertTableProps) {
  if (rows.length === 0) {
    return (
      <Box flexDirection="column" paddingX={1}>
        <HeaderRow />
        <Text color="gray">No open alerts</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" paddingX={1}>
      <HeaderRow />
      {rows.map((row, index) => {
        const selected = index === cursor;
        return (
          <Box key={row.id}>
            <Text inverse={selected} wrap="truncate-end">
              {fitColumn(row.priority, COLUMN_WIDTHS.priority)}{' '}
              <Text color={statusColor(row.status)}>{fitColumn(row.status, COLUMN_WIDTHS.status)}</Text>{' '}
              {fitColumn(row.age, COLUMN_WIDTHS.age)} {fitColumn(row.acknowledgedBy, COLUMN_WIDTHS.acknowledgedBy)}{' '}
              {fitColumn(truncateCell(row.tagsDisplay, COLUMN_WIDTHS.tags), COLUMN_WIDTHS.tags)}{' '}
              {pendingIds.has(row.id) ? <Text color="gray">… </Text> : null}
              {row.message}
            </Text>
          </Box>
        );
      })}
    </Box>
  );
}
