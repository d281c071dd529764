/**
 * DescriptionModal component - full detail of one alert.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { AlertDescription } from '../../alerts/types.js';
import { statusColor } from '../format.js';

interface DescriptionModalProps {
  details: AlertDescription;
  runbookUrl: string | null;
}

export function DescriptionModal({ details, runbookUrl }: DescriptionModalProps) {
  return (
    <Box flexDirection="column" borderStyle="double" borderColor="cyan" paddingX={2} paddingY={1}>
      <Box flexDirection="column" marginBottom={1}>
        <Text bold>
          Alert {details.alertId}: {details.title}
        </Text>
        <Text color="gray">
          Prio {details.priority}  |  Age {details.age}  |  Acked By {details.acknowledgedBy}  |  Tags{' '}
          {details.tagsDisplay}
        </Text>
        <Text bold color={statusColor(details.status)}>
          Status: {details.status.toUpperCase()}
        </Text>
      </Box>
      <Box borderStyle="round" borderColor="gray" paddingX={1}>
        <Text>{details.description}</Text>
      </Box>
      <Box marginTop={1}>
        {runbookUrl ? <Text color="green">o: open runbook ({runbookUrl})  </Text> : null}
        <Text color="gray">Esc/q/d/v: close</Text>
      </Box>
    </Box>
  );
}
