/**
 * EntryView component - annotated definition of one entry.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface EntryViewProps {
  title: string;
  definition: string;
  notice: string | null;
}

export function EntryView({ title, definition, notice }: EntryViewProps) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold color="cyan">{title}</Text>
      <Box marginTop={1}>
        <Text>{definition.trimEnd()}</Text>
      </Box>
      {notice !== null && (
        <Box marginTop={1}>
          <Text color="yellow">{notice}</Text>
        </Box>
      )}
      <Box marginTop={1}>
        <Text color="gray" dimColor>Enter: copy raw definition | Esc: back</Text>
      </Box>
    </Box>
  );
}
