/**
 * HelpPanel component - key bindings.
 */

import React from 'react';
import { Box, Text } from 'ink';

export const HELP_LINES = [
  'Use ↑/↓ to move the selection.',
  'Type to filter entries via fuzzy matching.',
  'Enter on a name opens its full definition.',
  'Enter again on the definition copies the raw C form.',
  'Esc backs out of dialogs or quits from the search screen.',
  'Tab toggles this help.',
];

export function HelpPanel() {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>Help</Text>
      {HELP_LINES.map((line) => (
        <Text key={line}>{line}</Text>
      ))}
    </Box>
  );
}
