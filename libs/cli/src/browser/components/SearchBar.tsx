/**
 * SearchBar component - query input for live filtering.
 */

import React from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface SearchBarProps {
  query: string;
  focus: boolean;
  onChange: (query: string) => void;
  onSubmit: () => void;
}

export function SearchBar({ query, focus, onChange, onSubmit }: SearchBarProps) {
  return (
    <Box flexDirection="column">
      <Text bold>Search:</Text>
      <Box>
        <Text color="green">&gt; </Text>
        <TextInput value={query} focus={focus} onChange={onChange} onSubmit={() => onSubmit()} />
      </Box>
    </Box>
  );
}
