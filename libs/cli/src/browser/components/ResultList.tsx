/**
 * ResultList component - ranked entries with the highlighted row marked.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { RankedEntry } from '@ntdocs/engine';
import { visibleWindow } from '../state.js';

interface ResultListProps {
  results: readonly RankedEntry[];
  selected: number;
  /** Rows drawn at once */
  pageSize: number;
}

export function ResultList({ results, selected, pageSize }: ResultListProps) {
  if (results.length === 0) {
    return (
      <Box marginTop={1}>
        <Text color="gray">No matching entries</Text>
      </Box>
    );
  }

  const { start, end } = visibleWindow(results.length, selected, pageSize);

  return (
    <Box flexDirection="column" marginTop={1}>
      {results.slice(start, end).map((result, offset) => {
        const index = start + offset;
        const isSelected = index === selected;
        return (
          <Text key={index} color={isSelected ? 'cyan' : undefined} bold={isSelected}>
            {isSelected ? '› ' : '  '}
            {result.entry.name}
          </Text>
        );
      })}
      <Text color="gray" dimColor>
        {`${selected + 1}/${results.length}`}
      </Text>
    </Box>
  );
}
