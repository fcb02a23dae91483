/**
 * BrowserApp - Root TUI component for interactive browsing.
 *
 * Two screens: search (query + ranked list) and entry (pretty definition).
 * Tab toggles help on either screen.
 */

import React, { useCallback, useReducer } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { DocsService } from '@ntdocs/engine';
import { SearchBar } from './components/SearchBar.js';
import { ResultList } from './components/ResultList.js';
import { EntryView } from './components/EntryView.js';
import { HelpPanel } from './components/HelpPanel.js';
import { browserReducer, createInitialState, shouldQuitOnEscape } from './state.js';
import { copyToClipboard } from '../utils/clipboard.js';

export const BROWSER_TITLE = 'Fuzzy NT Docs';

export interface BrowserAppProps {
  service: DocsService;
  /** Clipboard writer; throws on failure */
  copy?: (text: string) => void;
  pageSize?: number;
}

export function BrowserApp({ service, copy = copyToClipboard, pageSize = 15 }: BrowserAppProps) {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(browserReducer, service, (s: DocsService) => createInitialState(s.rank('')));

  const handleQueryChange = useCallback((query: string) => {
    dispatch({ type: 'query', query, results: service.rank(query) });
  }, [service]);

  const handleSubmit = useCallback(() => {
    dispatch({ type: 'open' });
  }, []);

  useInput((_input, key) => {
    if (key.tab) {
      dispatch({ type: 'toggle-help' });
      return;
    }

    if (key.escape) {
      if (shouldQuitOnEscape(state)) {
        exit();
      } else {
        dispatch({ type: 'escape' });
      }
      return;
    }

    // Help covers the screen underneath
    if (state.showHelp) return;

    if (state.screen === 'search') {
      if (key.upArrow) dispatch({ type: 'move', delta: -1 });
      if (key.downArrow) dispatch({ type: 'move', delta: 1 });
      return;
    }

    // Enter on the search screen is handled by the input's onSubmit
    if (key.return && state.opened) {
      try {
        copy(service.raw(state.opened));
        dispatch({ type: 'notice', message: 'Raw definition copied to clipboard' });
      } catch (err) {
        dispatch({ type: 'notice', message: `Clipboard error: ${err instanceof Error ? err.message : String(err)}` });
      }
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">{BROWSER_TITLE}</Text>
      </Box>

      {state.screen === 'search' && (
        <>
          <SearchBar
            query={state.query}
            focus={!state.showHelp}
            onChange={handleQueryChange}
            onSubmit={handleSubmit}
          />
          <ResultList results={state.results} selected={state.selected} pageSize={pageSize} />
        </>
      )}

      {state.screen === 'entry' && state.opened && (
        <EntryView
          title={state.opened.name}
          definition={service.pretty(state.opened)}
          notice={state.notice}
        />
      )}

      {state.showHelp && <HelpPanel />}

      {/* Footer */}
      <Box marginTop={1}>
        <Text color="gray" dimColor>
          Tab: help | Esc: {state.screen === 'search' ? 'quit' : 'back'}
        </Text>
      </Box>
    </Box>
  );
}
