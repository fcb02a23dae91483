/**
 * Browser state - pure reducer behind the interactive TUI.
 *
 * The ink component ranks results through DocsService and dispatches them here;
 * nothing in this module touches the terminal or the clipboard.
 */

import type { CatalogEntry } from '@ntdocs/catalog';
import type { RankedEntry } from '@ntdocs/engine';

export type Screen = 'search' | 'entry';

export interface BrowserState {
  screen: Screen;
  query: string;
  results: readonly RankedEntry[];
  /** Highlighted row in `results` */
  selected: number;
  /** Entry shown on the entry screen */
  opened: CatalogEntry | null;
  showHelp: boolean;
  /** One-line status shown under the entry, e.g. after a copy */
  notice: string | null;
}

export type BrowserAction =
  | { type: 'query'; query: string; results: readonly RankedEntry[] }
  | { type: 'move'; delta: number }
  | { type: 'open' }
  | { type: 'escape' }
  | { type: 'toggle-help' }
  | { type: 'notice'; message: string };

export function createInitialState(results: readonly RankedEntry[]): BrowserState {
  return {
    screen: 'search',
    query: '',
    results,
    selected: 0,
    opened: null,
    showHelp: false,
    notice: null,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function browserReducer(state: BrowserState, action: BrowserAction): BrowserState {
  switch (action.type) {
    case 'query':
      return { ...state, query: action.query, results: action.results, selected: 0 };

    case 'move':
      if (state.screen !== 'search' || state.results.length === 0) return state;
      return {
        ...state,
        selected: clamp(state.selected + action.delta, 0, state.results.length - 1),
      };

    case 'open': {
      if (state.screen !== 'search') return state;
      const hit = state.results[state.selected];
      if (!hit) return state;
      return { ...state, screen: 'entry', opened: hit.entry, showHelp: false, notice: null };
    }

    case 'escape':
      if (state.showHelp) return { ...state, showHelp: false };
      if (state.screen === 'entry') return { ...state, screen: 'search', opened: null, notice: null };
      return state;

    case 'toggle-help':
      return { ...state, showHelp: !state.showHelp };

    case 'notice':
      return { ...state, notice: action.message };
  }
}

/**
 * Whether Esc should quit: only from the plain search screen.
 */
export function shouldQuitOnEscape(state: BrowserState): boolean {
  return state.screen === 'search' && !state.showHelp;
}

/**
 * Slice of rows to draw so the highlighted row stays visible.
 */
export function visibleWindow(total: number, selected: number, size: number): { start: number; end: number } {
  if (total <= size) return { start: 0, end: total };
  const start = clamp(selected - Math.floor(size / 2), 0, total - size);
  return { start, end: start + size };
}
