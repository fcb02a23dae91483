/**
 * Interactive browser
 */

export { BrowserApp, BROWSER_TITLE } from './BrowserApp.js';
export type { BrowserAppProps } from './BrowserApp.js';
export {
  browserReducer,
  createInitialState,
  shouldQuitOnEscape,
  visibleWindow,
} from './state.js';
export type { BrowserState, BrowserAction, Screen } from './state.js';
