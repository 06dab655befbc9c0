/**
 * Centralized selector constants: key bindings, reaction catalog, layout
 * heights and default external commands.
 *
 * Key names are the normalized names produced by the terminal driver:
 * printable characters as typed (`Q`, `?`), special keys by name (`enter`,
 * `escape`, `pagedown`) and control chords as `C-<key>`.
 */

// List view
export const KEY_CHOOSE = ['enter', 'right', 'l'];
export const KEY_QUIT = ['q'];
export const KEY_FILTER_TOGGLE = ['h', 'tab'];
export const KEY_REFRESH = ['i'];

// Detail view
export const KEY_BACK = ['escape', 'backspace', 'left', 'h', 'q'];
export const KEY_SCROLL_PAGE_DOWN = ['C-f'];
export const KEY_SCROLL_PAGE_UP = ['C-b'];

// Shared navigation
export const KEY_UP = ['up', 'k'];
export const KEY_DOWN = ['down', 'j'];
export const KEY_PAGE_UP = ['pageup'];
export const KEY_PAGE_DOWN = ['pagedown'];
export const KEY_HOME = ['home', 'g'];
export const KEY_END = ['end', 'G'];
export const KEY_ENTER = ['enter'];
export const KEY_FORCE_QUIT = 'C-c';
export const KEY_TOGGLE_HELP = ['?'];

// Item actions, available from both list and detail
export const KEY_OPEN = ['o'];
export const KEY_RESOLVE = ['r', 'u'];
export const KEY_RESOLVE_COMMENT = ['R', 'U'];
export const KEY_QUOTE = ['Q'];
export const KEY_QUOTE_CONTEXT = ['C'];
export const KEY_AGENT = ['a'];
export const KEY_EDIT = ['e'];
export const KEY_REACT = ['x'];

// Order is part of the external contract (GitHub reaction content names).
export const REACTIONS = ['+1', '-1', 'laugh', 'confused', 'heart', 'hooray', 'rocket', 'eyes'] as const;
export type ReactionName = (typeof REACTIONS)[number];

// Layout heights (lines). Body height is whatever remains, never below 1.
export const LIST_HEADER_HEIGHT = 2;
export const LIST_FOOTER_HEIGHT = 3;
export const DETAIL_HEADER_HEIGHT = 2;
export const DETAIL_FOOTER_HEIGHT = 2;
export const FALLBACK_WIDTH = 80;
export const FALLBACK_HEIGHT = 24;

export const DEFAULT_TITLE = 'Items';
export const DEFAULT_FILTER_LABEL = 'hide resolved';
export const DEFAULT_STATUS_TIMEOUT_MS = 3000;
export const HIGHLIGHT_CONTEXT_LINES = 2;
export const HIGHLIGHT_MARKER = 'SELECTED';
export const LOADING_TEXT = 'Loading...';
export const REFRESHING_TEXT = 'Refreshing...';
export const CONFIRMATION_SUFFIX = 'Press any key to continue...';

// External commands
export const EDITOR_ENV = 'EDITOR';
export const AGENT_ENV = 'REVIEW_THREADS_AGENT';
export const DEFAULT_EDITOR = 'vim';
export const DEFAULT_AGENT = 'claude';
export const TEMP_FILE_PREFIX = 'review-threads-';
export const TEMP_FILE_SUFFIX = '.md';
