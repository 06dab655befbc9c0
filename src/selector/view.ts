/**
 * Pure projection of engine state into a {@link Frame}. Drivers only paint
 * frames; nothing here touches the terminal.
 *
 * Text destined for the terminal is escaped for blessed tag markup, so item
 * content containing `{` or `}` renders literally.
 */

import {
  CONFIRMATION_SUFFIX,
  DEFAULT_TITLE,
  DETAIL_FOOTER_HEIGHT,
  DETAIL_HEADER_HEIGHT,
  LIST_FOOTER_HEIGHT,
  LIST_HEADER_HEIGHT,
  LOADING_TEXT,
  REACTIONS,
  REFRESHING_TEXT,
} from './constants.js';
import type { Origin, ReactionPickMode, SelectorMode, ThreadPickMode } from './modes.js';
import { baseView } from './modes.js';
import type { SelectorOptions } from './options.js';
import { THREAD_ACTION_KEYS, actionHint, enabledActions, formatHint } from './options.js';
import { wrapLines } from './wrap.js';

export interface Dimensions {
  width: number;
  height: number;
}

export type StatusTone = 'info' | 'success' | 'error';

export interface StatusLine {
  text: string;
  tone: StatusTone;
}

export interface FrameLayout {
  headerHeight: number;
  bodyHeight: number;
  footerHeight: number;
}

export interface Overlay {
  title: string;
  content: string;
}

export interface Frame {
  view: 'list' | 'detail';
  header: string;
  /** List rows; empty in the detail view. */
  rows: string[];
  cursor: number;
  /** Detail text; empty in the list view. */
  body: string;
  scroll: number;
  layout: FrameLayout;
  footer: string;
  status: StatusLine | null;
  overlay: Overlay | null;
}

export interface FrameInput<T> {
  mode: SelectorMode<T>;
  options: SelectorOptions<T>;
  visible: readonly T[];
  cursor: number;
  filterActive: boolean;
  refreshing: boolean;
  status: StatusLine | null;
  dimensions: Dimensions;
}

const HINT_SEPARATOR = ' | ';

export function escapeTags(value: string): string {
  return value.replace(/[{}]/g, ch => (ch === '{' ? '{open}' : '{close}'));
}

export function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, '');
}

/** Truncate to `max` visible columns, ending in `...`. ANSI sequences are dropped when truncating. */
export function truncate(value: string, max: number): string {
  if (max <= 0) return value;
  const plain = stripAnsi(value);
  if (plain.length <= max) return value;
  if (max <= 3) return plain.slice(0, max);
  return `${plain.slice(0, max - 3)}...`;
}

export function listLayout(height: number): FrameLayout {
  return {
    headerHeight: LIST_HEADER_HEIGHT,
    bodyHeight: Math.max(1, height - LIST_HEADER_HEIGHT - LIST_FOOTER_HEIGHT),
    footerHeight: LIST_FOOTER_HEIGHT,
  };
}

export function detailLayout(height: number): FrameLayout {
  return {
    headerHeight: DETAIL_HEADER_HEIGHT,
    bodyHeight: Math.max(1, height - DETAIL_HEADER_HEIGHT - DETAIL_FOOTER_HEIGHT),
    footerHeight: DETAIL_FOOTER_HEIGHT,
  };
}

export function formatRow<T>(options: SelectorOptions<T>, item: T, selected: boolean, width: number): string {
  const { renderer } = options;
  const max = width - 4;
  const title = truncate(renderer.title(item), max);
  const description = renderer.description(item);
  let line = (selected ? '> ' : '  ') + escapeTags(title);
  if (description) {
    line += ` - ${escapeTags(truncate(description, max))}`;
  }
  if (renderer.isSkippable(item)) {
    return `{gray-fg}${line}{/gray-fg}`;
  }
  return line;
}

export function threadPickStatus<T>(mode: ThreadPickMode<T>, preview: string): string {
  const key = THREAD_ACTION_KEYS[mode.action][0];
  return `[${mode.index + 1}/${mode.count}] ${preview} (${key}=next, Enter=select, Esc=cancel)`;
}

export function reactionPickStatus(mode: ReactionPickMode): string {
  return `React: [${mode.index + 1}/${REACTIONS.length}] ${REACTIONS[mode.index]} (x=next, Enter=add, Esc=cancel)`;
}

export function confirmationText(message: string): string {
  return `${message}\n\n${CONFIRMATION_SUFFIX}`;
}

/** Action hints for the selected item, in footer order. */
export function itemHints<T>(options: SelectorOptions<T>, item: T | undefined, view: 'list' | 'detail'): string[] {
  const resolved = item !== undefined && options.isResolved !== undefined && options.isResolved(item);
  return enabledActions(options)
    .filter(action => view === 'list' || (action !== 'refresh' && action !== 'filter'))
    .map(action => formatHint(actionHint(options, action, resolved)));
}

/** Transient pick status, shown in place of the hints. */
function pickStatus<T>(input: FrameInput<T>): string | null {
  const { mode, options } = input;
  if (mode.kind === 'reaction-pick') return reactionPickStatus(mode);
  if (mode.kind === 'thread-pick') {
    return threadPickStatus(mode, options.renderer.threadCommentPreview(mode.item, mode.index));
  }
  return null;
}

function overlayFor<T>(input: FrameInput<T>): Overlay | null {
  const { mode } = input;
  if (mode.kind === 'confirmation') {
    return { title: 'Confirm', content: escapeTags(confirmationText(mode.message)) };
  }
  if (mode.kind === 'help') {
    return { title: 'Help', content: escapeTags(helpText(input.options, baseView(mode))) };
  }
  return null;
}

export function helpText<T>(options: SelectorOptions<T>, base: Origin): string {
  const lines = ['Navigation', '  up/k, down/j       move', '  pgup/pgdn, g/G     page, first/last'];
  if (base.kind === 'detail') {
    lines.push('  ctrl+f/ctrl+b      scroll a page', '  enter              choose this item', '  q/esc              back to list');
  } else {
    lines.push('  enter/l            view detail', '  q                  quit');
  }
  const actions = enabledActions(options).map(action => actionHint(options, action, false));
  if (actions.length > 0) {
    lines.push('', 'Actions');
    for (const hint of actions) {
      lines.push(`  ${hint.key.padEnd(19)}${hint.description}`);
    }
  }
  lines.push('', 'Press any key to close.');
  return lines.join('\n');
}

export function renderFrame<T>(input: FrameInput<T>): Frame {
  const base = baseView(input.mode);
  const overlay = overlayFor(input);
  if (base.kind === 'detail') {
    return { ...detailFrame(input, base.content, base.scroll), overlay };
  }
  return { ...listFrame(input), overlay };
}

function listFrame<T>(input: FrameInput<T>): Omit<Frame, 'overlay'> {
  const { options, visible, cursor, dimensions } = input;
  const item = visible[cursor];
  const title = options.title ?? DEFAULT_TITLE;
  const filterNote = options.filter && input.filterActive ? ` [${options.filterLabel ?? 'filtered'}]` : '';
  const count = `${visible.length} ${visible.length === 1 ? 'item' : 'items'}`;

  let footer: string;
  const pick = pickStatus(input);
  if (pick !== null) {
    footer = escapeTags(pick);
  } else if (input.refreshing) {
    footer = REFRESHING_TEXT;
  } else {
    footer = ['enter:view', ...itemHints(options, item, 'list'), '?:help', 'q:quit'].join(HINT_SEPARATOR);
  }

  return {
    view: 'list',
    header: `${escapeTags(title)}  ${count}${escapeTags(filterNote)}`,
    rows: visible.map((entry, index) => formatRow(options, entry, index === cursor, dimensions.width)),
    cursor,
    body: '',
    scroll: 0,
    layout: listLayout(dimensions.height),
    footer,
    status: input.status,
  };
}

/** Wrapped to the pane width, one terminal row per line, then tag-escaped. */
export function detailBody(content: string, width: number): string {
  return wrapLines(content, width).map(escapeTags).join('\n');
}

function detailFrame<T>(input: FrameInput<T>, content: string | null, scroll: number): Omit<Frame, 'overlay'> {
  const { mode, options, visible, cursor, dimensions } = input;
  const item = visible[cursor];
  const hints = itemHints(options, item, 'detail');

  let text = content;
  let offset = scroll;
  if (mode.kind === 'thread-pick' && mode.highlight !== null) {
    text = mode.highlight;
    offset = mode.scroll;
  }
  const body = text === null ? LOADING_TEXT : detailBody(text, dimensions.width);

  const pick = pickStatus(input);
  const header = 'Detail View  ' + (pick !== null ? escapeTags(pick) : hints.join(HINT_SEPARATOR));

  return {
    view: 'detail',
    header,
    rows: [],
    cursor,
    body,
    scroll: offset,
    layout: detailLayout(dimensions.height),
    footer: ['q/esc:back', ...hints, 'ctrl+f/b:scroll'].join(HINT_SEPARATOR),
    status: input.status,
  };
}
