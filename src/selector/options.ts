/**
 * Selector options record.
 *
 * Every callback is optional. Leaving one unset removes its key binding and
 * its footer/help entry, which is how the engine stays domain-agnostic.
 */

import type { ItemRenderer } from './renderer.js';
import type { ReactionName } from './constants.js';
import {
  KEY_AGENT,
  KEY_EDIT,
  KEY_QUOTE,
  KEY_QUOTE_CONTEXT,
  KEY_REACT,
  DEFAULT_FILTER_LABEL,
} from './constants.js';

export type Awaitable<V> = V | Promise<V>;

/** Returns a status line; an empty string shows nothing. */
export type StatusAction<T> = (item: T) => Awaitable<string>;

/** Produces the initial text of an editor session. */
export type EditorPreparer<T> = (item: T) => Awaitable<string>;

/** Consumes the sanitized editor text and returns a status or confirmation. */
export type EditorCompleter<T> = (item: T, body: string) => Awaitable<string>;

export interface EditorAction<T> {
  prepare: EditorPreparer<T>;
  complete: EditorCompleter<T>;
}

export type AgentOutcome =
  | { kind: 'status'; message: string }
  | { kind: 'launch'; prompt: string };

export type EditOutcome =
  | { kind: 'status'; message: string }
  | { kind: 'edit-file'; path: string; line: number };

export type ReactionTarget = string | number;

export interface ReactionAction<T> {
  /** Identifier of the entry the reaction applies to. */
  target: (item: T) => Awaitable<ReactionTarget>;
  complete: (target: ReactionTarget, reaction: ReactionName) => Awaitable<string>;
}

export interface SelectorOptions<T> {
  items: readonly T[];
  renderer: ItemRenderer<T>;
  title?: string;

  onSelect?: StatusAction<T>;
  onOpen?: StatusAction<T>;
  filter?: (item: T, filterActive: boolean) => boolean;
  filterDefault?: boolean;
  filterLabel?: string;
  query?: string;
  isResolved?: (item: T) => boolean;
  refreshItems?: () => Awaitable<T[]>;

  resolveAction?: StatusAction<T>;
  resolveWithComment?: EditorAction<T>;
  quote?: EditorAction<T>;
  quoteWithContext?: EditorAction<T>;
  agentAction?: (item: T) => Awaitable<AgentOutcome>;
  editAction?: (item: T) => Awaitable<EditOutcome>;
  reaction?: ReactionAction<T>;

  statusTimeoutMs?: number;
}

export type EditorKind = 'resolve-comment' | 'quote' | 'quote-context';

/** Actions that can target a single entry of a thread. */
export type ThreadAction = 'quote' | 'quote-context' | 'agent' | 'react';

export const THREAD_ACTION_KEYS: Record<ThreadAction, string[]> = {
  quote: KEY_QUOTE,
  'quote-context': KEY_QUOTE_CONTEXT,
  agent: KEY_AGENT,
  react: KEY_REACT,
};

export type FooterAction =
  | 'open'
  | 'resolve'
  | 'resolve-comment'
  | 'quote'
  | 'quote-context'
  | 'agent'
  | 'edit'
  | 'react'
  | 'refresh'
  | 'filter';

// Fixed priority order; the footer and help text follow it.
const FOOTER_ORDER: FooterAction[] = [
  'open',
  'resolve',
  'resolve-comment',
  'quote',
  'quote-context',
  'agent',
  'edit',
  'react',
  'refresh',
  'filter',
];

function isEnabled<T>(options: SelectorOptions<T>, action: FooterAction): boolean {
  switch (action) {
    case 'open': return options.onOpen !== undefined;
    case 'resolve': return options.resolveAction !== undefined;
    case 'resolve-comment': return options.resolveWithComment !== undefined;
    case 'quote': return options.quote !== undefined;
    case 'quote-context': return options.quoteWithContext !== undefined;
    case 'agent': return options.agentAction !== undefined;
    case 'edit': return options.editAction !== undefined;
    case 'react': return options.reaction !== undefined;
    case 'refresh': return options.refreshItems !== undefined;
    case 'filter': return options.filter !== undefined;
  }
}

export function enabledActions<T>(options: SelectorOptions<T>): FooterAction[] {
  return FOOTER_ORDER.filter(action => isEnabled(options, action));
}

export interface ActionHint {
  key: string;
  description: string;
}

/**
 * Key and description shown for an action. Resolve actions flip to their
 * "unresolve" wording when the selected item is already resolved.
 */
export function actionHint<T>(options: SelectorOptions<T>, action: FooterAction, resolved: boolean): ActionHint {
  switch (action) {
    case 'open': return { key: 'o', description: 'open' };
    case 'resolve': return resolved ? { key: 'u', description: 'unresolve' } : { key: 'r', description: 'resolve' };
    case 'resolve-comment':
      return resolved ? { key: 'U', description: 'unresolve+comment' } : { key: 'R', description: 'resolve+comment' };
    case 'quote': return { key: KEY_QUOTE[0], description: 'quote' };
    case 'quote-context': return { key: KEY_QUOTE_CONTEXT[0], description: 'quote+context' };
    case 'agent': return { key: KEY_AGENT[0], description: 'agent' };
    case 'edit': return { key: KEY_EDIT[0], description: 'edit' };
    case 'react': return { key: KEY_REACT[0], description: 'react' };
    case 'refresh': return { key: 'i', description: 'refresh' };
    case 'filter': return { key: 'h', description: options.filterLabel ?? DEFAULT_FILTER_LABEL };
  }
}

export function formatHint(hint: ActionHint): string {
  return `${hint.key}:${hint.description}`;
}
