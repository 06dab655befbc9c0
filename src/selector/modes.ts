/**
 * Mode state of the selection engine. Exactly one mode is active; transient
 * modes carry a snapshot of the base view they return to.
 */

import type { EditorKind, ReactionTarget, ThreadAction } from './options.js';

export interface NormalMode {
  kind: 'normal';
}

export interface DetailMode {
  kind: 'detail';
  /** Null until the preview of the selected item has loaded. */
  content: string | null;
  scroll: number;
}

/** Base view a transient mode returns to. */
export type Origin = NormalMode | DetailMode;

export interface ThreadPickMode<T> {
  kind: 'thread-pick';
  action: ThreadAction;
  item: T;
  index: number;
  count: number;
  /** Preview with the current entry marked; only kept when picking from Detail. */
  highlight: string | null;
  scroll: number;
  origin: Origin;
}

export interface ReactionPickMode {
  kind: 'reaction-pick';
  target: ReactionTarget;
  index: number;
  origin: Origin;
}

export interface EditorSession<T> {
  item: T;
  kind: EditorKind;
  path: string;
}

export interface EditorPendingMode<T> {
  kind: 'editor-pending';
  session: EditorSession<T>;
  origin: Origin;
}

export interface ConfirmationMode {
  kind: 'confirmation';
  message: string;
  origin: Origin;
}

export interface HelpMode {
  kind: 'help';
  prior: Origin;
}

export type SelectorMode<T> =
  | NormalMode
  | DetailMode
  | ThreadPickMode<T>
  | ReactionPickMode
  | EditorPendingMode<T>
  | ConfirmationMode
  | HelpMode;

export const NORMAL: NormalMode = { kind: 'normal' };

export function baseView<T>(mode: SelectorMode<T>): Origin {
  switch (mode.kind) {
    case 'normal':
    case 'detail':
      return mode;
    case 'help':
      return mode.prior;
    default:
      return mode.origin;
  }
}

/** Next index in `[0, count)`, wrapping to 0. */
export function cycleIndex(index: number, count: number): number {
  if (count <= 0) return 0;
  return (index + 1) % count;
}
