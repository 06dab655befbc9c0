/**
 * Interactive list selector with a detail view, thread sub-selection,
 * reactions and editor/agent hand-off.
 */

import { BlessedDriver, type TerminalDriver } from './driver.js';
import { SelectionEngine, type SelectionResult } from './engine.js';
import type { ItemRenderer } from './renderer.js';
import type { SelectorOptions } from './options.js';
import { SubprocessOrchestrator } from './subprocess.js';

export interface SelectDeps {
  /** Defaults to a blessed driver on the process terminal. */
  driver?: TerminalDriver;
  /** Configured editor command, used when `$EDITOR` is unset. */
  editor?: string;
  /** Configured agent command, used when the agent variable is unset. */
  agent?: string;
  env?: NodeJS.ProcessEnv;
  log?: (line: string) => void;
}

export function select<T>(options: SelectorOptions<T>, deps: SelectDeps = {}): Promise<SelectionResult<T>> {
  const driver = deps.driver ?? new BlessedDriver({ title: options.title, log: deps.log });
  const subprocess = new SubprocessOrchestrator({
    runner: driver,
    editor: deps.editor,
    agent: deps.agent,
    env: deps.env,
    log: deps.log,
  });
  return new SelectionEngine(options, { driver, subprocess, log: deps.log }).run();
}

/** Shorthand for {@link select} with items and renderer passed positionally. */
export function run<T>(
  items: readonly T[],
  renderer: ItemRenderer<T>,
  options: Omit<SelectorOptions<T>, 'items' | 'renderer'> = {},
  deps: SelectDeps = {},
): Promise<SelectionResult<T>> {
  return select({ ...options, items, renderer }, deps);
}

export { SelectionEngine } from './engine.js';
export type { SelectionResult, SelectionEngineDeps } from './engine.js';
export { BlessedDriver, normalizeKey } from './driver.js';
export type { TerminalDriver, DriverHandlers } from './driver.js';
export { DriverError, EditorSessionError } from './errors.js';
export { NO_HIGHLIGHT, supportsThreadPick } from './renderer.js';
export type { ItemRenderer } from './renderer.js';
export type * from './options.js';
export { enabledActions } from './options.js';
export { REACTIONS } from './constants.js';
export type { ReactionName } from './constants.js';
export { sanitizeEditorContent, findHighlightLineOffset, containsUrl } from './editor-content.js';
export { SubprocessOrchestrator, resolveAgentCommand, resolveEditorCommand } from './subprocess.js';
export type { ExternalCompletion, ExternalRunner, EditorCollection } from './subprocess.js';
export { renderFrame } from './view.js';
export type { Frame, Dimensions, StatusLine } from './view.js';
