/**
 * Selection engine: owns the item snapshot, the cursor and the mode state,
 * and turns driver input plus callback/subprocess completions into frames.
 *
 * All state changes happen while draining a single event queue. Callbacks
 * and subprocesses run off the queue and post their completion back onto
 * it, so two results never interleave. While one is outstanding, key events
 * are held (Ctrl-C excepted) and replayed once it settles.
 */

import {
  DEFAULT_FILTER_LABEL,
  DEFAULT_STATUS_TIMEOUT_MS,
  KEY_AGENT,
  KEY_BACK,
  KEY_CHOOSE,
  KEY_DOWN,
  KEY_EDIT,
  KEY_END,
  KEY_ENTER,
  KEY_FILTER_TOGGLE,
  KEY_FORCE_QUIT,
  KEY_HOME,
  KEY_OPEN,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_QUIT,
  KEY_QUOTE,
  KEY_QUOTE_CONTEXT,
  KEY_REACT,
  KEY_REFRESH,
  KEY_RESOLVE,
  KEY_RESOLVE_COMMENT,
  KEY_SCROLL_PAGE_DOWN,
  KEY_SCROLL_PAGE_UP,
  KEY_TOGGLE_HELP,
  KEY_UP,
  REACTIONS,
} from './constants.js';
import type { TerminalDriver } from './driver.js';
import { containsUrl, findHighlightLineOffset } from './editor-content.js';
import { EditorSessionError, errorMessage, toError } from './errors.js';
import type { DetailMode, EditorSession, Origin, ReactionPickMode, SelectorMode, ThreadPickMode } from './modes.js';
import { NORMAL, cycleIndex } from './modes.js';
import { NO_HIGHLIGHT, supportsThreadPick } from './renderer.js';
import type { Awaitable, EditorAction, EditorKind, SelectorOptions, ThreadAction } from './options.js';
import { THREAD_ACTION_KEYS } from './options.js';
import { SubprocessOrchestrator, type ExternalCompletion } from './subprocess.js';
import { detailLayout, listLayout, renderFrame, type StatusLine, type StatusTone } from './view.js';
import { wrapLines } from './wrap.js';

export type SelectionResult<T> = { ok: true; item: T } | { ok: false };

type RefreshResult<T> = { ok: true; items: T[] } | { ok: false; error: Error };

type ExternalKind = 'agent' | 'edit';

type EngineEvent<T> =
  | { type: 'key'; key: string }
  | { type: 'resize' }
  | { type: 'detail-loaded'; token: number }
  | { type: 'refresh-finished'; result: RefreshResult<T> }
  | { type: 'callback-settled'; apply: () => void }
  | { type: 'editor-finished'; session: EditorSession<T>; completion: ExternalCompletion }
  | { type: 'external-finished'; kind: ExternalKind; completion: ExternalCompletion }
  | { type: 'status-expired'; token: number };

export interface SelectionEngineDeps {
  driver: TerminalDriver;
  /** Defaults to an orchestrator that runs programs through `driver`. */
  subprocess?: SubprocessOrchestrator;
  log?: (line: string) => void;
}

function isPromise<V>(value: Awaitable<V>): value is Promise<V> {
  return value instanceof Promise;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class SelectionEngine<T> {
  private readonly options: SelectorOptions<T>;
  private readonly driver: TerminalDriver;
  private readonly subprocess: SubprocessOrchestrator;
  private readonly log: (line: string) => void;
  private readonly statusTimeoutMs: number;

  private items: T[];
  private visible: T[] = [];
  private cursor = 0;
  private mode: SelectorMode<T> = NORMAL;
  private filterActive: boolean;
  private refreshing = false;

  private status: StatusLine | null = null;
  private statusToken = 0;
  private statusTimer: NodeJS.Timeout | null = null;
  private detailToken = 0;
  private detailTimer: NodeJS.Immediate | null = null;

  private blocker: 'callback' | 'subprocess' | null = null;
  private queue: EngineEvent<T>[] = [];
  private draining = false;
  private finished = false;
  private settle: ((result: SelectionResult<T>) => void) | null = null;
  private fail: ((error: Error) => void) | null = null;

  constructor(options: SelectorOptions<T>, deps: SelectionEngineDeps) {
    this.options = options;
    this.driver = deps.driver;
    this.log = deps.log ?? (() => {});
    this.subprocess = deps.subprocess ?? new SubprocessOrchestrator({ runner: deps.driver, log: this.log });
    this.statusTimeoutMs = options.statusTimeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
    this.items = [...options.items];
    this.filterActive = options.filter !== undefined && options.filterDefault === true;
  }

  /**
   * Take over the terminal until the user chooses an item or quits. Rejects
   * only on fatal errors (terminal failure, editor session creation).
   */
  run(): Promise<SelectionResult<T>> {
    return new Promise<SelectionResult<T>>((resolve, reject) => {
      this.settle = resolve;
      this.fail = reject;
      this.rebuildVisible();
      try {
        this.driver.start({
          onKey: key => this.post({ type: 'key', key }),
          onResize: () => this.post({ type: 'resize' }),
        });
        this.render();
      } catch (err) {
        this.abort(err);
      }
    });
  }

  // ── Event loop ─────────────────────────────────────────────────────

  private post(event: EngineEvent<T>): void {
    if (this.finished) return;
    this.queue.push(event);
    this.drain();
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let event = this.next();
      while (event && !this.finished) {
        this.apply(event);
        event = this.next();
      }
      if (!this.finished) this.render();
    } catch (err) {
      this.abort(err);
    } finally {
      this.draining = false;
    }
  }

  /** Next runnable event; keys wait while a callback or subprocess is outstanding. */
  private next(): EngineEvent<T> | undefined {
    const index = this.blocker === null
      ? 0
      : this.queue.findIndex(event => event.type !== 'key' || event.key === KEY_FORCE_QUIT);
    if (index < 0 || index >= this.queue.length) return undefined;
    return this.queue.splice(index, 1)[0];
  }

  private apply(event: EngineEvent<T>): void {
    switch (event.type) {
      case 'key':
        this.handleKey(event.key);
        return;
      case 'resize':
        this.fitToSize();
        return;
      case 'detail-loaded':
        this.loadDetail(event.token);
        return;
      case 'refresh-finished':
        this.finishRefresh(event.result);
        return;
      case 'callback-settled':
        this.blocker = null;
        event.apply();
        return;
      case 'editor-finished':
        this.finishEditorSession(event.session, event.completion);
        return;
      case 'external-finished':
        this.finishExternal(event.kind, event.completion);
        return;
      case 'status-expired':
        if (event.token === this.statusToken) this.status = null;
        return;
    }
  }

  private render(): void {
    const frame = renderFrame({
      mode: this.mode,
      options: this.options,
      visible: this.visible,
      cursor: this.cursor,
      filterActive: this.filterActive,
      refreshing: this.refreshing,
      status: this.status,
      dimensions: this.driver.dimensions(),
    });
    this.driver.draw(frame);
  }

  private finish(result: SelectionResult<T>): void {
    if (this.finished) return;
    this.teardown();
    this.settle?.(result);
  }

  private abort(err: unknown): void {
    if (this.finished) return;
    this.log(`fatal: ${errorMessage(err)}`);
    this.teardown();
    this.fail?.(toError(err));
  }

  private teardown(): void {
    this.finished = true;
    this.queue = [];
    if (this.statusTimer) clearTimeout(this.statusTimer);
    if (this.detailTimer) clearImmediate(this.detailTimer);
    if (this.mode.kind === 'editor-pending') {
      this.subprocess.discardEditorSession(this.mode.session);
    }
    this.driver.destroy();
  }

  // ── Shared state helpers ───────────────────────────────────────────

  private selected(): T | undefined {
    return this.visible[this.cursor];
  }

  /** Recompute the visible projection, keeping the cursor on the same item when it survives. */
  private rebuildVisible(): void {
    const previous = this.visible[this.cursor];
    const { filter, renderer } = this.options;
    const query = (this.options.query ?? '').trim().toLowerCase();
    this.visible = this.items.filter(item => {
      if (filter && !filter(item, this.filterActive)) return false;
      if (query && !renderer.filterValue(item).toLowerCase().includes(query)) return false;
      return true;
    });
    const kept = previous === undefined ? -1 : this.visible.indexOf(previous);
    this.cursor = kept >= 0 ? kept : clamp(this.cursor, 0, Math.max(0, this.visible.length - 1));
  }

  private setStatus(text: string, tone: StatusTone = 'info'): void {
    if (this.statusTimer) clearTimeout(this.statusTimer);
    this.statusTimer = null;
    const token = ++this.statusToken;
    if (!text) {
      this.status = null;
      return;
    }
    this.status = { text, tone };
    this.statusTimer = setTimeout(() => this.post({ type: 'status-expired', token }), this.statusTimeoutMs);
    this.statusTimer.unref();
  }

  /**
   * Run a user callback. Synchronous results apply immediately; promises
   * block key input until they settle. A failure shows an error status and
   * restores the mode that was active when the callback was invoked.
   */
  private invoke<R>(call: () => Awaitable<R>, onSuccess: (value: R) => void): void {
    const before = this.mode;
    const onError = (err: unknown) => {
      this.log(`callback failed: ${errorMessage(err)}`);
      this.mode = before;
      this.setStatus(errorMessage(err), 'error');
    };
    let result: Awaitable<R>;
    try {
      result = call();
    } catch (err) {
      onError(err);
      return;
    }
    if (!isPromise(result)) {
      onSuccess(result);
      return;
    }
    this.blocker = 'callback';
    void result.then(
      value => this.post({ type: 'callback-settled', apply: () => onSuccess(value) }),
      (err: unknown) => this.post({ type: 'callback-settled', apply: () => onError(err) }),
    );
  }

  /** Current detail mode with its preview recomputed, or the origin unchanged. */
  private refreshed(origin: Origin): Origin {
    if (origin.kind !== 'detail') return origin;
    const item = this.selected();
    if (item === undefined) return NORMAL;
    return { ...origin, content: this.options.renderer.previewWithHighlight(item, NO_HIGHLIGHT) };
  }

  // ── Key dispatch ───────────────────────────────────────────────────

  private handleKey(key: string): void {
    if (key === KEY_FORCE_QUIT) {
      this.finish({ ok: false });
      return;
    }
    const mode = this.mode;
    switch (mode.kind) {
      case 'help':
        this.mode = mode.prior;
        return;
      case 'confirmation':
        this.mode = mode.origin;
        return;
      case 'thread-pick':
        this.handleThreadPickKey(mode, key);
        return;
      case 'reaction-pick':
        this.handleReactionPickKey(mode, key);
        return;
      case 'editor-pending':
        return;
      case 'detail':
        this.handleDetailKey(mode, key);
        return;
      case 'normal':
        this.handleNormalKey(key);
        return;
    }
  }

  private handleNormalKey(key: string): void {
    const page = listLayout(this.driver.dimensions().height).bodyHeight;
    if (KEY_QUIT.includes(key)) {
      this.finish({ ok: false });
    } else if (KEY_TOGGLE_HELP.includes(key)) {
      this.mode = { kind: 'help', prior: NORMAL };
    } else if (KEY_UP.includes(key)) {
      this.moveCursor(-1);
    } else if (KEY_DOWN.includes(key)) {
      this.moveCursor(1);
    } else if (KEY_PAGE_UP.includes(key)) {
      this.moveCursor(-page);
    } else if (KEY_PAGE_DOWN.includes(key)) {
      this.moveCursor(page);
    } else if (KEY_HOME.includes(key)) {
      this.cursor = 0;
    } else if (KEY_END.includes(key)) {
      this.cursor = Math.max(0, this.visible.length - 1);
    } else if (KEY_CHOOSE.includes(key)) {
      this.openDetail();
    } else if (KEY_FILTER_TOGGLE.includes(key)) {
      this.toggleFilter();
    } else if (KEY_REFRESH.includes(key)) {
      this.refresh();
    } else {
      this.handleActionKey(key, NORMAL);
    }
  }

  private handleDetailKey(mode: DetailMode, key: string): void {
    const page = detailLayout(this.driver.dimensions().height).bodyHeight;
    if (KEY_ENTER.includes(key)) {
      const item = this.selected();
      if (item !== undefined) this.finish({ ok: true, item });
    } else if (KEY_BACK.includes(key)) {
      this.mode = NORMAL;
    } else if (KEY_TOGGLE_HELP.includes(key)) {
      this.mode = { kind: 'help', prior: mode };
    } else if (KEY_UP.includes(key)) {
      this.scrollDetail(mode, -1, page);
    } else if (KEY_DOWN.includes(key)) {
      this.scrollDetail(mode, 1, page);
    } else if (KEY_SCROLL_PAGE_UP.includes(key) || KEY_PAGE_UP.includes(key)) {
      this.scrollDetail(mode, -page, page);
    } else if (KEY_SCROLL_PAGE_DOWN.includes(key) || KEY_PAGE_DOWN.includes(key)) {
      this.scrollDetail(mode, page, page);
    } else {
      this.handleActionKey(key, mode);
    }
  }

  private moveCursor(delta: number): void {
    if (this.visible.length === 0) return;
    this.cursor = clamp(this.cursor + delta, 0, this.visible.length - 1);
  }

  private scrollDetail(mode: DetailMode, delta: number, page: number): void {
    const rows = mode.content === null ? 0 : wrapLines(mode.content, this.driver.dimensions().width).length;
    const max = Math.max(0, rows - page);
    this.mode = { ...mode, scroll: clamp(mode.scroll + delta, 0, max) };
  }

  /** Wrapped row counts change with the width; keep offsets in range. */
  private fitToSize(): void {
    const mode = this.mode;
    if (mode.kind === 'detail') {
      this.scrollDetail(mode, 0, detailLayout(this.driver.dimensions().height).bodyHeight);
    } else if (mode.kind === 'thread-pick') {
      this.mode = this.highlighted(mode);
    }
  }

  /** Item actions shared by the list and detail views. */
  private handleActionKey(key: string, origin: Origin): void {
    const item = this.selected();
    if (item === undefined) return;
    const { options } = this;
    const threaded = supportsThreadPick(options.renderer, item);

    if (KEY_OPEN.includes(key) && options.onOpen) {
      const onOpen = options.onOpen;
      this.invoke(() => onOpen(item), message => this.setStatus(message));
    } else if (KEY_RESOLVE.includes(key) && options.resolveAction) {
      const resolve = options.resolveAction;
      this.invoke(() => resolve(item), message => {
        this.mode = this.refreshed(origin);
        this.setStatus(message);
      });
    } else if (KEY_RESOLVE_COMMENT.includes(key) && options.resolveWithComment) {
      this.startEditor(item, 'resolve-comment', origin);
    } else if (KEY_QUOTE.includes(key) && options.quote) {
      this.threadOr('quote', item, origin, threaded, () => this.startEditor(item, 'quote', origin));
    } else if (KEY_QUOTE_CONTEXT.includes(key) && options.quoteWithContext) {
      this.threadOr('quote-context', item, origin, threaded, () => this.startEditor(item, 'quote-context', origin));
    } else if (KEY_AGENT.includes(key) && options.agentAction) {
      this.threadOr('agent', item, origin, threaded, () => this.runAgent(item));
    } else if (KEY_EDIT.includes(key) && options.editAction) {
      this.runEdit(item);
    } else if (KEY_REACT.includes(key) && options.reaction) {
      this.threadOr('react', item, origin, threaded, () => this.startReaction(item, origin));
    }
  }

  private threadOr(action: ThreadAction, item: T, origin: Origin, threaded: boolean, direct: () => void): void {
    if (threaded) {
      this.enterThreadPick(action, item, origin);
    } else {
      direct();
    }
  }

  // ── Detail ─────────────────────────────────────────────────────────

  private openDetail(): void {
    const item = this.selected();
    if (item === undefined) return;
    const enter = () => {
      this.mode = { kind: 'detail', content: null, scroll: 0 };
      const token = ++this.detailToken;
      this.detailTimer = setImmediate(() => {
        this.detailTimer = null;
        this.post({ type: 'detail-loaded', token });
      });
    };
    const onSelect = this.options.onSelect;
    if (!onSelect) {
      enter();
      return;
    }
    this.invoke(() => onSelect(item), message => {
      // Selection callbacks may change what is visible (collapsing a group).
      this.rebuildVisible();
      if (message) {
        this.setStatus(message);
        return;
      }
      enter();
    });
  }

  private loadDetail(token: number): void {
    if (token !== this.detailToken || this.mode.kind !== 'detail') return;
    const item = this.selected();
    if (item === undefined) {
      this.mode = NORMAL;
      return;
    }
    this.mode = { kind: 'detail', content: this.options.renderer.previewWithHighlight(item, NO_HIGHLIGHT), scroll: 0 };
  }

  // ── Filter and refresh ─────────────────────────────────────────────

  private toggleFilter(): void {
    if (!this.options.filter) return;
    this.filterActive = !this.filterActive;
    this.rebuildVisible();
    const label = this.options.filterLabel ?? DEFAULT_FILTER_LABEL;
    this.setStatus(this.filterActive ? `Filter on: ${label}` : 'Showing all');
  }

  private refresh(): void {
    const refreshItems = this.options.refreshItems;
    if (!refreshItems || this.refreshing) return;
    this.refreshing = true;
    void Promise.resolve()
      .then(() => refreshItems())
      .then(
        items => this.post({ type: 'refresh-finished', result: { ok: true, items } }),
        (err: unknown) => this.post({ type: 'refresh-finished', result: { ok: false, error: toError(err) } }),
      );
  }

  private finishRefresh(result: RefreshResult<T>): void {
    this.refreshing = false;
    if (!result.ok) {
      this.setStatus(`Refresh failed: ${result.error.message}`, 'error');
      return;
    }
    this.items = [...result.items];
    this.rebuildVisible();
    if (this.mode.kind === 'detail') this.mode = this.refreshed(this.mode);
    this.setStatus(`Refreshed: ${result.items.length} items`, 'success');
  }

  // ── Thread pick ────────────────────────────────────────────────────

  private enterThreadPick(action: ThreadAction, item: T, origin: Origin): void {
    const count = this.options.renderer.threadCommentCount(item);
    this.mode = this.highlighted({ kind: 'thread-pick', action, item, index: 0, count, highlight: null, scroll: 0, origin });
  }

  private highlighted(mode: ThreadPickMode<T>): ThreadPickMode<T> {
    if (mode.origin.kind !== 'detail') return mode;
    const highlight = this.options.renderer.previewWithHighlight(mode.item, mode.index);
    return { ...mode, highlight, scroll: findHighlightLineOffset(highlight, this.driver.dimensions().width) ?? 0 };
  }

  private handleThreadPickKey(mode: ThreadPickMode<T>, key: string): void {
    if (KEY_ENTER.includes(key)) {
      this.executeThreadAction(mode);
      return;
    }
    if (THREAD_ACTION_KEYS[mode.action].includes(key)) {
      this.mode = this.highlighted({ ...mode, index: cycleIndex(mode.index, mode.count) });
      return;
    }
    // Escape or any other key cancels; the key itself is not dispatched.
    this.mode = mode.origin;
    this.setStatus('Selection cancelled');
  }

  private executeThreadAction(mode: ThreadPickMode<T>): void {
    const item = this.options.renderer.withSelectedComment(mode.item, mode.index);
    const origin = mode.origin;
    this.mode = origin;
    switch (mode.action) {
      case 'quote':
      case 'quote-context':
        this.startEditor(item, mode.action, origin);
        return;
      case 'agent':
        this.runAgent(item);
        return;
      case 'react':
        this.startReaction(item, origin);
        return;
    }
  }

  // ── Editor sessions ────────────────────────────────────────────────

  private editorAction(kind: EditorKind): EditorAction<T> | undefined {
    switch (kind) {
      case 'resolve-comment': return this.options.resolveWithComment;
      case 'quote': return this.options.quote;
      case 'quote-context': return this.options.quoteWithContext;
    }
  }

  private startEditor(item: T, kind: EditorKind, origin: Origin): void {
    const action = this.editorAction(kind);
    if (!action) return;
    this.invoke(() => action.prepare(item), content => {
      let session: EditorSession<T>;
      try {
        session = this.subprocess.openEditorSession(item, kind, content);
      } catch (err) {
        if (err instanceof EditorSessionError) throw err;
        this.setStatus(errorMessage(err), 'error');
        return;
      }
      this.mode = { kind: 'editor-pending', session, origin };
      this.blocker = 'subprocess';
      void this.subprocess
        .runEditorSession(session)
        .then(completion => this.post({ type: 'editor-finished', session, completion }));
    });
  }

  private finishEditorSession(session: EditorSession<T>, completion: ExternalCompletion): void {
    this.blocker = null;
    const origin = this.refreshed(this.mode.kind === 'editor-pending' ? this.mode.origin : NORMAL);
    this.mode = origin;

    if (!completion.ok) {
      this.subprocess.discardEditorSession(session);
      this.setStatus(`Editor error: ${completion.error.message}`, 'error');
      return;
    }
    const collected = this.subprocess.collectEditorSession(session);
    if (collected.kind === 'error') {
      this.setStatus(collected.error.message, 'error');
      return;
    }
    if (collected.kind === 'cancelled') {
      this.setStatus('Cancelled (empty content)');
      return;
    }
    const action = this.editorAction(session.kind);
    if (!action) return;
    this.invoke(() => action.complete(session.item, collected.text), result => this.showResult(result, origin));
  }

  /** Results containing a link are worth a keypress; anything else is a status line. */
  private showResult(result: string, origin: Origin): void {
    const current = this.refreshed(origin);
    if (containsUrl(result)) {
      this.mode = { kind: 'confirmation', message: result, origin: current };
      return;
    }
    this.mode = current;
    this.setStatus(result);
  }

  // ── Agent and file editing ─────────────────────────────────────────

  private runAgent(item: T): void {
    const agentAction = this.options.agentAction;
    if (!agentAction) return;
    this.invoke(() => agentAction(item), outcome => {
      if (outcome.kind === 'status') {
        this.setStatus(outcome.message);
        return;
      }
      this.runExternal('agent', () => this.subprocess.launchAgent(outcome.prompt));
    });
  }

  private runEdit(item: T): void {
    const editAction = this.options.editAction;
    if (!editAction) return;
    this.invoke(() => editAction(item), outcome => {
      if (outcome.kind === 'status') {
        this.setStatus(outcome.message);
        return;
      }
      this.runExternal('edit', () => this.subprocess.editFile(outcome.path, outcome.line));
    });
  }

  private runExternal(kind: ExternalKind, start: () => Promise<ExternalCompletion>): void {
    this.blocker = 'subprocess';
    void start().then(completion => this.post({ type: 'external-finished', kind, completion }));
  }

  private finishExternal(kind: ExternalKind, completion: ExternalCompletion): void {
    this.blocker = null;
    if (this.mode.kind === 'detail') this.mode = this.refreshed(this.mode);
    if (!completion.ok) {
      this.setStatus(`${kind === 'agent' ? 'Agent' : 'Editor'} error: ${completion.error.message}`, 'error');
      return;
    }
    if (kind === 'agent') this.setStatus('Agent completed', 'success');
  }

  // ── Reactions ──────────────────────────────────────────────────────

  private startReaction(item: T, origin: Origin): void {
    const reaction = this.options.reaction;
    if (!reaction) return;
    this.invoke(() => reaction.target(item), target => {
      this.mode = { kind: 'reaction-pick', target, index: 0, origin };
    });
  }

  private handleReactionPickKey(mode: ReactionPickMode, key: string): void {
    const reaction = this.options.reaction;
    if (KEY_REACT.includes(key)) {
      this.mode = { ...mode, index: cycleIndex(mode.index, REACTIONS.length) };
      return;
    }
    this.mode = mode.origin;
    if (!KEY_ENTER.includes(key) || !reaction) {
      this.setStatus('Reaction cancelled');
      return;
    }
    const name = REACTIONS[mode.index];
    this.invoke(() => reaction.complete(mode.target, name), message => {
      const current = this.refreshed(mode.origin);
      this.mode = message ? { kind: 'confirmation', message, origin: current } : current;
    });
  }
}
