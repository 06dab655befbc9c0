/**
 * Terminal driver: the only part of the selector that talks to a real
 * terminal. The engine sees it through {@link TerminalDriver}, so tests can
 * swap in a fake that records frames and feeds keys.
 */

import type { Widgets } from 'blessed';
import { FALLBACK_HEIGHT, FALLBACK_WIDTH } from './constants.js';
import { DriverError, errorMessage, toError } from './errors.js';
import { createLayout, type SelectorLayout } from './layout.js';
import type { ExternalCompletion, ExternalRunner } from './subprocess.js';
import type { BlessedFactory } from './types.js';
import type { Dimensions, Frame } from './view.js';

export interface DriverHandlers {
  onKey(key: string): void;
  onResize(): void;
}

export interface TerminalDriver extends ExternalRunner {
  /** Enter the alternate screen and start delivering input. Throws {@link DriverError}. */
  start(handlers: DriverHandlers): void;
  dimensions(): Dimensions;
  draw(frame: Frame): void;
  destroy(): void;
}

export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

const NAMED_KEYS = new Set([
  'enter',
  'escape',
  'backspace',
  'tab',
  'up',
  'down',
  'left',
  'right',
  'pageup',
  'pagedown',
  'home',
  'end',
  'space',
]);

/**
 * Normalize a blessed keypress to the selector's key names. Printable
 * characters keep their case (`Q` differs from `q`); control chords become
 * `C-<key>`.
 */
export function normalizeKey(ch: string | undefined, key: KeyInfo | undefined): string | null {
  const name = key?.name;
  // blessed reports a carriage return as `return` and then again as `enter`.
  if (name === 'return') return null;
  if (key?.ctrl && name) return `C-${name}`;
  if (name && NAMED_KEYS.has(name)) return name;
  if (ch === ' ') return 'space';
  if (ch && ch.length === 1 && ch >= ' ') return ch;
  return name ?? null;
}

export interface BlessedDriverOptions {
  title?: string;
  blessed?: BlessedFactory;
  screenOptions?: Widgets.IScreenOptions;
  log?: (line: string) => void;
}

export class BlessedDriver implements TerminalDriver {
  private layout: SelectorLayout | null = null;
  private readonly options: BlessedDriverOptions;
  private readonly log: (line: string) => void;

  constructor(options: BlessedDriverOptions = {}) {
    this.options = options;
    this.log = options.log ?? (() => {});
  }

  start(handlers: DriverHandlers): void {
    let layout: SelectorLayout;
    try {
      layout = createLayout({
        blessed: this.options.blessed,
        title: this.options.title,
        screenOptions: this.options.screenOptions,
      });
    } catch (err) {
      throw new DriverError(`Failed to initialize terminal: ${errorMessage(err)}`, { cause: err });
    }
    this.layout = layout;
    layout.screen.on('keypress', (ch: string, key: Widgets.Events.IKeyEventArg) => {
      const name = normalizeKey(ch, key);
      if (name !== null) handlers.onKey(name);
    });
    layout.screen.on('resize', () => handlers.onResize());
  }

  dimensions(): Dimensions {
    const screen = this.layout?.screen;
    const width = Number(screen?.width);
    const height = Number(screen?.height);
    return {
      width: Number.isFinite(width) && width > 0 ? width : FALLBACK_WIDTH,
      height: Number.isFinite(height) && height > 0 ? height : FALLBACK_HEIGHT,
    };
  }

  draw(frame: Frame): void {
    const layout = this.requireLayout();
    if (frame.view === 'list') {
      layout.detailComponent.hide();
      layout.listComponent.render(frame);
      layout.listComponent.show();
    } else {
      layout.listComponent.hide();
      layout.detailComponent.render(frame);
      layout.detailComponent.show();
    }
    layout.statusLine.render(frame.status, frame.layout.footerHeight);
    layout.overlay.render(frame.overlay);
    layout.screen.render();
  }

  /**
   * Run a program in the foreground. blessed leaves the alternate screen,
   * hands stdio to the child and restores the screen once it exits.
   */
  exec(command: string, args: string[]): Promise<ExternalCompletion> {
    const layout = this.requireLayout();
    return new Promise(resolve => {
      let settled = false;
      // The callback can fire for both a spawn error and the exit that follows.
      const settle = (completion: ExternalCompletion) => {
        if (settled) return;
        settled = true;
        resolve(completion);
      };
      try {
        layout.screen.exec(command, args, {}, (err: Error | null | undefined, success: boolean) => {
          if (err) {
            settle({ ok: false, error: err });
          } else if (!success) {
            settle({ ok: false, error: new Error(`${command} exited with a non-zero status`) });
          } else {
            settle({ ok: true });
          }
          layout.screen.render();
        });
      } catch (err) {
        this.log(`exec ${command} threw: ${errorMessage(err)}`);
        settle({ ok: false, error: toError(err) });
      }
    });
  }

  destroy(): void {
    if (!this.layout) return;
    const { screen } = this.layout;
    this.layout = null;
    screen.destroy();
  }

  private requireLayout(): SelectorLayout {
    if (!this.layout) throw new DriverError('Terminal driver used before start()');
    return this.layout;
  }
}
