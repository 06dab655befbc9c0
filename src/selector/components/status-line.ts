import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedScreen, ComponentLifecycle } from '../types.js';
import { escapeTags, type StatusLine, type StatusTone } from '../view.js';

export interface StatusLineOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

const TONE_TAGS: Record<StatusTone, string> = {
  info: 'yellow-fg',
  success: 'green-fg',
  error: 'red-fg',
};

/**
 * One-line transient status, painted just above the footer. Expiry is
 * driven by the engine, so the widget has no timer of its own.
 */
export class StatusLineComponent implements ComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private box: BlessedBox;
  private screen: BlessedScreen;

  constructor(options: StatusLineOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.box = this.blessedImpl.box({
      parent: this.screen,
      bottom: 3,
      left: 1,
      height: 1,
      width: '100%-2',
      tags: true,
      hidden: true,
      content: '',
    });
  }

  create(): this {
    return this;
  }

  render(status: StatusLine | null, footerHeight: number): void {
    if (!status || !status.text) {
      this.hide();
      return;
    }
    const tag = TONE_TAGS[status.tone];
    this.box.bottom = footerHeight;
    this.box.setContent(`{${tag}}${escapeTags(status.text)}{/${tag}}`);
    this.show();
  }

  show(): void {
    this.box.show();
    this.box.setFront();
  }

  hide(): void {
    this.box.hide();
  }

  destroy(): void {
    this.box.destroy();
  }
}
