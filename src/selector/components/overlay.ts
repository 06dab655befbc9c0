import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedScreen, ComponentLifecycle } from '../types.js';
import type { Overlay } from '../view.js';

export interface OverlayComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/** Centered box used for help and confirmation messages. */
export class OverlayComponent implements ComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private backdrop: BlessedBox;
  private box: BlessedBox;

  constructor(options: OverlayComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.backdrop = this.blessedImpl.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%',
      hidden: true,
      style: { bg: 'black' },
    });

    this.box = this.blessedImpl.box({
      parent: this.screen,
      top: 'center',
      left: 'center',
      width: '70%',
      height: '60%',
      border: { type: 'line' },
      hidden: true,
      tags: true,
      padding: { left: 1, right: 1 },
      style: { border: { fg: 'cyan' } },
    });
  }

  create(): this {
    return this;
  }

  render(overlay: Overlay | null): void {
    if (!overlay) {
      this.hide();
      return;
    }
    this.box.setLabel(` ${overlay.title} `);
    this.box.setContent(overlay.content);
    this.show();
  }

  show(): void {
    this.backdrop.show();
    this.box.show();
    this.backdrop.setFront();
    this.box.setFront();
  }

  hide(): void {
    this.box.hide();
    this.backdrop.hide();
  }

  destroy(): void {
    this.box.destroy();
    this.backdrop.destroy();
  }
}
