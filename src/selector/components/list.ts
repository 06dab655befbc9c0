import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedList, BlessedScreen, ComponentLifecycle } from '../types.js';
import type { Frame } from '../view.js';

export interface ListComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/** Header, item rows and key-hint footer of the list view. */
export class ListComponent implements ComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private header: BlessedBox;
  private list: BlessedList;
  private footer: BlessedBox;

  constructor(options: ListComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.header = this.blessedImpl.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: 2,
      tags: true,
      style: { bold: true },
    });

    // Navigation is owned by the engine; the list only paints rows.
    this.list = this.blessedImpl.list({
      parent: this.screen,
      top: 2,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
      keys: false,
      mouse: false,
      style: {
        selected: { bg: 'blue' },
      },
    });

    this.footer = this.blessedImpl.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 3,
      tags: true,
      style: { fg: 'grey' },
    });
  }

  create(): this {
    return this;
  }

  render(frame: Frame): void {
    const { layout } = frame;
    this.header.height = layout.headerHeight;
    this.header.setContent(frame.header);

    this.list.top = layout.headerHeight;
    this.list.height = layout.bodyHeight;
    this.list.setItems(frame.rows);
    if (frame.rows.length > 0) this.list.select(frame.cursor);

    this.footer.height = layout.footerHeight;
    this.footer.setContent(`\n${frame.footer}`);
  }

  show(): void {
    this.header.show();
    this.list.show();
    this.footer.show();
  }

  hide(): void {
    this.header.hide();
    this.list.hide();
    this.footer.hide();
  }

  destroy(): void {
    this.footer.destroy();
    this.list.destroy();
    this.header.destroy();
  }
}
