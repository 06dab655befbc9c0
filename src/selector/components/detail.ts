import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedScreen, ComponentLifecycle } from '../types.js';
import type { Frame } from '../view.js';

export interface DetailComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

export class DetailComponent implements ComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private header: BlessedBox;
  private body: BlessedBox;
  private footer: BlessedBox;

  constructor(options: DetailComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.header = this.blessedImpl.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: 2,
      tags: true,
      hidden: true,
      style: { bold: true },
    });

    this.body = this.blessedImpl.box({
      parent: this.screen,
      top: 2,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
      hidden: true,
      scrollable: true,
      alwaysScroll: true,
      content: '',
    });

    this.footer = this.blessedImpl.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 2,
      tags: true,
      hidden: true,
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

    this.body.top = layout.headerHeight;
    this.body.height = layout.bodyHeight;
    this.body.setContent(frame.body);
    this.body.setScroll(frame.scroll);

    this.footer.height = layout.footerHeight;
    this.footer.setContent(`\n${frame.footer}`);
  }

  show(): void {
    this.header.show();
    this.body.show();
    this.footer.show();
  }

  hide(): void {
    this.header.hide();
    this.body.hide();
    this.footer.hide();
  }

  destroy(): void {
    this.footer.destroy();
    this.body.destroy();
    this.header.destroy();
  }
}
