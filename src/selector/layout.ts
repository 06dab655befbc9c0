/**
 * Layout factory: creates the blessed screen and the selector widgets
 * without wiring any key handling.
 */

import blessed from 'blessed';
import type { Widgets } from 'blessed';
import type { BlessedFactory, BlessedScreen } from './types.js';
import { DetailComponent, ListComponent, OverlayComponent, StatusLineComponent } from './components/index.js';

export interface SelectorLayout {
  screen: BlessedScreen;
  listComponent: ListComponent;
  detailComponent: DetailComponent;
  statusLine: StatusLineComponent;
  overlay: OverlayComponent;
}

export interface CreateLayoutOptions {
  /** A blessed-compatible factory. When omitted the real `blessed` module is used. */
  blessed?: BlessedFactory;
  title?: string;
  /** Forwarded to `blessed.screen()`. */
  screenOptions?: Widgets.IScreenOptions;
}

export function createLayout(options: CreateLayoutOptions = {}): SelectorLayout {
  const blessedImpl: BlessedFactory = options.blessed || blessed;

  const screen = blessedImpl.screen({
    smartCSR: true,
    fullUnicode: true,
    title: options.title ?? 'review-threads',
    ...options.screenOptions,
  });

  const listComponent = new ListComponent({ parent: screen, blessed: blessedImpl }).create();
  const detailComponent = new DetailComponent({ parent: screen, blessed: blessedImpl }).create();
  const statusLine = new StatusLineComponent({ parent: screen, blessed: blessedImpl }).create();
  // Created last so it stacks above everything else.
  const overlay = new OverlayComponent({ parent: screen, blessed: blessedImpl }).create();

  return { screen, listComponent, detailComponent, statusLine, overlay };
}
