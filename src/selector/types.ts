// Common types for selector widgets
import type { Widgets } from 'blessed';

export type BlessedScreen = Widgets.Screen;
export type BlessedBox = Widgets.BoxElement;
export type BlessedList = Widgets.ListElement;

export interface BlessedFactory {
  screen: (options?: Widgets.IScreenOptions) => Widgets.Screen;
  box: (options?: Widgets.BoxOptions) => Widgets.BoxElement;
  list: (options?: Widgets.ListOptions<Widgets.ListElementStyle>) => Widgets.ListElement;
}

export interface ComponentLifecycle {
  create(): this;
  show(): void;
  hide(): void;
  destroy(): void;
}
