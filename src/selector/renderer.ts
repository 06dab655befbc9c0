/**
 * Item renderer contract.
 *
 * The selection engine never reads fields of an item directly; everything it
 * shows or decides about an item goes through an {@link ItemRenderer}.
 */

export interface ItemRenderer<T> {
  /** Primary text of the list row. */
  title(item: T): string;
  /** Secondary text appended to the row as `title - description`. */
  description(item: T): string;
  /** Text matched by the `query` option. */
  filterValue(item: T): string;
  /** Rows rendered greyed out. */
  isSkippable(item: T): boolean;
  /**
   * Full detail text. `highlightIndex` is the thread entry to mark
   * (0 = root, 1.. = replies) or -1 for none.
   */
  previewWithHighlight(item: T, highlightIndex: number): string;
  /** 0 = not a thread, 1 = thread without replies, >1 = thread with replies. */
  threadCommentCount(item: T): number;
  /** One-line summary of the thread entry at `index`. */
  threadCommentPreview(item: T, index: number): string;
  /** Copy of `item` bound to the thread entry at `index`. */
  withSelectedComment(item: T, index: number): T;
}

export const NO_HIGHLIGHT = -1;

// Only threads with replies offer sub-selection.
export function supportsThreadPick<T>(renderer: ItemRenderer<T>, item: T): boolean {
  return renderer.threadCommentCount(item) > 1;
}
