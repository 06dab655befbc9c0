import type { BrowseItem, ReviewComment } from './types.js';

/**
 * Flatten comments into file headers followed by their comments, each
 * comment followed by a one-line preview row. Files sort by path, comments
 * within a file by line.
 */
export function buildCommentTree(comments: readonly ReviewComment[]): BrowseItem[] {
  const byPath = new Map<string, ReviewComment[]>();
  for (const comment of comments) {
    const group = byPath.get(comment.path);
    if (group) {
      group.push(comment);
    } else {
      byPath.set(comment.path, [comment]);
    }
  }

  const items: BrowseItem[] = [];
  const paths = [...byPath.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const path of paths) {
    items.push({ type: 'file', path });
    const group = [...(byPath.get(path) ?? [])].sort((a, b) => a.line - b.line);
    for (const comment of group) {
      items.push({ type: 'comment', path, comment, selectedCommentIndex: 0 });
      items.push({ type: 'comment-preview', path, comment, selectedCommentIndex: 0 });
    }
  }
  return items;
}
