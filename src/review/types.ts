/** A single entry of a review thread. */
export interface ReviewReply {
  id: number;
  author: string;
  body: string;
  htmlUrl: string;
  /** ISO-8601 timestamp; empty when unknown. */
  createdAt: string;
}

/** Root comment of a review thread, with its replies in posting order. */
export interface ReviewComment extends ReviewReply {
  /** GraphQL node id of the thread; empty when the thread could not be matched. */
  threadId: string;
  path: string;
  line: number;
  diffHunk: string;
  outdated: boolean;
  resolved: boolean;
  replies: ReviewReply[];
}

export type FileHeaderItem = {
  type: 'file';
  path: string;
};

export type CommentItem = {
  type: 'comment' | 'comment-preview';
  path: string;
  comment: ReviewComment;
  /** Thread entry actions apply to: 0 = root comment, n = n-th reply. */
  selectedCommentIndex: number;
};

export type BrowseItem = FileHeaderItem | CommentItem;

export function isCommentItem(item: BrowseItem): item is CommentItem {
  return item.type !== 'file';
}

/** Thread entry selected on the item; falls back to the root comment. */
export function selectedEntry(item: CommentItem): ReviewReply {
  const index = item.selectedCommentIndex;
  if (index > 0 && index - 1 < item.comment.replies.length) {
    return item.comment.replies[index - 1];
  }
  return item.comment;
}
