/**
 * Browse callbacks: wires review threads, the GitHub client and the
 * selector together.
 */

import type { ChalkInstance } from 'chalk';
import type { ReactionName, ReactionTarget, SelectorOptions } from '../selector/index.js';
import type { ReviewClient } from './client.js';
import { formatQuotedReply } from './quote.js';
import { BrowseItemRenderer } from './renderer.js';
import { buildCommentTree } from './tree.js';
import type { BrowseItem, CommentItem, ReviewComment } from './types.js';
import { selectedEntry } from './types.js';

export const REPLY_INSTRUCTIONS =
  '# Write your reply above. Trailing lines starting with # are ignored; an empty reply cancels.';

export interface BrowseContext {
  client: ReviewClient;
  pr: number;
  comments: ReviewComment[];
  /** Start with resolved threads hidden. */
  hideResolved?: boolean;
  openUrl: (url: string) => Promise<void>;
  chalk?: ChalkInstance;
  now?: () => Date;
  statusTimeoutMs?: number;
}

function requireComment(item: BrowseItem, action: string): CommentItem {
  if (item.type === 'file') throw new Error(`cannot ${action} file header`);
  return item;
}

/** Toggle the thread's resolved state on GitHub and mirror it locally. */
export async function toggleResolved(client: ReviewClient, comment: ReviewComment): Promise<string> {
  if (!comment.threadId) throw new Error('comment has no thread ID');
  if (comment.resolved) {
    await client.unresolveThread(comment.threadId);
    comment.resolved = false;
    return 'Marked as unresolved';
  }
  await client.resolveThread(comment.threadId);
  comment.resolved = true;
  return 'Marked as resolved';
}

async function postReply(client: ReviewClient, pr: number, comment: ReviewComment, body: string) {
  const reply = await client.replyToComment(pr, comment.id, body);
  // Shown in the detail view without a refresh.
  comment.replies.push(reply);
  return reply;
}

export function createBrowseOptions(context: BrowseContext): SelectorOptions<BrowseItem> {
  const { client, pr } = context;
  const collapsedFiles = new Set<string>();
  const renderer = new BrowseItemRenderer({ collapsedFiles, chalk: context.chalk, now: context.now });

  const quotePrepare = (includeContext: boolean) => (item: BrowseItem) => {
    const target = requireComment(item, 'quote reply to');
    const entry = selectedEntry(target);
    const { comment } = target;
    return formatQuotedReply(entry.author, entry.body, comment.diffHunk, comment.path, includeContext) + REPLY_INSTRUCTIONS + '\n';
  };

  const quoteComplete = async (item: BrowseItem, body: string) => {
    const target = requireComment(item, 'quote reply to');
    const reply = await postReply(client, pr, target.comment, body);
    return reply.htmlUrl ? `Posted a comment: ${reply.htmlUrl}` : `Posted comment ${reply.id}`;
  };

  return {
    items: buildCommentTree(context.comments),
    renderer,
    title: `PR #${pr} review threads`,
    filterDefault: context.hideResolved ?? true,
    filterLabel: 'hide resolved',
    statusTimeoutMs: context.statusTimeoutMs,

    onSelect: item => {
      if (item.type !== 'file') return '';
      if (collapsedFiles.has(item.path)) {
        collapsedFiles.delete(item.path);
        return `Expanded ${item.path}`;
      }
      collapsedFiles.add(item.path);
      return `Collapsed ${item.path}`;
    },

    onOpen: async item => {
      if (item.type === 'file') return '';
      const entry = selectedEntry(item);
      if (!entry.htmlUrl) throw new Error('comment has no URL');
      await context.openUrl(entry.htmlUrl);
      return `Opened comment ${entry.id} in browser`;
    },

    filter: (item, hideResolved) => {
      if (item.type !== 'file' && collapsedFiles.has(item.path)) return false;
      if (!hideResolved || item.type === 'file') return true;
      return !item.comment.resolved;
    },

    isResolved: item => item.type !== 'file' && item.comment.resolved,

    refreshItems: async () => buildCommentTree(await client.fetchReviewComments(pr)),

    resolveAction: async item => {
      if (item.type === 'file') return '';
      return toggleResolved(client, item.comment);
    },

    resolveWithComment: {
      prepare: item => {
        const target = requireComment(item, 'add comment to');
        if (!target.comment.threadId) throw new Error('comment has no thread ID');
        return `\n${REPLY_INSTRUCTIONS}\n`;
      },
      complete: async (item, body) => {
        const { comment } = requireComment(item, 'add comment to');
        const reply = await postReply(client, pr, comment, body);
        const status = await toggleResolved(client, comment);
        return reply.htmlUrl ? `${status}\nPosted a comment: ${reply.htmlUrl}` : status;
      },
    },

    quote: { prepare: quotePrepare(false), complete: quoteComplete },
    quoteWithContext: { prepare: quotePrepare(true), complete: quoteComplete },

    agentAction: item => {
      const target = requireComment(item, 'launch agent on');
      const { comment } = target;
      const body = selectedEntry(target).body;
      return { kind: 'launch', prompt: `Review comment on ${comment.path}:${comment.line}\n\n${body}` };
    },

    editAction: item => {
      const { comment } = requireComment(item, 'edit');
      return { kind: 'edit-file', path: comment.path, line: comment.line };
    },

    reaction: {
      target: item => selectedEntry(requireComment(item, 'react to')).id,
      complete: async (target: ReactionTarget, reaction: ReactionName) => {
        const id = Number(target);
        await client.addReaction(pr, id, reaction);
        let repo: string;
        try {
          repo = await client.getRepo();
        } catch {
          // The reaction landed; only the link is missing.
          return `${reaction} reaction added.`;
        }
        return `${reaction} reaction added: https://github.com/${repo}/pull/${pr}#discussion_r${id}`;
      },
    },
  };
}
