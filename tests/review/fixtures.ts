import { GitHubError, type ReviewClient } from '../../src/review/client.js';
import type { ReviewComment, ReviewReply } from '../../src/review/types.js';
import type { ReactionName } from '../../src/selector/index.js';

export function makeComment(overrides: Partial<ReviewComment> = {}): ReviewComment {
  return {
    id: 101,
    author: 'alice',
    body: 'Please rename this.',
    htmlUrl: 'https://github.com/octo/widgets/pull/7#discussion_r101',
    createdAt: '2026-10-19T10:00:00Z',
    threadId: 'T_101',
    path: 'src/app.ts',
    line: 12,
    diffHunk: '@@ -10,3 +10,3 @@\n const a = 1;\n-let total = 1;\n+let total = 2;',
    outdated: false,
    resolved: false,
    replies: [],
    ...overrides,
  };
}

export function makeReply(overrides: Partial<ReviewReply> = {}): ReviewReply {
  return {
    id: 102,
    author: 'bob',
    body: 'Agreed.',
    htmlUrl: 'https://github.com/octo/widgets/pull/7#discussion_r102',
    createdAt: '2026-10-19T11:30:00Z',
    ...overrides,
  };
}

/** Records every call; GitHub state lives in plain arrays. */
export class MemoryReviewClient implements ReviewClient {
  comments: ReviewComment[] = [];
  posted: Array<{ pr: number; commentId: number; body: string }> = [];
  resolvedThreads: string[] = [];
  unresolvedThreads: string[] = [];
  reactions: Array<{ pr: number; commentId: number; reaction: ReactionName }> = [];
  repo: string | null = 'octo/widgets';
  private nextId = 500;

  async fetchReviewComments(): Promise<ReviewComment[]> {
    return this.comments;
  }

  async replyToComment(pr: number, commentId: number, body: string): Promise<ReviewReply> {
    this.posted.push({ pr, commentId, body });
    const id = this.nextId++;
    return { id, author: 'me', body, htmlUrl: `https://github.com/octo/widgets/pull/${pr}#discussion_r${id}`, createdAt: '' };
  }

  async resolveThread(threadId: string): Promise<void> {
    this.resolvedThreads.push(threadId);
  }

  async unresolveThread(threadId: string): Promise<void> {
    this.unresolvedThreads.push(threadId);
  }

  async addReaction(pr: number, commentId: number, reaction: ReactionName): Promise<void> {
    this.reactions.push({ pr, commentId, reaction });
  }

  async getRepo(): Promise<string> {
    if (!this.repo) throw new GitHubError('Could not determine repository');
    return this.repo;
  }

  async currentPullRequest(): Promise<number> {
    return 7;
  }
}

export function required<V>(value: V | undefined): V {
  if (value === undefined) throw new Error('expected a value');
  return value;
}
