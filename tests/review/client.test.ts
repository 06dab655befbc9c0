import { describe, it, expect, vi } from 'vitest';
import { GhReviewClient, GitHubError, parseThread, type CommandResult, type GhRunner } from '../../src/review/client.js';

const ok = (stdout: string): CommandResult => ({ stdout, stderr: '', code: 0 });
const failed = (stderr: string): CommandResult => ({ stdout: '', stderr, code: 1 });

/** Answers calls in order; each call's args are recorded by the mock. */
function scripted(...results: CommandResult[]) {
  const queue = [...results];
  return vi.fn<GhRunner>(async () => {
    const next = queue.shift();
    if (!next) throw new Error('unexpected gh call');
    return next;
  });
}

const threadNode = {
  id: 'T_1',
  isResolved: false,
  isOutdated: true,
  path: 'src/a.ts',
  line: null,
  originalLine: 7,
  comments: {
    nodes: [
      {
        databaseId: 101,
        author: { login: 'alice' },
        body: 'Fix this',
        url: 'https://github.com/octo/widgets/pull/7#discussion_r101',
        createdAt: '2026-10-01T00:00:00Z',
        diffHunk: '@@ -1 +1 @@',
        path: 'src/a.ts',
        line: null,
        originalLine: 7,
      },
      { databaseId: 102, author: null, body: 'ok', url: 'https://github.com/octo/widgets/pull/7#discussion_r102', createdAt: '' },
    ],
  },
};

function page(nodes: unknown[], hasNextPage: boolean, endCursor: string | null): string {
  return JSON.stringify({
    data: { repository: { pullRequest: { reviewThreads: { pageInfo: { hasNextPage, endCursor }, nodes } } } },
  });
}

describe('parseThread', () => {
  it('maps the root comment and replies', () => {
    expect(parseThread(threadNode)).toEqual({
      id: 101,
      author: 'alice',
      body: 'Fix this',
      htmlUrl: 'https://github.com/octo/widgets/pull/7#discussion_r101',
      createdAt: '2026-10-01T00:00:00Z',
      threadId: 'T_1',
      path: 'src/a.ts',
      line: 7,
      diffHunk: '@@ -1 +1 @@',
      outdated: true,
      resolved: false,
      replies: [
        { id: 102, author: 'ghost', body: 'ok', htmlUrl: 'https://github.com/octo/widgets/pull/7#discussion_r102', createdAt: '' },
      ],
    });
  });

  it('skips threads without comments', () => {
    expect(parseThread({ id: 'T_2', comments: { nodes: [] } })).toBeNull();
  });
});

describe('GhReviewClient', () => {
  it('looks up the repository once', async () => {
    const run = scripted(ok('octo/widgets'));
    const client = new GhReviewClient({ run });
    await expect(client.getRepo()).resolves.toBe('octo/widgets');
    await expect(client.getRepo()).resolves.toBe('octo/widgets');
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(['repo', 'view', '--json', 'nameWithOwner', '-q', '.nameWithOwner']);
  });

  it('rejects an unexpected repository name', async () => {
    const client = new GhReviewClient({ run: scripted(ok('')) });
    await expect(client.getRepo()).rejects.toThrow('Could not determine repository (got "")');
  });

  it('reads the pull request of the current branch', async () => {
    await expect(new GhReviewClient({ run: scripted(ok('42')) }).currentPullRequest()).resolves.toBe(42);
    await expect(new GhReviewClient({ run: scripted(failed('no pull requests found')) }).currentPullRequest()).rejects.toThrow(
      'no pull requests found',
    );
  });

  it('follows pagination when fetching threads', async () => {
    const second = { ...threadNode, id: 'T_3', comments: { nodes: [{ ...threadNode.comments.nodes[0], databaseId: 103 }] } };
    const run = scripted(ok(page([threadNode], true, 'c1')), ok(page([second], false, null)));
    const client = new GhReviewClient({ repo: 'octo/widgets', run });

    const comments = await client.fetchReviewComments(7);
    expect(comments.map(comment => comment.id)).toEqual([101, 103]);
    expect(run).toHaveBeenCalledTimes(2);
    const firstArgs = run.mock.calls[0][0];
    expect(firstArgs).toContain('owner=octo');
    expect(firstArgs).toContain('name=widgets');
    expect(firstArgs).toContain('number=7');
    expect(firstArgs).not.toContain('cursor=c1');
    expect(run.mock.calls[1][0].slice(-2)).toEqual(['-f', 'cursor=c1']);
  });

  it('fails when the pull request does not exist', async () => {
    const run = scripted(ok(JSON.stringify({ data: { repository: { pullRequest: null } } })));
    await expect(new GhReviewClient({ repo: 'octo/widgets', run }).fetchReviewComments(9)).rejects.toThrow(
      'Pull request #9 not found in octo/widgets',
    );
  });

  it('surfaces GraphQL errors', async () => {
    const run = scripted(ok(JSON.stringify({ errors: [{ message: 'Bad credentials' }, { message: 'Try again' }] })));
    await expect(new GhReviewClient({ run }).resolveThread('T_1')).rejects.toThrow('Bad credentials; Try again');
  });

  it('retries rate-limited calls with backoff', async () => {
    const run = scripted(failed('API rate limit exceeded'), failed('HTTP 403'), ok('{"data":{}}'));
    const log = vi.fn();
    await new GhReviewClient({ run, backoffMs: 1, log }).unresolveThread('T_1');
    expect(run).toHaveBeenCalledTimes(3);
    expect(log.mock.calls.map(call => call[0])).toEqual(['gh rate limited, retrying in 1ms', 'gh rate limited, retrying in 2ms']);
  });

  it('gives up after the configured retries', async () => {
    const run = scripted(failed('rate limit'), failed('rate limit'));
    await expect(new GhReviewClient({ run, retries: 1, backoffMs: 1 }).resolveThread('T_1')).rejects.toThrow(GitHubError);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('reports a gh binary that cannot run', async () => {
    const run = scripted({ stdout: '', stderr: 'spawn gh ENOENT', code: null, error: new Error('spawn gh ENOENT') });
    await expect(new GhReviewClient({ run }).getRepo()).rejects.toThrow('Failed to run gh: spawn gh ENOENT');
  });

  it('posts replies through the REST API', async () => {
    const run = scripted(
      ok(JSON.stringify({ id: 500, user: { login: 'me' }, body: 'Thanks', html_url: 'https://github.com/octo/widgets/pull/7#discussion_r500', created_at: '2026-10-19T12:00:00Z' })),
    );
    const reply = await new GhReviewClient({ repo: 'octo/widgets', run }).replyToComment(7, 101, 'Thanks');
    expect(reply).toEqual({
      id: 500,
      author: 'me',
      body: 'Thanks',
      htmlUrl: 'https://github.com/octo/widgets/pull/7#discussion_r500',
      createdAt: '2026-10-19T12:00:00Z',
    });
    expect(run).toHaveBeenCalledWith(['api', '-X', 'POST', 'repos/octo/widgets/pulls/7/comments/101/replies', '-f', 'body=Thanks']);
  });

  it('adds reactions to review comments', async () => {
    const run = scripted(ok('{}'));
    await new GhReviewClient({ repo: 'octo/widgets', run }).addReaction(7, 101, 'rocket');
    expect(run).toHaveBeenCalledWith(['api', '-X', 'POST', 'repos/octo/widgets/pulls/comments/101/reactions', '-f', 'content=rocket']);
  });

  it('rejects output that is not JSON', async () => {
    const run = scripted(ok('<html>'));
    await expect(new GhReviewClient({ repo: 'octo/widgets', run }).replyToComment(7, 1, 'x')).rejects.toThrow(
      'Invalid JSON response from GitHub',
    );
  });
});
