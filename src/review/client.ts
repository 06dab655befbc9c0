/**
 * GitHub access for review threads, through the `gh` CLI.
 *
 * `gh` handles authentication and host configuration; we only build the
 * API calls and validate what comes back.
 */

import { spawn } from 'child_process';
import type { ReactionName } from '../selector/index.js';
import type { ReviewComment, ReviewReply } from './types.js';

export interface ReviewClient {
  fetchReviewComments(pr: number): Promise<ReviewComment[]>;
  replyToComment(pr: number, commentId: number, body: string): Promise<ReviewReply>;
  resolveThread(threadId: string): Promise<void>;
  unresolveThread(threadId: string): Promise<void>;
  addReaction(pr: number, commentId: number, reaction: ReactionName): Promise<void>;
  getRepo(): Promise<string>;
  currentPullRequest(): Promise<number>;
}

export class GitHubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitHubError';
  }
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
  error?: Error;
}

/** Runs `gh` with the given arguments. Swappable for tests. */
export type GhRunner = (args: string[]) => Promise<CommandResult>;

export function spawnGh(args: string[], timeout = 120000): Promise<CommandResult> {
  return new Promise(resolve => {
    const child = spawn('gh', args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    const timer = setTimeout(() => child.kill(), timeout);
    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });
    child.on('error', err => {
      clearTimeout(timer);
      resolve({ stdout: stdout.trim(), stderr: stderr.trim() || err.message, code: child.exitCode, error: err });
    });
    child.on('close', code => {
      clearTimeout(timer);
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code });
    });
  });
}

// ── JSON narrowing ─────────────────────────────────────────────────────

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function get(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function parseReply(node: unknown): ReviewReply {
  return {
    id: num(get(node, 'databaseId')),
    author: str(get(node, 'author', 'login')) || 'ghost',
    body: str(get(node, 'body')),
    htmlUrl: str(get(node, 'url')),
    createdAt: str(get(node, 'createdAt')),
  };
}

/** Convert a `reviewThreads` node into a root comment with replies. */
export function parseThread(thread: unknown): ReviewComment | null {
  const nodes = list(get(thread, 'comments', 'nodes'));
  if (nodes.length === 0) return null;
  const [first, ...rest] = nodes;
  const line = get(first, 'line') ?? get(thread, 'line') ?? get(first, 'originalLine') ?? get(thread, 'originalLine');
  return {
    ...parseReply(first),
    threadId: str(get(thread, 'id')),
    path: str(get(first, 'path')) || str(get(thread, 'path')),
    line: num(line),
    diffHunk: str(get(first, 'diffHunk')),
    outdated: get(thread, 'isOutdated') === true,
    resolved: get(thread, 'isResolved') === true,
    replies: rest.map(parseReply),
  };
}

/** Convert a REST review comment (as returned when replying). */
export function parseRestComment(value: unknown): ReviewReply {
  return {
    id: num(get(value, 'id')),
    author: str(get(value, 'user', 'login')) || 'ghost',
    body: str(get(value, 'body')),
    htmlUrl: str(get(value, 'html_url')),
    createdAt: str(get(value, 'created_at')),
  };
}

const THREADS_QUERY = `
query($owner: String!, $name: String!, $number: Int!, $cursor: String) {
  repository(owner: $owner, name: $name) {
    pullRequest(number: $number) {
      reviewThreads(first: 100, after: $cursor) {
        pageInfo { hasNextPage endCursor }
        nodes {
          id isResolved isOutdated path line originalLine
          comments(first: 100) {
            nodes { databaseId author { login } body url createdAt diffHunk path line originalLine }
          }
        }
      }
    }
  }
}`;

const RESOLVE_MUTATION = `
mutation($threadId: ID!) { resolveReviewThread(input: { threadId: $threadId }) { thread { isResolved } } }`;

const UNRESOLVE_MUTATION = `
mutation($threadId: ID!) { unresolveReviewThread(input: { threadId: $threadId }) { thread { isResolved } } }`;

export interface GhReviewClientOptions {
  /** `owner/name`; resolved through `gh repo view` when omitted. */
  repo?: string;
  run?: GhRunner;
  retries?: number;
  /** Initial backoff for rate-limited calls, doubled on each retry. */
  backoffMs?: number;
  log?: (line: string) => void;
}

export class GhReviewClient implements ReviewClient {
  private repo: string | undefined;
  private readonly run: GhRunner;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly log: (line: string) => void;

  constructor(options: GhReviewClientOptions = {}) {
    this.repo = options.repo;
    this.run = options.run ?? (args => spawnGh(args));
    this.retries = options.retries ?? 3;
    this.backoffMs = options.backoffMs ?? 500;
    this.log = options.log ?? (() => {});
  }

  async getRepo(): Promise<string> {
    if (this.repo) return this.repo;
    const repo = await this.gh(['repo', 'view', '--json', 'nameWithOwner', '-q', '.nameWithOwner']);
    if (!/^[^/\s]+\/[^/\s]+$/.test(repo)) {
      throw new GitHubError(`Could not determine repository (got "${repo}")`);
    }
    this.repo = repo;
    return repo;
  }

  async currentPullRequest(): Promise<number> {
    const out = await this.gh(['pr', 'view', '--json', 'number', '-q', '.number']);
    const pr = Number.parseInt(out, 10);
    if (!Number.isInteger(pr) || pr <= 0) {
      throw new GitHubError('No pull request found for the current branch');
    }
    return pr;
  }

  async fetchReviewComments(pr: number): Promise<ReviewComment[]> {
    const [owner, name] = (await this.getRepo()).split('/');
    const comments: ReviewComment[] = [];
    let cursor: string | null = null;
    do {
      const args = [
        'api', 'graphql',
        '-f', `query=${THREADS_QUERY}`,
        '-F', `owner=${owner}`,
        '-F', `name=${name}`,
        '-F', `number=${pr}`,
      ];
      if (cursor) args.push('-f', `cursor=${cursor}`);
      const data = await this.graphql(args);
      const threads = get(data, 'data', 'repository', 'pullRequest', 'reviewThreads');
      if (threads === undefined) {
        throw new GitHubError(`Pull request #${pr} not found in ${owner}/${name}`);
      }
      for (const node of list(get(threads, 'nodes'))) {
        const comment = parseThread(node);
        if (comment) comments.push(comment);
      }
      cursor = get(threads, 'pageInfo', 'hasNextPage') === true ? str(get(threads, 'pageInfo', 'endCursor')) || null : null;
    } while (cursor);
    this.log(`fetched ${comments.length} review threads for #${pr}`);
    return comments;
  }

  async replyToComment(pr: number, commentId: number, body: string): Promise<ReviewReply> {
    const repo = await this.getRepo();
    const out = await this.gh([
      'api', '-X', 'POST',
      `repos/${repo}/pulls/${pr}/comments/${commentId}/replies`,
      '-f', `body=${body}`,
    ]);
    return parseRestComment(this.parse(out));
  }

  async resolveThread(threadId: string): Promise<void> {
    await this.graphql(['api', 'graphql', '-f', `query=${RESOLVE_MUTATION}`, '-f', `threadId=${threadId}`]);
  }

  async unresolveThread(threadId: string): Promise<void> {
    await this.graphql(['api', 'graphql', '-f', `query=${UNRESOLVE_MUTATION}`, '-f', `threadId=${threadId}`]);
  }

  async addReaction(_pr: number, commentId: number, reaction: ReactionName): Promise<void> {
    const repo = await this.getRepo();
    await this.gh([
      'api', '-X', 'POST',
      `repos/${repo}/pulls/comments/${commentId}/reactions`,
      '-f', `content=${reaction}`,
    ]);
  }

  /** Run `gh`, retrying with backoff when rate limited. */
  private async gh(args: string[]): Promise<string> {
    let backoff = this.backoffMs;
    for (let attempt = 0; ; attempt++) {
      const res = await this.run(args);
      if (res.error) throw new GitHubError(`Failed to run gh: ${res.error.message}`);
      if (res.code === 0) return res.stdout;
      const stderr = res.stderr || res.stdout;
      if (/rate limit|403/i.test(stderr) && attempt < this.retries) {
        this.log(`gh rate limited, retrying in ${backoff}ms`);
        await new Promise(resolve => setTimeout(resolve, backoff));
        backoff *= 2;
        continue;
      }
      throw new GitHubError(stderr || `gh command failed with exit code ${res.code}`);
    }
  }

  private async graphql(args: string[]): Promise<unknown> {
    const data = this.parse(await this.gh(args));
    const errors = list(get(data, 'errors'));
    if (errors.length > 0) {
      const message = errors.map(entry => str(get(entry, 'message')) || String(entry)).join('; ');
      throw new GitHubError(message || 'GraphQL request returned errors');
    }
    return data;
  }

  private parse(output: string): unknown {
    try {
      const data: unknown = JSON.parse(output);
      return data;
    } catch {
      throw new GitHubError('Invalid JSON response from GitHub');
    }
  }
}
