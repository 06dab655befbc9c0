/**
 * Browse command - pick a review thread interactively, or open one by id
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig as loadProjectConfig, type ReviewThreadsConfig } from '../config.js';
import { Logger } from '../logger.js';
import { createLogFileWriter, getLogPath } from '../logging.js';
import { createBrowseOptions } from '../review/actions.js';
import { openUrlInBrowser } from '../review/browser.js';
import { GhReviewClient, type ReviewClient } from '../review/client.js';
import type { BrowseItem, ReviewComment } from '../review/types.js';
import { selectedEntry } from '../review/types.js';
import { select as selectItem, type SelectDeps, type SelectionResult, type SelectorOptions } from '../selector/index.js';

export interface BrowseCommandOptions {
  repo?: string;
  /** PR to browse when no PR argument is given. */
  pr?: string;
  all?: boolean;
  query?: string;
  verbose?: boolean;
}

export interface BrowseDeps {
  createClient?: (options: { repo?: string; log: (line: string) => void }) => ReviewClient;
  select?: (options: SelectorOptions<BrowseItem>, deps: SelectDeps) => Promise<SelectionResult<BrowseItem>>;
  openUrl?: (url: string) => Promise<void>;
  loadConfig?: (logger: Logger) => ReviewThreadsConfig;
  /** Where debug lines go while the browser owns the terminal (verbose only). */
  createLogSink?: () => (line: string) => void;
  out?: (line: string) => void;
}

export interface CommandContext {
  program: Command;
  deps?: BrowseDeps;
}

function parsePositiveInt(value: string, label: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`invalid ${label}: ${value}`);
  }
  return parsed;
}

/** URL of a root comment or reply with the given id. */
export function findCommentUrl(comments: readonly ReviewComment[], id: number): string | null {
  for (const comment of comments) {
    if (comment.id === id) return comment.htmlUrl || null;
    const reply = comment.replies.find(entry => entry.id === id);
    if (reply) return reply.htmlUrl || null;
  }
  return null;
}

/**
 * A single argument is a comment id on the current branch's PR; with two,
 * the first is the PR number.
 */
export function browseTargets(first?: string, second?: string): { pr?: string; commentId?: string } {
  if (second !== undefined) return { pr: first, commentId: second };
  return { commentId: first };
}

export async function runBrowse(
  prArg: string | undefined,
  commentArg: string | undefined,
  options: BrowseCommandOptions,
  deps: BrowseDeps = {},
): Promise<void> {
  const logger = new Logger({ verbose: options.verbose });
  const out = deps.out ?? ((line: string) => console.log(line));
  const openUrl = deps.openUrl ?? (url => openUrlInBrowser(url));
  const config = (deps.loadConfig ?? (l => loadProjectConfig({ logger: l })))(logger);

  const repo = options.repo ?? config.repo;
  const log = (line: string) => logger.debug(line);
  const client = deps.createClient ? deps.createClient({ repo, log }) : new GhReviewClient({ repo, log });

  const pr = prArg !== undefined ? parsePositiveInt(prArg, 'PR number') : await client.currentPullRequest();
  logger.debug(`browsing PR #${pr}${repo ? ` in ${repo}` : ''}`);

  if (commentArg !== undefined) {
    const id = parsePositiveInt(commentArg, 'comment ID');
    const url = findCommentUrl(await client.fetchReviewComments(pr), id);
    if (!url) throw new Error(`comment ID ${id} not found in PR #${pr}`);
    await openUrl(url);
    out(`Opened comment ${id} in browser`);
    return;
  }

  const comments = await client.fetchReviewComments(pr);
  if (comments.length === 0) {
    out(`No review comments found in ${chalk.cyan(`PR #${pr}`)}`);
    return;
  }

  const browseOptions = createBrowseOptions({
    client,
    pr,
    comments,
    openUrl,
    hideResolved: options.all ? false : config.hideResolved,
    statusTimeoutMs: config.statusTimeoutMs,
  });
  if (options.query) browseOptions.query = options.query;

  const sink = options.verbose
    ? (deps.createLogSink ?? (() => createLogFileWriter(getLogPath())))()
    : () => {};
  logger.capture(sink);
  let result: SelectionResult<BrowseItem>;
  try {
    result = await (deps.select ?? selectItem)(browseOptions, { editor: config.editor, agent: config.agent, log });
  } finally {
    logger.release();
  }

  if (!result.ok) return;
  if (result.item.type === 'file') {
    out('Selected a file header. Please select a comment.');
    return;
  }
  const entry = selectedEntry(result.item);
  if (!entry.htmlUrl) throw new Error(`comment ${entry.id} has no URL`);
  await openUrl(entry.htmlUrl);
  out(`Opened comment ${entry.id} in browser`);
}

export default function register(ctx: CommandContext): void {
  const { program, deps } = ctx;

  program
    .command('browse')
    .description('Browse review threads of a pull request, or open one comment in the browser')
    .argument('[prOrCommentId]', 'Comment ID to open; the PR number when followed by a comment ID')
    .argument('[commentId]', 'Comment ID to open in the given PR')
    .option('-R, --repo <owner/name>', 'Repository (defaults to the current checkout)')
    .option('-p, --pr <number>', 'Pull request to browse (defaults to the PR of the current branch)')
    .option('-a, --all', 'Show resolved threads on start')
    .option('-q, --query <text>', 'Only show items matching this text')
    .option('-v, --verbose', 'Write debug output (to the log file while browsing)')
    .action(async (first: string | undefined, second: string | undefined, options: BrowseCommandOptions) => {
      const targets = browseTargets(first, second);
      await runBrowse(targets.pr ?? options.pr, targets.commentId, options, deps);
    });
}
