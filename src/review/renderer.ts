import chalk, { type ChalkInstance } from 'chalk';
import type { ItemRenderer } from '../selector/index.js';
import { HIGHLIGHT_MARKER } from '../selector/constants.js';
import { stripMarkdownForPreview, stripSuggestionBlock, extractSuggestion } from './quote.js';
import type { BrowseItem, CommentItem, ReviewReply } from './types.js';
import { isCommentItem } from './types.js';

const PREVIEW_ROW_WIDTH = 80;
const THREAD_PREVIEW_WIDTH = 100;
const MAX_BODY_LINES = 200;
const MAX_REPLY_LINES = 100;
const CONTEXT_LINES = 8;

export interface BrowseItemRendererOptions {
  /** Shared with the browse actions; header selection toggles membership. */
  collapsedFiles: Set<string>;
  chalk?: ChalkInstance;
  now?: () => Date;
}

export function formatRelativeTime(iso: string, now: Date): string {
  const then = new Date(iso);
  if (!iso || Number.isNaN(then.getTime())) return '';
  const seconds = Math.max(0, Math.floor((now.getTime() - then.getTime()) / 1000));
  const plural = (value: number, unit: string) => `${value} ${unit}${value === 1 ? '' : 's'} ago`;
  if (seconds < 60) return 'just now';
  if (seconds < 3600) return plural(Math.floor(seconds / 60), 'minute');
  if (seconds < 86400) return plural(Math.floor(seconds / 3600), 'hour');
  if (seconds < 86400 * 30) return plural(Math.floor(seconds / 86400), 'day');
  return then.toISOString().slice(0, 10);
}

/** Keep the hunk header and the last `max` lines, which lead up to the commented line. */
export function truncateDiff(hunk: string, max: number): string {
  const lines = hunk.split('\n');
  if (lines.length <= max + 1) return hunk;
  const header = lines[0].startsWith('@@') ? [lines[0]] : [];
  return [...header, ...lines.slice(-max)].join('\n');
}

function limitLines(text: string, max: number): string {
  const lines = text.split('\n');
  if (lines.length <= max) return text;
  return `${lines.slice(0, max).join('\n')}\n\n...(truncated, content too long)`;
}

export class BrowseItemRenderer implements ItemRenderer<BrowseItem> {
  private readonly collapsedFiles: Set<string>;
  private readonly chalk: ChalkInstance;
  private readonly now: () => Date;

  constructor(options: BrowseItemRendererOptions) {
    this.collapsedFiles = options.collapsedFiles;
    this.chalk = options.chalk ?? chalk;
    this.now = options.now ?? (() => new Date());
  }

  title(item: BrowseItem): string {
    const c = this.chalk;
    if (item.type === 'file') {
      const plain = c.level === 0;
      const collapsed = this.collapsedFiles.has(item.path);
      const icon = collapsed ? (plain ? '+' : '▶') : plain ? '-' : '▼';
      return c.cyan(`${icon} ${item.path}`);
    }
    if (item.type === 'comment-preview') {
      const lines = stripSuggestionBlock(item.comment.body).split('\n');
      let preview = lines[0] || '...';
      if (preview.length > PREVIEW_ROW_WIDTH) {
        preview = `${preview.slice(0, PREVIEW_ROW_WIDTH - 3)}...`;
      } else if (lines.length > 1) {
        preview += '...';
      }
      return `      ${c.gray(preview)}`;
    }
    const { comment } = item;
    const status = comment.resolved ? c.green('[resolved]') : c.yellow('[unresolved]');
    return `  └── ${c.bold(`#${comment.id}`)} ${c.magenta(`@${comment.author}`)} Line ${comment.line} ${status}`;
  }

  description(): string {
    return '';
  }

  filterValue(item: BrowseItem): string {
    if (item.type === 'file') return item.path;
    return `${item.path} ${this.title(item)} ${item.comment.body}`;
  }

  isSkippable(): boolean {
    return false;
  }

  previewWithHighlight(item: BrowseItem, highlightIndex: number): string {
    if (!isCommentItem(item)) {
      return `File: ${item.path}\n\nSelect a comment below to view details.`;
    }
    const c = this.chalk;
    const { comment } = item;
    let out = '';

    const status = comment.resolved ? c.green('resolved') : c.yellow('unresolved');
    out += c.cyan(`Author: @${comment.author}\n`);
    out += c.cyan(`Location: ${comment.path}:${comment.line}\n`);
    out += c.cyan('Status: ') + status + '\n';
    if (comment.htmlUrl) out += c.cyan(`URL: ${comment.htmlUrl}\n`);
    const time = formatRelativeTime(comment.createdAt, this.now());
    if (time) out += c.cyan(`Time: ${time}\n`);
    if (comment.outdated) out += c.yellow('OUTDATED\n');

    const body = stripSuggestionBlock(comment.body);
    if (body) {
      if (highlightIndex === 0) out += c.magenta(`\n▶▶▶ ${HIGHLIGHT_MARKER} COMMENT ◀◀◀\n`);
      out += '\n--- Comment ---\n';
      out += limitLines(body, MAX_BODY_LINES) + '\n';
      if (highlightIndex === 0) out += c.magenta('▶▶▶ END SELECTED ◀◀◀\n');
    }

    const suggestion = extractSuggestion(comment.body);
    if (suggestion) {
      out += c.cyan('\n--- Suggested Code ---\n');
      out += c.green(suggestion) + '\n';
    }

    if (comment.diffHunk && comment.diffHunk.split('\n').length > 2) {
      out += c.cyan('\n--- Context ---\n');
      out += this.colorizeDiff(truncateDiff(comment.diffHunk, CONTEXT_LINES)) + '\n';
    }

    if (comment.replies.length > 0) {
      out += '\n--- Replies ---\n';
      comment.replies.forEach((reply, i) => {
        out += '\n';
        const highlighted = highlightIndex === i + 1;
        if (highlighted) out += c.magenta(`▶▶▶ ${HIGHLIGHT_MARKER} REPLY ◀◀◀\n`);
        out += this.replyHeader(reply, i + 1) + '\n';
        out += limitLines(reply.body, MAX_REPLY_LINES) + '\n';
        if (highlighted) out += c.magenta('▶▶▶ END SELECTED ◀◀◀\n');
      });
    }

    return out;
  }

  threadCommentCount(item: BrowseItem): number {
    if (!isCommentItem(item)) return 0;
    return 1 + item.comment.replies.length;
  }

  threadCommentPreview(item: BrowseItem, index: number): string {
    if (!isCommentItem(item)) return '';
    const entry = this.entryAt(item, index);
    if (!entry) return '';
    // Quoted lines are context from earlier entries, not this one's content.
    const text = stripMarkdownForPreview(entry.body)
      .split('\n')
      .map(line => line.trim())
      .filter(line => line !== '' && !line.startsWith('>'))
      .join(' ');
    const preview = text.length > THREAD_PREVIEW_WIDTH ? `${text.slice(0, THREAD_PREVIEW_WIDTH - 3)}...` : text;
    return `@${entry.author}: ${preview}`;
  }

  withSelectedComment(item: BrowseItem, index: number): BrowseItem {
    if (!isCommentItem(item)) return item;
    return { ...item, selectedCommentIndex: index };
  }

  private entryAt(item: CommentItem, index: number): ReviewReply | undefined {
    if (index === 0) return item.comment;
    return item.comment.replies[index - 1];
  }

  private replyHeader(reply: ReviewReply, position: number): string {
    let header = `Reply ${position} by @${reply.author}`;
    if (reply.htmlUrl) header += ` | ${reply.htmlUrl}`;
    const time = formatRelativeTime(reply.createdAt, this.now());
    if (time) header += ` | ${time}`;
    return header;
  }

  private colorizeDiff(diff: string): string {
    const c = this.chalk;
    return diff
      .split('\n')
      .map(line => {
        if (line.startsWith('@@')) return c.cyan(line);
        if (line.startsWith('+')) return c.green(line);
        if (line.startsWith('-')) return c.red(line);
        return line;
      })
      .join('\n');
  }
}
