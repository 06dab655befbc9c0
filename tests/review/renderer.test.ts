import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { BrowseItemRenderer, formatRelativeTime, truncateDiff } from '../../src/review/renderer.js';
import type { BrowseItem, CommentItem } from '../../src/review/types.js';
import { makeComment, makeReply } from './fixtures.js';

const now = new Date('2026-10-19T12:00:00Z');

function renderer(collapsedFiles = new Set<string>()): BrowseItemRenderer {
  return new BrowseItemRenderer({ collapsedFiles, chalk: new Chalk({ level: 0 }), now: () => now });
}

function commentItem(overrides: Partial<CommentItem> = {}): CommentItem {
  const comment = makeComment({
    body: 'Please rename this.\n```suggestion\nconst total = 0;\n```',
    replies: [makeReply({ body: '> Please rename this.\nDone in [commit](https://x.test/c)' })],
  });
  return { type: 'comment', path: comment.path, comment, selectedCommentIndex: 0, ...overrides };
}

describe('formatRelativeTime', () => {
  it('describes recent times relative to now', () => {
    expect(formatRelativeTime('2026-10-19T11:59:30Z', now)).toBe('just now');
    expect(formatRelativeTime('2026-10-19T11:59:00Z', now)).toBe('1 minute ago');
    expect(formatRelativeTime('2026-10-19T09:00:00Z', now)).toBe('3 hours ago');
    expect(formatRelativeTime('2026-10-18T12:00:00Z', now)).toBe('1 day ago');
  });

  it('falls back to the date for old timestamps', () => {
    expect(formatRelativeTime('2026-08-01T08:00:00Z', now)).toBe('2026-08-01');
  });

  it('returns nothing for missing or invalid timestamps', () => {
    expect(formatRelativeTime('', now)).toBe('');
    expect(formatRelativeTime('yesterday', now)).toBe('');
  });
});

describe('truncateDiff', () => {
  it('keeps the hunk header and the last lines', () => {
    expect(truncateDiff('@@ -1,4 +1,4 @@\n1\n2\n3\n4', 2)).toBe('@@ -1,4 +1,4 @@\n3\n4');
  });

  it('leaves short hunks untouched', () => {
    expect(truncateDiff('@@ -1 +1 @@\n+a', 8)).toBe('@@ -1 +1 @@\n+a');
  });
});

describe('BrowseItemRenderer titles', () => {
  it('marks file headers as expanded or collapsed', () => {
    const header: BrowseItem = { type: 'file', path: 'src/app.ts' };
    expect(renderer().title(header)).toBe('- src/app.ts');
    expect(renderer(new Set(['src/app.ts'])).title(header)).toBe('+ src/app.ts');
  });

  it('summarizes the comment', () => {
    expect(renderer().title(commentItem())).toBe('  └── #101 @alice Line 12 [unresolved]');
    const resolved = commentItem({ comment: makeComment({ resolved: true }) });
    expect(renderer().title(resolved)).toBe('  └── #101 @alice Line 12 [resolved]');
  });

  it('shows the first line of the body as the preview row', () => {
    expect(renderer().title(commentItem({ type: 'comment-preview' }))).toBe('      Please rename this.');
    const multi = commentItem({ type: 'comment-preview', comment: makeComment({ body: 'First\nSecond' }) });
    expect(renderer().title(multi)).toBe('      First...');
    const long = commentItem({ type: 'comment-preview', comment: makeComment({ body: 'x'.repeat(90) }) });
    expect(renderer().title(long)).toBe(`      ${'x'.repeat(77)}...`);
  });

  it('filters on path, title and body', () => {
    expect(renderer().filterValue({ type: 'file', path: 'src/app.ts' })).toBe('src/app.ts');
    expect(renderer().filterValue(commentItem({ comment: makeComment() }))).toBe(
      'src/app.ts   └── #101 @alice Line 12 [unresolved] Please rename this.',
    );
  });
});

describe('BrowseItemRenderer preview', () => {
  it('renders metadata, body, suggestion, context and replies', () => {
    expect(renderer().previewWithHighlight(commentItem(), -1)).toBe(
      [
        'Author: @alice',
        'Location: src/app.ts:12',
        'Status: unresolved',
        'URL: https://github.com/octo/widgets/pull/7#discussion_r101',
        'Time: 2 hours ago',
        '',
        '--- Comment ---',
        'Please rename this.',
        '',
        '--- Suggested Code ---',
        'const total = 0;',
        '',
        '--- Context ---',
        '@@ -10,3 +10,3 @@',
        ' const a = 1;',
        '-let total = 1;',
        '+let total = 2;',
        '',
        '--- Replies ---',
        '',
        'Reply 1 by @bob | https://github.com/octo/widgets/pull/7#discussion_r102 | 30 minutes ago',
        '> Please rename this.',
        'Done in [commit](https://x.test/c)',
        '',
      ].join('\n'),
    );
  });

  it('marks the highlighted reply', () => {
    const lines = renderer().previewWithHighlight(commentItem(), 1).split('\n');
    const start = lines.indexOf('▶▶▶ SELECTED REPLY ◀◀◀');
    expect(start).toBeGreaterThan(0);
    expect(lines[start + 1]).toMatch(/^Reply 1 by @bob/);
    expect(lines[start + 4]).toBe('▶▶▶ END SELECTED ◀◀◀');
  });

  it('marks the highlighted root comment', () => {
    const text = renderer().previewWithHighlight(commentItem(), 0);
    expect(text).toContain('\n▶▶▶ SELECTED COMMENT ◀◀◀\n\n--- Comment ---\nPlease rename this.\n▶▶▶ END SELECTED ◀◀◀\n');
  });

  it('flags outdated comments and skips tiny hunks', () => {
    const item = commentItem({ comment: makeComment({ outdated: true, diffHunk: '@@ -1 +1 @@\n+a', createdAt: '' }) });
    expect(renderer().previewWithHighlight(item, -1)).toBe(
      [
        'Author: @alice',
        'Location: src/app.ts:12',
        'Status: unresolved',
        'URL: https://github.com/octo/widgets/pull/7#discussion_r101',
        'OUTDATED',
        '',
        '--- Comment ---',
        'Please rename this.',
        '',
      ].join('\n'),
    );
  });

  it('describes file headers', () => {
    expect(renderer().previewWithHighlight({ type: 'file', path: 'src/app.ts' }, -1)).toBe(
      'File: src/app.ts\n\nSelect a comment below to view details.',
    );
  });
});

describe('BrowseItemRenderer threads', () => {
  it('counts the root and its replies', () => {
    expect(renderer().threadCommentCount(commentItem())).toBe(2);
    expect(renderer().threadCommentCount({ type: 'file', path: 'a' })).toBe(0);
  });

  it('previews entries without quoted lines or link targets', () => {
    expect(renderer().threadCommentPreview(commentItem(), 1)).toBe('@bob: Done in commit');
    expect(renderer().threadCommentPreview(commentItem({ comment: makeComment() }), 0)).toBe('@alice: Please rename this.');
    expect(renderer().threadCommentPreview(commentItem(), 5)).toBe('');
  });

  it('binds the selected entry to a copy', () => {
    const item = commentItem();
    const picked = renderer().withSelectedComment(item, 1);
    expect(picked).toEqual({ ...item, selectedCommentIndex: 1 });
    expect(item.selectedCommentIndex).toBe(0);
  });
});
