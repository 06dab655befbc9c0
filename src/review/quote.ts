/**
 * Markdown helpers for quoting review comments in replies.
 */

const SUGGESTION_BLOCK = /```suggestion[\s\S]*?```/g;
const MARKDOWN_IMAGE = /!\[[^\]]*\]\([^)]*\)/g;
const MARKDOWN_LINK = /\[([^\]]*)\]\([^)]*\)/g;

/** Prefix every line with `> `. An empty string becomes a bare `>`. */
export function formatBlockquote(text: string): string {
  if (text === '') return '>';
  return text
    .split('\n')
    .map(line => `> ${line}`)
    .join('\n');
}

/** Prepend git-style file headers to a diff hunk. */
export function formatDiffWithHeaders(diffHunk: string, path: string): string {
  if (!path) return diffHunk;
  return `--- a/${path}\n+++ b/${path}\n${diffHunk}`;
}

/** Remove suggestion blocks and images, then trim. */
export function stripSuggestionBlock(body: string): string {
  return body.replace(SUGGESTION_BLOCK, '').replace(MARKDOWN_IMAGE, '').trim();
}

/** Code of the first suggestion block in a comment body, if any. */
export function extractSuggestion(body: string): string | null {
  const match = /```suggestion[^\n]*\n([\s\S]*?)```/.exec(body);
  if (!match) return null;
  return match[1].replace(/\n$/, '');
}

/** Drop images and keep only the text of links. */
export function stripMarkdownForPreview(text: string): string {
  return text.replace(MARKDOWN_IMAGE, '').replace(MARKDOWN_LINK, '$1').trim();
}

/**
 * Quote a comment for a reply. With `includeContext`, the diff hunk is
 * quoted as a fenced block above the attribution. The result ends with two
 * empty lines for the reply itself.
 */
export function formatQuotedReply(
  author: string,
  body: string,
  diffHunk: string,
  path: string,
  includeContext: boolean,
): string {
  const parts: string[] = [];

  if (includeContext && diffHunk) {
    parts.push('> ```diff');
    for (const line of formatDiffWithHeaders(diffHunk, path).split('\n')) {
      parts.push(`> ${line}`);
    }
    parts.push('> ```');
    parts.push('>');
  }

  parts.push(formatBlockquote(`@${author} wrote:`));
  parts.push('>');

  const clean = stripSuggestionBlock(body);
  if (clean) parts.push(formatBlockquote(clean));

  parts.push('', '');
  return parts.join('\n');
}
