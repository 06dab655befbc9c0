import { HIGHLIGHT_CONTEXT_LINES, HIGHLIGHT_MARKER } from './constants.js';
import { wrapLine } from './wrap.js';

/**
 * Strip the trailing block of instruction lines (blank or starting with `#`)
 * from editor output, then trim. A `#` line followed by real content is kept,
 * so markdown headings survive.
 */
export function sanitizeEditorContent(content: string): string {
  const lines = content.split('\n');
  let end = lines.length;
  while (end > 0) {
    const trimmed = lines[end - 1].trim();
    if (trimmed !== '' && !trimmed.startsWith('#')) break;
    end--;
  }
  return lines.slice(0, end).join('\n').trim();
}

/**
 * Scroll offset that puts the highlighted thread entry near the top of the
 * detail pane, or null when nothing is marked. With a `width`, lines before
 * the marker count as the rows they wrap to.
 */
export function findHighlightLineOffset(content: string, width = 0): number | null {
  const lines = content.split('\n');
  const index = lines.findIndex(line => line.includes(HIGHLIGHT_MARKER));
  if (index < 0) return null;
  const rows = lines.slice(0, index).reduce((sum, line) => sum + wrapLine(line, width).length, 0);
  return Math.max(0, rows - HIGHLIGHT_CONTEXT_LINES);
}

export function containsUrl(text: string): boolean {
  return text.includes('https://');
}
