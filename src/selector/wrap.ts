/**
 * Wrapping of detail text into the rows the terminal actually shows.
 *
 * The detail body is wrapped here before it reaches blessed, so scroll
 * offsets counted over these rows are the same offsets blessed scrolls by.
 */

const ANSI_SEQUENCE = /^\u001b\[[0-9;]*m/;

interface Cell {
  text: string;
  /** False for escape sequences, which take no column. */
  visible: boolean;
}

function toCells(line: string): Cell[] {
  const cells: Cell[] = [];
  let rest = line;
  while (rest.length > 0) {
    const escape = ANSI_SEQUENCE.exec(rest);
    if (escape) {
      cells.push({ text: escape[0], visible: false });
      rest = rest.slice(escape[0].length);
      continue;
    }
    const ch = String.fromCodePoint(rest.codePointAt(0) ?? 0);
    cells.push({ text: ch, visible: true });
    rest = rest.slice(ch.length);
  }
  return cells;
}

/**
 * Split one line into rows of at most `width` columns, breaking after the
 * last space that fits when there is one.
 */
export function wrapLine(line: string, width: number): string[] {
  if (width <= 0) return [line];
  const cells = toCells(line);
  const rows: string[] = [];
  let row: Cell[] = [];
  let columns = 0;

  for (const cell of cells) {
    if (cell.visible && columns === width) {
      if (cell.text === ' ') {
        rows.push(row.map(c => c.text).join(''));
        row = [];
        columns = 0;
        continue;
      }
      let breakAt = -1;
      for (let i = row.length - 1; i > 0; i--) {
        if (row[i].text === ' ') {
          breakAt = i + 1;
          break;
        }
      }
      const carried = breakAt > 0 && breakAt < row.length ? row.slice(breakAt) : [];
      rows.push((carried.length > 0 ? row.slice(0, breakAt) : row).map(c => c.text).join(''));
      row = carried;
      columns = carried.filter(c => c.visible).length;
    }
    row.push(cell);
    if (cell.visible) columns++;
  }
  rows.push(row.map(c => c.text).join(''));
  return rows;
}

export function wrapLines(content: string, width: number): string[] {
  return content.split('\n').flatMap(line => wrapLine(line, width));
}
