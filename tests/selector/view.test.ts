import { describe, it, expect } from 'vitest';
import { NORMAL, type SelectorMode } from '../../src/selector/modes.js';
import type { SelectorOptions } from '../../src/selector/options.js';
import {
  escapeTags,
  formatRow,
  helpText,
  listLayout,
  renderFrame,
  threadPickStatus,
  truncate,
  type FrameInput,
} from '../../src/selector/view.js';
import { testRenderer, type TestItem } from '../test-utils.js';

const alpha: TestItem = { id: 'a', title: 'Alpha' };

function input(mode: SelectorMode<TestItem>, options: Partial<SelectorOptions<TestItem>> = {}): FrameInput<TestItem> {
  return {
    mode,
    options: { items: [alpha], renderer: testRenderer, ...options },
    visible: [alpha],
    cursor: 0,
    filterActive: false,
    refreshing: false,
    status: null,
    dimensions: { width: 80, height: 24 },
  };
}

describe('escapeTags', () => {
  it('escapes blessed tag braces', () => {
    expect(escapeTags('a {b} c')).toBe('a {open}b{close} c');
  });
});

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('abc', 6)).toBe('abc');
  });

  it('ends long text with an ellipsis', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
  });

  it('drops colour codes when it has to cut', () => {
    expect(truncate('\u001b[31mred text\u001b[39m', 5)).toBe('re...');
  });

  it('cuts without an ellipsis when there is no room for one', () => {
    expect(truncate('abcdef', 2)).toBe('ab');
  });
});

describe('listLayout', () => {
  it('keeps at least one body line', () => {
    expect(listLayout(3)).toEqual({ headerHeight: 2, bodyHeight: 1, footerHeight: 3 });
  });
});

describe('formatRow', () => {
  it('greys out skippable rows and appends the description', () => {
    const options: SelectorOptions<TestItem> = {
      items: [],
      renderer: { ...testRenderer, description: () => 'desc', isSkippable: () => true },
    };
    expect(formatRow(options, alpha, true, 20)).toBe('{gray-fg}> Alpha - desc{/gray-fg}');
  });

  it('escapes item text', () => {
    const options: SelectorOptions<TestItem> = { items: [], renderer: testRenderer };
    expect(formatRow(options, { id: 'x', title: 'fn{x}' }, false, 80)).toBe('  fn{open}x{close}');
  });
});

describe('threadPickStatus', () => {
  it('names the key of the running action', () => {
    const status = threadPickStatus(
      { kind: 'thread-pick', action: 'quote-context', item: alpha, index: 1, count: 4, highlight: null, scroll: 0, origin: NORMAL },
      'a reply',
    );
    expect(status).toBe('[2/4] a reply (C=next, Enter=select, Esc=cancel)');
  });
});

describe('helpText', () => {
  it('lists navigation for the current view and the enabled actions', () => {
    const options: SelectorOptions<TestItem> = {
      items: [],
      renderer: testRenderer,
      quote: { prepare: () => '', complete: () => '' },
    };
    const list = helpText(options, NORMAL).split('\n');
    expect(list).toContain('  enter/l            view detail');
    expect(list).toContain(`  Q${' '.repeat(18)}quote`);
    expect(list[list.length - 1]).toBe('Press any key to close.');

    const detail = helpText(options, { kind: 'detail', content: '', scroll: 0 }).split('\n');
    expect(detail).toContain('  enter              choose this item');
  });
});

describe('renderFrame', () => {
  it('puts a confirmation over its origin view', () => {
    const frame = renderFrame(input({ kind: 'confirmation', message: 'See {link}', origin: NORMAL }));
    expect(frame.view).toBe('list');
    expect(frame.overlay).toEqual({
      title: 'Confirm',
      content: 'See {open}link{close}\n\nPress any key to continue...',
    });
  });

  it('labels the active filter in the header', () => {
    const frame = renderFrame({
      ...input(NORMAL, { title: 'PR #7', filter: () => true, filterLabel: 'unresolved only' }),
      filterActive: true,
    });
    expect(frame.header).toBe('PR #7  1 item [unresolved only]');
    expect(frame.footer).toBe('enter:view | h:unresolved only | ?:help | q:quit');
  });

  it('renders an editor session over its detail origin', () => {
    const frame = renderFrame(input({
      kind: 'editor-pending',
      session: { item: alpha, kind: 'quote', path: '/tmp/x.md' },
      origin: { kind: 'detail', content: 'body', scroll: 3 },
    }));
    expect(frame.view).toBe('detail');
    expect(frame.body).toBe('body');
    expect(frame.scroll).toBe(3);
    expect(frame.overlay).toBeNull();
  });
});
