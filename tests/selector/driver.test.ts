import { describe, it, expect } from 'vitest';
import { BlessedDriver, normalizeKey } from '../../src/selector/driver.js';
import { DriverError } from '../../src/selector/errors.js';

describe('normalizeKey', () => {
  it('ignores the return event that precedes enter', () => {
    expect(normalizeKey('\r', { name: 'return' })).toBeNull();
    expect(normalizeKey('\r', { name: 'enter' })).toBe('enter');
  });

  it('maps control chords', () => {
    expect(normalizeKey(undefined, { name: 'c', ctrl: true })).toBe('C-c');
    expect(normalizeKey(undefined, { name: 'f', ctrl: true })).toBe('C-f');
  });

  it('keeps the case of printable characters', () => {
    expect(normalizeKey('Q', { name: 'q' })).toBe('Q');
    expect(normalizeKey('q', { name: 'q' })).toBe('q');
    expect(normalizeKey('?', {})).toBe('?');
  });

  it('names special keys', () => {
    expect(normalizeKey(undefined, { name: 'escape' })).toBe('escape');
    expect(normalizeKey('\t', { name: 'tab' })).toBe('tab');
    expect(normalizeKey(' ', { name: 'space' })).toBe('space');
    expect(normalizeKey(' ', undefined)).toBe('space');
    expect(normalizeKey(undefined, { name: 'f5' })).toBe('f5');
    expect(normalizeKey(undefined, undefined)).toBeNull();
  });
});

describe('BlessedDriver before start', () => {
  it('reports fallback dimensions', () => {
    expect(new BlessedDriver().dimensions()).toEqual({ width: 80, height: 24 });
  });

  it('refuses to draw', () => {
    const driver = new BlessedDriver();
    expect(() => driver.draw({
      view: 'list',
      header: '',
      rows: [],
      cursor: 0,
      body: '',
      scroll: 0,
      layout: { headerHeight: 2, bodyHeight: 19, footerHeight: 3 },
      footer: '',
      status: null,
      overlay: null,
    })).toThrow(DriverError);
  });

  it('treats destroy as a no-op', () => {
    expect(() => new BlessedDriver().destroy()).not.toThrow();
  });
});
