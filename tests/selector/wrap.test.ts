import { describe, it, expect } from 'vitest';
import { wrapLine, wrapLines } from '../../src/selector/wrap.js';

describe('wrapLine', () => {
  it('splits words longer than the width at the width', () => {
    expect(wrapLine('abcdef', 3)).toEqual(['abc', 'def']);
  });

  it('breaks after the last space that fits', () => {
    expect(wrapLine('one two three', 9)).toEqual(['one two ', 'three']);
  });

  it('drops a space that lands exactly on the edge', () => {
    expect(wrapLine('hello world again', 11)).toEqual(['hello world', 'again']);
  });

  it('does not count colour sequences as columns', () => {
    expect(wrapLine('\u001b[31mabcd\u001b[39m', 2)).toEqual(['\u001b[31mab', 'cd\u001b[39m']);
  });

  it('keeps empty lines and leaves text alone without a width', () => {
    expect(wrapLine('', 10)).toEqual(['']);
    expect(wrapLine('abcdef', 0)).toEqual(['abcdef']);
  });
});

describe('wrapLines', () => {
  it('wraps every line of multi-line content', () => {
    expect(wrapLines('ab\nabcde', 2)).toEqual(['ab', 'ab', 'cd', 'e']);
  });
});
