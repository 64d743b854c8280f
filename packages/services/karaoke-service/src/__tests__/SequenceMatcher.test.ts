import { describe, it, expect } from 'vitest';
import { SequenceMatcher } from '../domains/text';

const chars = (text: string) => Array.from(text);

describe('SequenceMatcher', () => {
  it('finds matching blocks with a terminating sentinel', () => {
    const matcher = new SequenceMatcher(chars('abxcd'), chars('abcd'));
    expect(matcher.getMatchingBlocks()).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
      { a: 5, b: 4, size: 0 },
    ]);
  });

  it('describes how to turn one sequence into the other', () => {
    const matcher = new SequenceMatcher(chars('qabxcd'), chars('abycdf'));
    expect(matcher.getOpcodes()).toEqual([
      { tag: 'delete', i1: 0, i2: 1, j1: 0, j2: 0 },
      { tag: 'equal', i1: 1, i2: 3, j1: 0, j2: 2 },
      { tag: 'replace', i1: 3, i2: 4, j1: 2, j2: 3 },
      { tag: 'equal', i1: 4, i2: 6, j1: 3, j2: 5 },
      { tag: 'insert', i1: 6, i2: 6, j1: 5, j2: 6 },
    ]);
    expect(matcher.ratio()).toBeCloseTo(8 / 12, 10);
  });

  it('compares word arrays', () => {
    const matcher = new SequenceMatcher(['ich', 'gehe', 'nach', 'hause'], ['ich', 'geh', 'nach', 'haus']);
    expect(matcher.ratio()).toBe(0.5);
  });

  it('does not anchor matches on popular elements of long sequences', () => {
    const a = ['x', 'a'];
    const b = new Array<string>(200).fill('a');

    expect(new SequenceMatcher(a, b).ratio()).toBe(0);
    expect(new SequenceMatcher(a, b, false).ratio()).toBeCloseTo(2 / 202, 10);
  });

  it('reports an empty comparison as identical', () => {
    expect(new SequenceMatcher<string>([], []).ratio()).toBe(1);
    expect(new SequenceMatcher<string>([], []).getOpcodes()).toEqual([]);
  });
});
