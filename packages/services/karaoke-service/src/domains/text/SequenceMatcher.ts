/**
 * SequenceMatcher - longest-matching-block sequence comparison
 *
 * Ratcliff/Obershelp style: find the longest common contiguous block, then
 * recurse on the pieces to its left and right. Works on any array whose
 * elements compare with `===` (characters, words).
 *
 * When the second sequence has 200 or more elements, elements that make up
 * more than 1% of it are "popular" and are not used to anchor a match; they
 * can still extend one.
 */

export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

export type OpcodeTag = 'equal' | 'replace' | 'delete' | 'insert';

export interface Opcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

export class SequenceMatcher<T> {
  private readonly b2j = new Map<T, number[]>();
  private matchingBlocks: MatchingBlock[] | null = null;

  constructor(
    private readonly a: readonly T[],
    private readonly b: readonly T[],
    autojunk = true
  ) {
    this.b.forEach((element, index) => {
      const indices = this.b2j.get(element);
      if (indices) {
        indices.push(index);
      } else {
        this.b2j.set(element, [index]);
      }
    });

    if (autojunk && this.b.length >= AUTOJUNK_MIN_LENGTH) {
      const limit = Math.floor(this.b.length / 100) + 1;
      for (const [element, indices] of [...this.b2j]) {
        if (indices.length > limit) this.b2j.delete(element);
      }
    }
  }

  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>();
      for (const j of this.b2j.get(this.a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestSize) {
          bestI = i - k + 1;
          bestJ = j - k + 1;
          bestSize = k;
        }
      }
      j2len = next;
    }

    // Popular elements never anchor a block but may still widen one.
    while (bestI > alo && bestJ > blo && this.a[bestI - 1] === this.b[bestJ - 1]) {
      bestI--;
      bestJ--;
      bestSize++;
    }
    while (bestI + bestSize < ahi && bestJ + bestSize < bhi && this.a[bestI + bestSize] === this.b[bestJ + bestSize]) {
      bestSize++;
    }

    return { a: bestI, b: bestJ, size: bestSize };
  }

  /**
   * Non-overlapping matching blocks in increasing order, adjacent blocks
   * collapsed, terminated by a zero-size sentinel at the sequence ends.
   */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.matchingBlocks) return this.matchingBlocks;

    const la = this.a.length;
    const lb = this.b.length;
    const queue: Array<[number, number, number, number]> = [[0, la, 0, lb]];
    const found: MatchingBlock[] = [];

    let range = queue.pop();
    while (range) {
      const [alo, ahi, blo, bhi] = range;
      const match = this.findLongestMatch(alo, ahi, blo, bhi);
      if (match.size > 0) {
        found.push(match);
        if (alo < match.a && blo < match.b) {
          queue.push([alo, match.a, blo, match.b]);
        }
        if (match.a + match.size < ahi && match.b + match.size < bhi) {
          queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
        }
      }
      range = queue.pop();
    }

    found.sort((x, y) => x.a - y.a || x.b - y.b || x.size - y.size);

    const collapsed: MatchingBlock[] = [];
    let current: MatchingBlock = { a: 0, b: 0, size: 0 };
    for (const block of found) {
      if (current.a + current.size === block.a && current.b + current.size === block.b) {
        current = { ...current, size: current.size + block.size };
      } else {
        if (current.size > 0) collapsed.push(current);
        current = block;
      }
    }
    if (current.size > 0) collapsed.push(current);
    collapsed.push({ a: la, b: lb, size: 0 });

    this.matchingBlocks = collapsed;
    return collapsed;
  }

  getOpcodes(): Opcode[] {
    let i = 0;
    let j = 0;
    const opcodes: Opcode[] = [];

    for (const { a, b, size } of this.getMatchingBlocks()) {
      let tag: OpcodeTag | null = null;
      if (i < a && j < b) tag = 'replace';
      else if (i < a) tag = 'delete';
      else if (j < b) tag = 'insert';
      if (tag) opcodes.push({ tag, i1: i, i2: a, j1: j, j2: b });

      i = a + size;
      j = b + size;
      if (size > 0) opcodes.push({ tag: 'equal', i1: a, i2: i, j1: b, j2: j });
    }

    return opcodes;
  }

  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) return 1.0;
    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
    return (2.0 * matches) / total;
  }
}
