// Edge patterns: one tile side as bits, first cell in the most significant bit
import type { EdgePattern } from '../types';

export const EDGE_WIDTH = 10;

// Reverse the low `width` bits of a pattern
export function reverseEdge(pattern: EdgePattern, width: number = EDGE_WIDTH): EdgePattern {
  let reversed = 0;
  for (let bit = 0; bit < width; bit++) {
    if (pattern & (1 << bit)) {
      reversed |= 1 << (width - 1 - bit);
    }
  }
  return reversed;
}

// Encode a run of cells, '#' as 1 and anything else as 0
export function encodeEdge(cells: Iterable<string>): EdgePattern {
  let pattern = 0;
  for (const cell of cells) {
    pattern = (pattern << 1) | (cell === '#' ? 1 : 0);
  }
  return pattern;
}

export function isPalindrome(pattern: EdgePattern, width: number = EDGE_WIDTH): boolean {
  return reverseEdge(pattern, width) === pattern;
}
