import { describe, it, expect } from 'vitest';
import { renderAscii, renderLevels } from './avl-display.mjs';
import { insert } from './avl-tree.mjs';
import type { AVLNode } from './avl-node.mjs';

function build(keys: number[]): AVLNode<number> {
  let root: AVLNode<number> | null = null;
  for (const k of keys) root = insert(root, k);
  if (!root) throw new Error('empty fixture');
  return root;
}

describe('renderLevels', () => {
  it('lists the keys of each level', () => {
    expect(renderLevels(build([1, 2, 3, 4, 5, 6, 7]))).toEqual(['4', '2 6', '1 3 5 7']);
  });
});

describe('renderAscii', () => {
  it('draws a single key on its own', () => {
    expect(renderAscii(build([42]))).toEqual(['42']);
  });

  it('marks a missing child with a dot', () => {
    expect(renderAscii(build([1, 2]))).toEqual(['  1  ', '--|--', '|   |', '.   2']);
  });

  it('lays out nested subtrees under their parents', () => {
    expect(renderAscii(build([23, -43, 0, 234, 78]))).toEqual([
      '       0      ',
      ' ------|---   ',
      ' |        |   ',
      '-43      78   ',
      '       ---|-- ',
      '       |    | ',
      '      23   234',
    ]);
  });
});
