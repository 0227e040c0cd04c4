import { describe, it, expect } from 'vitest';
import { preOrder, inOrder, postOrder, type Sink } from './traversal.mjs';
import { insert } from './avl-tree.mjs';
import type { AVLNode } from './avl-node.mjs';

function build(keys: number[]): AVLNode<number> | null {
  let root: AVLNode<number> | null = null;
  for (const k of keys) root = insert(root, k);
  return root;
}

describe('traversal helpers', () => {
  // 0 ( -43, 78 ( 23, 234 ) )
  const root = build([23, -43, 0, 234, 78]);

  it('preOrder visits a node before its subtrees', () => {
    expect(preOrder(root, new Array<number>())).toEqual([0, -43, 78, 23, 234]);
  });

  it('inOrder visits keys in sorted order', () => {
    expect(inOrder(root, new Array<number>())).toEqual([-43, 0, 23, 78, 234]);
  });

  it('postOrder visits both subtrees before the node', () => {
    expect(postOrder(root, new Array<number>())).toEqual([-43, 23, 234, 78, 0]);
  });

  it('leaves the sink untouched for an empty tree', () => {
    expect(inOrder<number, number[]>(null, [1])).toEqual([1]);
  });

  it('accepts any sink with a push method', () => {
    const labels: string[] = [];
    const sink: Sink<number> = { push: (v) => labels.push(`#${v}`) };

    inOrder(root, sink);

    expect(labels).toEqual(['#-43', '#0', '#23', '#78', '#234']);
  });
});
