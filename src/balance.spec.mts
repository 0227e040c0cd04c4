import { describe, it, expect } from 'vitest';
import { AVLNode, RootSlot, ChildSlot, type Side } from './avl-node.mjs';
import { height, updateHeight, balanceFactor, rotateLeft, rotateRight, checkForRotations } from './balance.mjs';
import { insert } from './avl-tree.mjs';
import { preOrder } from './traversal.mjs';
import { areParentsConsistent, areHeightsCorrect } from './avl-verify.mjs';

/**
 * Attaches `child` under `parent` on the given side and returns the child.
 */
function link<T>(parent: AVLNode<T>, side: Side, child: AVLNode<T>): AVLNode<T> {
  parent[side] = child;
  child.parent = parent;
  return child;
}

function node(value: number, h = 0): AVLNode<number> {
  const n = new AVLNode(value);
  n.height = h;
  return n;
}

function heightsPreOrder(root: AVLNode<number> | null, out: number[] = []): number[] {
  if (!root) return out;
  out.push(root.height);
  heightsPreOrder(root.left, out);
  heightsPreOrder(root.right, out);
  return out;
}

describe('height and balance factor', () => {
  it('treats a missing subtree as -1 and reads the cached field otherwise', () => {
    expect(height(null)).toBe(-1);
    expect(height(node(1))).toBe(0);
    expect(height(node(1, 5))).toBe(5);
  });

  it('updateHeight reports whether the stored value changed', () => {
    const root = node(2);
    link(root, 'left', node(1));
    expect(updateHeight(root)).toBe(true);
    expect(root.height).toBe(1);
    expect(updateHeight(root)).toBe(false);
    expect(root.height).toBe(1);
  });

  it('balanceFactor is left height minus right height', () => {
    const root = node(3, 2);
    const left = link(root, 'left', node(2, 1));
    link(left, 'left', node(1));
    expect(balanceFactor(root)).toBe(2);
    expect(balanceFactor(left)).toBe(1);
    expect(balanceFactor(node(9))).toBe(0);
  });
});

describe('rotations', () => {
  it('rotateLeft promotes the right child through the root slot', () => {
    const one = node(1, 2);
    const two = link(one, 'right', node(2, 1));
    const three = link(two, 'right', node(3));
    const slot = new RootSlot(one);

    rotateLeft(slot);

    expect(slot.node).toBe(two);
    expect(two.parent).toBeNull();
    expect(two.left).toBe(one);
    expect(two.right).toBe(three);
    expect(one.parent).toBe(two);
    expect(one.right).toBeNull();
    expect([one.height, two.height, three.height]).toEqual([0, 1, 0]);
  });

  it('rotateRight moves the inner grandchild across and fixes its parent', () => {
    const four = node(4, 2);
    const two = link(four, 'left', node(2, 1));
    const five = link(four, 'right', node(5));
    const one = link(two, 'left', node(1));
    const three = link(two, 'right', node(3));
    const slot = new RootSlot(four);

    rotateRight(slot);

    expect(slot.node).toBe(two);
    expect(two.left).toBe(one);
    expect(two.right).toBe(four);
    expect(four.left).toBe(three);
    expect(four.right).toBe(five);
    expect(three.parent).toBe(four);
    expect(four.parent).toBe(two);
    expect(four.height).toBe(1);
    expect(two.height).toBe(2);
    expect(areParentsConsistent(two)).toBe(true);
    expect(areHeightsCorrect(two)).toBe(true);
  });

  it('rewrites a child slot of the former parent', () => {
    const top = node(10, 3);
    const one = link(top, 'left', node(1, 2));
    const two = link(one, 'right', node(2, 1));
    link(two, 'right', node(3));

    rotateLeft(new ChildSlot(top, 'left'));

    expect(top.left).toBe(two);
    expect(two.parent).toBe(top);
    expect(two.left).toBe(one);
  });

  it('throws when the child to promote is missing', () => {
    expect(() => rotateLeft(new RootSlot(node(1)))).toThrow('rotateLeft requires a right child');
    expect(() => rotateRight(new RootSlot(node(1)))).toThrow('rotateRight requires a left child');
    expect(() => rotateLeft(new RootSlot<number>(null))).toThrow();
  });
});

describe('checkForRotations', () => {
  it('repairs a left-right imbalance with a double rotation', () => {
    const three = node(3, 2);
    const one = link(three, 'left', node(1, 1));
    const two = link(one, 'right', node(2));
    const slot = new RootSlot(three);

    expect(checkForRotations(slot)).toBe(true);

    expect(slot.node).toBe(two);
    expect(two.left).toBe(one);
    expect(two.right).toBe(three);
    expect(two.parent).toBeNull();
    expect([one.height, two.height, three.height]).toEqual([0, 1, 0]);
  });

  it('repairs a right-left imbalance with a double rotation', () => {
    const one = node(1, 2);
    const three = link(one, 'right', node(3, 1));
    const two = link(three, 'left', node(2));
    const slot = new RootSlot(one);

    expect(checkForRotations(slot)).toBe(true);

    expect(slot.node).toBe(two);
    expect(two.left).toBe(one);
    expect(two.right).toBe(three);
  });

  it('uses a single rotation when the heavy child leans the same way', () => {
    const three = node(3, 2);
    const two = link(three, 'left', node(2, 1));
    link(two, 'left', node(1));
    const slot = new RootSlot(three);

    expect(checkForRotations(slot)).toBe(true);
    expect(slot.node).toBe(two);
    expect(preOrder(slot.node, new Array<number>())).toEqual([2, 1, 3]);
  });

  it('is a no-op on every node of a balanced tree', () => {
    let root: AVLNode<number> | null = null;
    for (const k of [4, 2, 6, 1, 3, 5, 7, 8]) root = insert(root, k);
    const keysBefore = preOrder(root, new Array<number>());
    const heightsBefore = heightsPreOrder(root);

    const slot = new RootSlot(root);
    const nodes: AVLNode<number>[] = [];
    const collect = (n: AVLNode<number> | null) => {
      if (!n) return;
      nodes.push(n);
      collect(n.left);
      collect(n.right);
    };
    collect(root);
    for (const n of nodes) {
      const parent = n.parent;
      const target = parent ? new ChildSlot(parent, parent.left === n ? 'left' : 'right') : slot;
      expect(checkForRotations(target)).toBe(false);
    }

    expect(slot.node).toBe(root);
    expect(preOrder(root, new Array<number>())).toEqual(keysBefore);
    expect(heightsPreOrder(root)).toEqual(heightsBefore);
  });

  it('returns false for an empty slot', () => {
    expect(checkForRotations(new RootSlot<number>(null))).toBe(false);
  });
});
