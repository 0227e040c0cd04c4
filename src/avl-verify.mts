import type { AVLNode } from './avl-node.mjs';
import type { Comparator } from './avl-tree.mjs';

/**
 * Recomputes the height of a subtree by walking it, ignoring the cached fields.
 */
export function computeHeight<T>(node: AVLNode<T> | null): number {
  if (!node) return -1;
  return Math.max(computeHeight(node.left), computeHeight(node.right)) + 1;
}

/**
 * True when every cached height equals the height recomputed from the children.
 */
export function areHeightsCorrect<T>(node: AVLNode<T> | null): boolean {
  if (!node) return true;
  if (!areHeightsCorrect(node.left) || !areHeightsCorrect(node.right)) return false;
  const lh = node.left ? node.left.height : -1;
  const rh = node.right ? node.right.height : -1;
  return node.height === Math.max(lh, rh) + 1;
}

/**
 * True when the recomputed heights of the two subtrees differ by at most one at every node.
 */
export function isTreeBalanced<T>(node: AVLNode<T> | null): boolean {
  return balancedHeight(node) !== null;
}

function balancedHeight<T>(node: AVLNode<T> | null): number | null {
  if (!node) return -1;
  const lh = balancedHeight(node.left);
  if (lh === null) return null;
  const rh = balancedHeight(node.right);
  if (rh === null) return null;
  if (Math.abs(lh - rh) > 1) return null;
  return Math.max(lh, rh) + 1;
}

/**
 * True when an in-order walk yields a non-decreasing key sequence.
 */
export function isOrdered<T>(node: AVLNode<T> | null, compare: Comparator<T>): boolean {
  const keys: T[] = [];
  const collect = (n: AVLNode<T> | null): void => {
    if (!n) return;
    collect(n.left);
    keys.push(n.value);
    collect(n.right);
  };
  collect(node);
  for (let i = 1; i < keys.length; i++) {
    if (compare(keys[i - 1], keys[i]) > 0) return false;
  }
  return true;
}

/**
 * True when the root has no parent and every child points back at the node holding it.
 */
export function areParentsConsistent<T>(root: AVLNode<T> | null): boolean {
  if (!root) return true;
  if (root.parent !== null) return false;
  const stack: AVLNode<T>[] = [root];
  while (stack.length) {
    const n = stack.pop();
    if (!n) break;
    for (const child of [n.left, n.right]) {
      if (!child) continue;
      if (child.parent !== n) return false;
      stack.push(child);
    }
  }
  return true;
}

export function countNodes<T>(node: AVLNode<T> | null): number {
  return node ? 1 + countNodes(node.left) + countNodes(node.right) : 0;
}

/**
 * Runs every structural check on a tree.
 *
 * @returns The names of the broken invariants, empty for a valid AVL tree.
 */
export function verifyTree<T>(root: AVLNode<T> | null, compare: Comparator<T>): string[] {
  const violations: string[] = [];
  if (!areParentsConsistent(root)) violations.push('parent links');
  if (!areHeightsCorrect(root)) violations.push('heights');
  if (!isTreeBalanced(root)) violations.push('balance');
  if (!isOrdered(root, compare)) violations.push('ordering');
  return violations;
}
