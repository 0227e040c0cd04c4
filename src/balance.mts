import { ChildSlot, type AVLNode, type NodeSlot } from './avl-node.mjs';

/**
 * Returns the cached height of a node, or -1 for a missing subtree.
 */
export function height<T>(node: AVLNode<T> | null): number {
  return node ? node.height : -1;
}

/**
 * Recomputes the height of a node from its children.
 * Must run after any change to the node's child links and before its balance factor is read.
 *
 * @returns Whether the stored height changed.
 */
export function updateHeight<T>(node: AVLNode<T>): boolean {
  const lh = height(node.left);
  const rh = height(node.right);
  const next = (lh > rh ? lh : rh) + 1;
  if (next === node.height) return false;
  node.height = next;
  return true;
}

/**
 * Height of the left subtree minus height of the right subtree.
 * A balanced node has a factor of -1, 0 or 1.
 */
export function balanceFactor<T>(node: AVLNode<T>): number {
  return height(node.left) - height(node.right);
}

/**
 * Performs a left rotation on the node held by `slot`.
 *
 * Transformation:
 *   x               y
 *  / \             / \
 * T1  y    -->    x  T3
 *    / \         / \
 *   T2 T3       T1 T2
 *
 * @param slot - The slot owning `x`; it holds `y` afterwards.
 * @throws {Error} If the slot is empty or `x` has no right child.
 */
export function rotateLeft<T>(slot: NodeSlot<T>): void {
  const x = slot.get();
  if (!x) throw new Error('rotateLeft on an empty slot');
  const y = x.right;
  if (!y) throw new Error('rotateLeft requires a right child');

  const t2 = y.left;
  x.right = t2;
  if (t2) t2.parent = x;

  y.parent = x.parent;
  y.left = x;
  x.parent = y;
  slot.set(y);

  // x is now below y, so it has to be fixed first
  updateHeight(x);
  updateHeight(y);
}

/**
 * Performs a right rotation on the node held by `slot`.
 *
 * Transformation:
 *     y           x
 *    / \         / \
 *   x  T3  -->  T1  y
 *  / \             / \
 * T1 T2           T2 T3
 *
 * @param slot - The slot owning `y`; it holds `x` afterwards.
 * @throws {Error} If the slot is empty or `y` has no left child.
 */
export function rotateRight<T>(slot: NodeSlot<T>): void {
  const y = slot.get();
  if (!y) throw new Error('rotateRight on an empty slot');
  const x = y.left;
  if (!x) throw new Error('rotateRight requires a left child');

  const t2 = x.right;
  y.left = t2;
  if (t2) t2.parent = y;

  x.parent = y.parent;
  x.right = y;
  y.parent = x;
  slot.set(x);

  updateHeight(y);
  updateHeight(x);
}

/**
 * Restores the AVL condition at the node held by `slot`, assuming both of its subtrees are
 * already balanced and differ in height by at most two.
 *
 * Used unchanged by insertion and deletion. On a balanced node with a correct height this
 * leaves the tree untouched.
 *
 * @returns Whether a (single or double) rotation was performed.
 */
export function checkForRotations<T>(slot: NodeSlot<T>): boolean {
  const node = slot.get();
  if (!node) return false;

  updateHeight(node);
  const balance = balanceFactor(node);

  if (balance > 1) {
    const left = node.left;
    if (left && balanceFactor(left) < 0) {
      rotateLeft(new ChildSlot(node, 'left'));
    }
    rotateRight(slot);
    return true;
  }

  if (balance < -1) {
    const right = node.right;
    if (right && balanceFactor(right) > 0) {
      rotateRight(new ChildSlot(node, 'right'));
    }
    rotateLeft(slot);
    return true;
  }

  return false;
}
