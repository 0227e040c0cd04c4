/**
 * A node of a parent-linked AVL tree.
 *
 * `left` and `right` own their subtrees. `parent` is a plain back reference used for upward
 * walks and is the only source of truth for which child slot a node occupies: with duplicate
 * keys and rotations, comparing values cannot tell the two slots apart.
 *
 * @template T - The type of the key stored in the node.
 */
export class AVLNode<T> {
  /** Cached height. A leaf has height 0, a missing subtree counts as -1. */
  height = 0;
  left: AVLNode<T> | null = null;
  right: AVLNode<T> | null = null;
  parent: AVLNode<T> | null = null;

  constructor(public value: T) {}
}

/**
 * The single reference that currently owns a node: either the tree handle or one of the two
 * child fields of the node's parent. Rotations rewrite the slot without knowing which kind it is.
 *
 * @template T - The type of the keys in the tree.
 */
export interface NodeSlot<T> {
  get(): AVLNode<T> | null;
  set(node: AVLNode<T> | null): void;
}

/**
 * The slot held by the tree handle itself.
 *
 * @template T - The type of the keys in the tree.
 */
export class RootSlot<T> implements NodeSlot<T> {
  constructor(public node: AVLNode<T> | null) {}

  get(): AVLNode<T> | null {
    return this.node;
  }

  set(node: AVLNode<T> | null): void {
    this.node = node;
  }
}

export type Side = 'left' | 'right';

/**
 * A child field of a parent node.
 *
 * @template T - The type of the keys in the tree.
 */
export class ChildSlot<T> implements NodeSlot<T> {
  constructor(
    readonly parent: AVLNode<T>,
    readonly side: Side,
  ) {}

  get(): AVLNode<T> | null {
    return this.parent[this.side];
  }

  set(node: AVLNode<T> | null): void {
    this.parent[this.side] = node;
  }
}

/**
 * Returns the slot that owns `node`, resolved through the parent link.
 *
 * @param node - A node linked into the tree whose handle is `root`.
 * @param root - The slot of the tree handle, used when `node` has no parent.
 * @throws {Error} If the parent link does not point back at `node`.
 */
export function slotOf<T>(node: AVLNode<T>, root: RootSlot<T>): NodeSlot<T> {
  const parent = node.parent;
  if (parent === null) return root;
  if (parent.left === node) return new ChildSlot(parent, 'left');
  if (parent.right === node) return new ChildSlot(parent, 'right');
  throw new Error('parent link does not reference this node');
}

export function leftmost<T>(node: AVLNode<T>): AVLNode<T> {
  let current = node;
  while (current.left) current = current.left;
  return current;
}

export function rightmost<T>(node: AVLNode<T>): AVLNode<T> {
  let current = node;
  while (current.right) current = current.right;
  return current;
}

/**
 * Returns the next node in in-order sequence, or null after the last one.
 *
 * A single call may climb the full height of the tree, but stepping through the whole tree
 * crosses every edge at most twice.
 */
export function successor<T>(node: AVLNode<T>): AVLNode<T> | null {
  if (node.right) return leftmost(node.right);
  let current = node;
  let parent = current.parent;
  while (parent && parent.right === current) {
    current = parent;
    parent = current.parent;
  }
  return parent;
}

/**
 * Returns the previous node in in-order sequence, or null before the first one.
 */
export function predecessor<T>(node: AVLNode<T>): AVLNode<T> | null {
  if (node.left) return rightmost(node.left);
  let current = node;
  let parent = current.parent;
  while (parent && parent.left === current) {
    current = parent;
    parent = current.parent;
  }
  return parent;
}
