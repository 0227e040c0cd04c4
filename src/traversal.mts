import type { AVLNode } from './avl-node.mjs';

/**
 * Anything keys can be appended to in order. Arrays qualify.
 */
export interface Sink<T> {
  push(value: T): unknown;
}

/**
 * Appends keys node-first, then the left subtree, then the right subtree.
 */
export function preOrder<T, S extends Sink<T>>(root: AVLNode<T> | null, sink: S): S {
  if (!root) return sink;
  sink.push(root.value);
  preOrder(root.left, sink);
  preOrder(root.right, sink);
  return sink;
}

/**
 * Appends keys in sorted order.
 */
export function inOrder<T, S extends Sink<T>>(root: AVLNode<T> | null, sink: S): S {
  if (!root) return sink;
  inOrder(root.left, sink);
  sink.push(root.value);
  inOrder(root.right, sink);
  return sink;
}

/**
 * Appends keys of both subtrees before the node itself.
 */
export function postOrder<T, S extends Sink<T>>(root: AVLNode<T> | null, sink: S): S {
  if (!root) return sink;
  postOrder(root.left, sink);
  postOrder(root.right, sink);
  sink.push(root.value);
  return sink;
}
