import { leftmost, rightmost, successor, predecessor, type AVLNode } from './avl-node.mjs';

export type IteratorDirection = 'forward' | 'reverse';

/**
 * Read-only view of a tree position.
 *
 * @template T - The type of the keys in the tree.
 */
export interface ReadonlyTreeIterator<T> extends IterableIterator<T> {
  readonly node: AVLNode<T> | null;
  readonly direction: IteratorDirection;
  readonly done: boolean;
  readonly value: T;
  increment(): this;
  decrement(): this;
  equals(other: ReadonlyTreeIterator<T>): boolean;
  clone(): ReadonlyTreeIterator<T>;
}

/**
 * A position in a parent-linked AVL tree, or the end sentinel (`node === null`).
 *
 * Stepping only follows `left`, `right` and `parent` links, so an iterator needs no reference to
 * the root once created. A reverse iterator mirrors a forward one with left and right swapped.
 *
 * Any erase that removes the referenced node, or an ancestor the next step relies on, invalidates
 * the iterator. Erasing a node with children copies a neighbour's key into it and frees the
 * neighbour, so iterators on that neighbour are invalidated as well. Using an invalidated iterator
 * is undefined behaviour and is not detected.
 *
 * @template T - The type of the keys in the tree.
 */
export class TreeIterator<T> implements ReadonlyTreeIterator<T> {
  constructor(
    private current: AVLNode<T> | null,
    readonly direction: IteratorDirection = 'forward',
  ) {}

  get node(): AVLNode<T> | null {
    return this.current;
  }

  /** True at the end sentinel. */
  get done(): boolean {
    return this.current === null;
  }

  /**
   * The key at the current position.
   *
   * @throws {Error} At the end sentinel.
   */
  get value(): T {
    if (!this.current) throw new Error('cannot dereference the end iterator');
    return this.current.value;
  }

  /**
   * Overwrites the key at the current position. Writing a key that breaks the ordering of the
   * tree is allowed and leaves the tree unusable for searches.
   *
   * @throws {Error} At the end sentinel.
   */
  set value(value: T) {
    if (!this.current) throw new Error('cannot dereference the end iterator');
    this.current.value = value;
  }

  /**
   * Moves one step in the iterator's direction. Stepping past the last key lands on the sentinel.
   *
   * @throws {Error} At the end sentinel.
   */
  increment(): this {
    if (!this.current) throw new Error('cannot increment the end iterator');
    this.current = this.direction === 'forward' ? successor(this.current) : predecessor(this.current);
    return this;
  }

  /**
   * Moves one step against the iterator's direction. Stepping before the first key lands on the
   * sentinel; the sentinel itself cannot be stepped back from.
   *
   * @throws {Error} At the end sentinel.
   */
  decrement(): this {
    if (!this.current) throw new Error('cannot decrement the end iterator');
    this.current = this.direction === 'forward' ? predecessor(this.current) : successor(this.current);
    return this;
  }

  /**
   * Two iterators are equal when they reference the same node, or are both at the end.
   * Equal keys in distinct nodes do not make iterators equal.
   */
  equals(other: ReadonlyTreeIterator<T>): boolean {
    return this.current === other.node;
  }

  clone(): TreeIterator<T> {
    return new TreeIterator(this.current, this.direction);
  }

  /**
   * Yields the current key and advances, so that a `for...of` over an iterator walks the rest of
   * the tree from its position.
   */
  next(): IteratorResult<T> {
    if (!this.current) return { done: true, value: undefined };
    const value = this.current.value;
    this.increment();
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

export function begin<T>(root: AVLNode<T> | null): TreeIterator<T> {
  return new TreeIterator(root ? leftmost(root) : null, 'forward');
}

export function end<T>(_root: AVLNode<T> | null): TreeIterator<T> {
  return new TreeIterator<T>(null, 'forward');
}

export function rbegin<T>(root: AVLNode<T> | null): TreeIterator<T> {
  return new TreeIterator(root ? rightmost(root) : null, 'reverse');
}

export function rend<T>(_root: AVLNode<T> | null): TreeIterator<T> {
  return new TreeIterator<T>(null, 'reverse');
}
