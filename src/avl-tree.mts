import { AVLNode, RootSlot, ChildSlot, slotOf, leftmost, rightmost } from './avl-node.mjs';
import { checkForRotations, height } from './balance.mjs';
import { TreeIterator, begin, end, rbegin, rend, type ReadonlyTreeIterator } from './avl-iterator.mjs';
import { renderAscii, renderLevels } from './avl-display.mjs';
import { verifyTree } from './avl-verify.mjs';

/**
 * Orders two keys. Negative when `a` sorts before `b`, positive when after, zero when equal.
 */
export type Comparator<T> = (a: T, b: T) => number;

export function defaultCompare<T>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Walks from `start` up to and including the root, giving every node a chance to rebalance.
 * The next ancestor is read before the check, since a rotation moves `current` down a level.
 */
function rebalanceUpwards<T>(start: AVLNode<T> | null, root: RootSlot<T>): void {
  let current = start;
  while (current) {
    const next = current.parent;
    checkForRotations(slotOf(current, root));
    current = next;
  }
}

/**
 * Links a new node holding `value` into the tree and rebalances its ancestors.
 *
 * Keys equal to an existing key go to its left: the descent moves right only when
 * `node.value < value`.
 *
 * @returns The new root and the node that was created.
 */
export function insertNode<T>(
  root: AVLNode<T> | null,
  value: T,
  compare: Comparator<T> = defaultCompare,
): { root: AVLNode<T>; node: AVLNode<T> } {
  const node = new AVLNode(value);
  const rootSlot = new RootSlot(root);

  let parent: AVLNode<T> | null = null;
  let slot: RootSlot<T> | ChildSlot<T> = rootSlot;
  let current = root;
  while (current) {
    parent = current;
    slot = new ChildSlot(current, compare(current.value, value) < 0 ? 'right' : 'left');
    current = slot.get();
  }
  node.parent = parent;
  slot.set(node);

  // At most one rotation fires here, but heights still have to be refreshed up to the root.
  rebalanceUpwards(parent, rootSlot);

  return { root: rootSlot.node ?? node, node };
}

/**
 * Inserts `value` and returns the (possibly new) root. Duplicates are allowed.
 */
export function insert<T>(root: AVLNode<T> | null, value: T, compare: Comparator<T> = defaultCompare): AVLNode<T> {
  return insertNode(root, value, compare).root;
}

/**
 * Returns the first node on the search path whose key equals `value`, or null.
 */
export function find<T>(
  root: AVLNode<T> | null,
  value: T,
  compare: Comparator<T> = defaultCompare,
): AVLNode<T> | null {
  let current = root;
  while (current) {
    const cmp = compare(current.value, value);
    if (cmp === 0) return current;
    current = cmp < 0 ? current.right : current.left;
  }
  return null;
}

/**
 * Removes `node` from the tree whose root is `root`.
 *
 * A node with a left subtree takes its in-order predecessor's key, one with only a right subtree
 * takes its successor's key, and the node that supplied the key is unlinked instead. That node has
 * at most one child, which moves into its slot. Every ancestor of the unlinked node is then
 * rebalanced; unlike insertion, several of them may rotate.
 *
 * The caller must have obtained `node` from this tree.
 *
 * @returns The new root, or null when the tree became empty.
 */
export function eraseNode<T>(root: AVLNode<T>, node: AVLNode<T>): AVLNode<T> | null {
  const rootSlot = new RootSlot<T>(root);

  let removed = node;
  if (node.left) {
    removed = rightmost(node.left);
  } else if (node.right) {
    removed = leftmost(node.right);
  }
  if (removed !== node) node.value = removed.value;

  const child = removed.left ?? removed.right;
  const parent = removed.parent;
  slotOf(removed, rootSlot).set(child);
  if (child) child.parent = parent;
  removed.parent = null;
  removed.left = null;
  removed.right = null;

  rebalanceUpwards(parent, rootSlot);

  return rootSlot.node;
}

/**
 * Removes one node whose key equals `value`. An absent key leaves the tree as it was.
 *
 * @returns The new root, or null when the tree became empty.
 */
export function erase<T>(
  root: AVLNode<T> | null,
  value: T,
  compare: Comparator<T> = defaultCompare,
): AVLNode<T> | null {
  if (!root) return null;
  const target = find(root, value, compare);
  if (!target) return root;
  return eraseNode(root, target);
}

/**
 * Options for {@link AVLTree}.
 *
 * @template T - The type of the keys in the tree.
 */
export interface AVLTreeOptions<T> {
  /** Key ordering. Defaults to the `<` and `>` operators. */
  compare?: Comparator<T>;
  /** Check every invariant after each mutation and throw if one is broken. */
  verify?: boolean;
}

/**
 * An ordered multiset backed by a parent-linked AVL tree.
 *
 * @template T - The type of the keys in the tree.
 */
export class AVLTree<T> {
  private rootNode: AVLNode<T> | null = null;
  private count = 0;
  private readonly compare: Comparator<T>;
  private readonly verify: boolean;

  /**
   * Creates an empty tree, optionally filled from `values`.
   *
   * @param values - Keys to insert in iteration order.
   * @param options - Ordering and verification settings.
   */
  constructor(values?: Iterable<T>, options?: AVLTreeOptions<T>) {
    this.compare = options?.compare ?? defaultCompare;
    this.verify = options?.verify ?? false;
    if (values) {
      for (const value of values) this.insert(value);
    }
  }

  get root(): AVLNode<T> | null {
    return this.rootNode;
  }

  get size(): number {
    return this.count;
  }

  /** Height of the root, -1 for an empty tree. */
  get height(): number {
    return height(this.rootNode);
  }

  isEmpty(): boolean {
    return this.rootNode === null;
  }

  /**
   * Inserts a key. Equal keys are kept side by side.
   *
   * @returns An iterator positioned on the new key.
   */
  insert(value: T): TreeIterator<T> {
    const { root, node } = insertNode(this.rootNode, value, this.compare);
    this.rootNode = root;
    this.count++;
    this.checkInvariants('insert');
    return new TreeIterator(node);
  }

  /**
   * Removes one occurrence of `value`.
   *
   * @returns False when the key is not in the tree.
   */
  delete(value: T): boolean {
    const target = find(this.rootNode, value, this.compare);
    if (!target || !this.rootNode) return false;
    this.removeNode(this.rootNode, target);
    return true;
  }

  /**
   * Removes the key the iterator points at. The iterator, and any other iterator on the removed
   * position or on the neighbour that replaces it, must not be used afterwards.
   *
   * @throws {Error} If the iterator is at the end.
   */
  deleteAt(iterator: ReadonlyTreeIterator<T>): void {
    const target = iterator.node;
    if (!target || !this.rootNode) throw new Error('cannot erase at the end iterator');
    this.removeNode(this.rootNode, target);
  }

  /**
   * @returns An iterator on a node holding `value`, or the end iterator.
   */
  find(value: T): TreeIterator<T> {
    return new TreeIterator(find(this.rootNode, value, this.compare));
  }

  has(value: T): boolean {
    return find(this.rootNode, value, this.compare) !== null;
  }

  /** Smallest key, or undefined for an empty tree. */
  min(): T | undefined {
    return this.rootNode ? leftmost(this.rootNode).value : undefined;
  }

  /** Largest key, or undefined for an empty tree. */
  max(): T | undefined {
    return this.rootNode ? rightmost(this.rootNode).value : undefined;
  }

  clear(): void {
    this.rootNode = null;
    this.count = 0;
  }

  begin(): TreeIterator<T> {
    return begin(this.rootNode);
  }

  end(): TreeIterator<T> {
    return end(this.rootNode);
  }

  rbegin(): TreeIterator<T> {
    return rbegin(this.rootNode);
  }

  rend(): TreeIterator<T> {
    return rend(this.rootNode);
  }

  cbegin(): ReadonlyTreeIterator<T> {
    return begin(this.rootNode);
  }

  cend(): ReadonlyTreeIterator<T> {
    return end(this.rootNode);
  }

  /**
   * Yields all keys in ascending order.
   */
  public *values(): Generator<T, void, unknown> {
    for (const it = this.begin(); !it.done; it.increment()) {
      yield it.value;
    }
  }

  /**
   * Yields all keys in descending order.
   */
  public *reversed(): Generator<T, void, unknown> {
    for (const it = this.rbegin(); !it.done; it.increment()) {
      yield it.value;
    }
  }

  public *[Symbol.iterator](): Generator<T, void, unknown> {
    yield* this.values();
  }

  /**
   * Calls `callback` for every key in ascending order.
   */
  forEach(callback: (value: T) => void): void {
    for (const value of this.values()) callback(value);
  }

  /**
   * Prints the tree to the console, one line per level.
   *
   * @example
   * 0
   * -43 78
   * 23 234
   */
  printTree(): void {
    if (!this.rootNode) {
      console.log('<empty>');
      return;
    }
    for (const line of renderLevels(this.rootNode)) console.log(line);
  }

  /**
   * Prints an ASCII drawing of the tree to the console. Missing children are drawn as `.`.
   *
   * @example
   *   2
   * --|--
   * |   |
   * 1   3
   */
  ascii(): void {
    if (!this.rootNode) {
      console.log('<empty>');
      return;
    }
    for (const line of renderAscii(this.rootNode)) console.log(line);
  }

  private removeNode(root: AVLNode<T>, target: AVLNode<T>): void {
    this.rootNode = eraseNode(root, target);
    this.count--;
    this.checkInvariants('delete');
  }

  private checkInvariants(operation: string): void {
    if (!this.verify) return;
    const violations = verifyTree(this.rootNode, this.compare);
    if (violations.length > 0) {
      throw new Error(`${operation} broke the tree: ${violations.join(', ')}`);
    }
  }
}
