export { AVLNode, RootSlot, ChildSlot, slotOf, leftmost, rightmost, successor, predecessor } from './avl-node.mjs';
export type { NodeSlot, Side } from './avl-node.mjs';
export { height, updateHeight, balanceFactor, rotateLeft, rotateRight, checkForRotations } from './balance.mjs';
export { AVLTree, insert, insertNode, find, erase, eraseNode, defaultCompare } from './avl-tree.mjs';
export type { AVLTreeOptions, Comparator } from './avl-tree.mjs';
export { TreeIterator, begin, end, rbegin, rend } from './avl-iterator.mjs';
export type { ReadonlyTreeIterator, IteratorDirection } from './avl-iterator.mjs';
export { preOrder, inOrder, postOrder } from './traversal.mjs';
export type { Sink } from './traversal.mjs';
export { renderLevels, renderAscii } from './avl-display.mjs';
export {
  computeHeight,
  areHeightsCorrect,
  isTreeBalanced,
  isOrdered,
  areParentsConsistent,
  countNodes,
  verifyTree,
} from './avl-verify.mjs';
