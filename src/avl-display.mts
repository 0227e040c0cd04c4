import type { AVLNode } from './avl-node.mjs';

/**
 * Renders the keys of each level of the tree, top to bottom, separated by single spaces.
 */
export function renderLevels<T>(root: AVLNode<T>): string[] {
  const lines: string[] = [];
  let level: AVLNode<T>[] = [root];
  while (level.length) {
    lines.push(level.map((n) => String(n.value)).join(' '));
    const next: AVLNode<T>[] = [];
    for (const n of level) {
      if (n.left) next.push(n.left);
      if (n.right) next.push(n.right);
    }
    level = next;
  }
  return lines;
}

interface Picture {
  lines: string[];
  width: number;
  middle: number;
}

const GAP = 3;
const MISSING: Picture = { lines: ['.'], width: 1, middle: 0 };

function layout<T>(node: AVLNode<T>): Picture {
  const text = String(node.value);
  const textWidth = Math.max(1, text.length);

  if (!node.left && !node.right) {
    return { lines: [text], width: textWidth, middle: Math.floor(textWidth / 2) };
  }

  const left = node.left ? layout(node.left) : MISSING;
  const right = node.right ? layout(node.right) : MISSING;

  const childrenWidth = left.width + GAP + right.width;
  let width = Math.max(textWidth, childrenWidth);
  let middle = Math.floor(width / 2);

  // a wide key may stick out past the children on either side
  const leftNeeded = Math.max(0, Math.floor(textWidth / 2) - middle);
  const rightNeeded = Math.max(0, middle + Math.ceil(textWidth / 2) - (width - 1));
  if (leftNeeded > 0 || rightNeeded > 0) {
    width += leftNeeded + rightNeeded;
    middle = Math.floor(width / 2);
  }

  const leftStart = Math.floor((width - childrenWidth) / 2);
  const rightStart = leftStart + left.width + GAP;

  const textStart = middle - Math.floor(text.length / 2);
  const parentLine =
    ' '.repeat(Math.max(0, textStart)) + text + ' '.repeat(Math.max(0, width - textStart - text.length));

  const leftMiddle = leftStart + left.middle;
  const rightMiddle = rightStart + right.middle;

  const bridge: string[] = new Array<string>(width).fill(' ');
  for (let c = leftMiddle; c <= rightMiddle; c++) bridge[c] = '-';
  bridge[middle] = '|';

  const drop: string[] = new Array<string>(width).fill(' ');
  drop[leftMiddle] = '|';
  drop[rightMiddle] = '|';

  const childLines: string[] = [];
  const rows = Math.max(left.lines.length, right.lines.length);
  for (let row = 0; row < rows; row++) {
    let line = ' '.repeat(leftStart) + (left.lines[row] ?? ' '.repeat(left.width));
    line += ' '.repeat(rightStart - line.length) + (right.lines[row] ?? ' '.repeat(right.width));
    if (line.length < width) line += ' '.repeat(width - line.length);
    childLines.push(line);
  }

  return { lines: [parentLine, bridge.join(''), drop.join(''), ...childLines], width, middle };
}

/**
 * Draws the tree as ASCII art. Each key is centred over a bridge to its two children; a missing
 * child of an inner node is drawn as `.`.
 *
 * @example
 *   2
 * --|--
 * |   |
 * 1   3
 */
export function renderAscii<T>(root: AVLNode<T>): string[] {
  return layout(root).lines;
}
