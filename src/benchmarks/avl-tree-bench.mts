import { performance } from 'perf_hooks';
import { AVLTree } from '../avl-tree.mjs';

function xorshift32(seed: number) {
  let s = seed >>> 0;
  return () => {
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    return s >>> 0;
  };
}

function makeRandomKeys(n: number, maxKey: number, seed = 1234567): number[] {
  const rand = xorshift32(seed);
  return Array.from({ length: n }, () => rand() % Math.max(1, maxKey));
}

function shuffle<T>(arr: T[], seed = 42) {
  const rnd = xorshift32(seed);
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rnd() % (i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

/**
 * Reference ordered multiset: a sorted array with binary search and splice.
 */
class SortedArraySet {
  private readonly items: number[] = [];

  private lowerBound(key: number): number {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.items[mid] < key) low = mid + 1;
      else high = mid;
    }
    return low;
  }

  insert(key: number): void {
    this.items.splice(this.lowerBound(key), 0, key);
  }

  has(key: number): boolean {
    const idx = this.lowerBound(key);
    return idx < this.items.length && this.items[idx] === key;
  }

  delete(key: number): boolean {
    const idx = this.lowerBound(key);
    if (idx >= this.items.length || this.items[idx] !== key) return false;
    this.items.splice(idx, 1);
    return true;
  }
}

interface OrderedSet {
  insert(key: number): unknown;
  has(key: number): boolean;
  delete(key: number): boolean;
}

const implementations: Record<string, () => OrderedSet> = {
  avl: () => new AVLTree<number>(),
  'sorted-array': () => new SortedArraySet(),
};

function time(fn: () => void): number {
  const t0 = performance.now();
  fn();
  return performance.now() - t0;
}

function runOnce(name: string, n: number, mode: 'random' | 'sequential') {
  const set = implementations[name]();
  const keys = mode === 'sequential' ? Array.from({ length: n }, (_, i) => i) : makeRandomKeys(n, n * 2, 12345);

  const insertMs = time(() => {
    for (const key of keys) set.insert(key);
  });

  const searchKeys = keys.slice();
  shuffle(searchKeys, 9999);
  const searchMs = time(() => {
    for (const key of searchKeys) set.has(key);
  });

  const deleteMs = time(() => {
    for (const key of keys) set.delete(key);
  });

  return { insertMs, searchMs, deleteMs };
}

function printRow(name: string, n: number, insMs: number, srchMs: number, delMs: number) {
  const perOp = (ms: number) => ((ms / n) * 1000).toFixed(3);
  console.log(
    `${name}\t${n}\t${Math.log2(n).toFixed(2)}\t${insMs.toFixed(2)}\t${perOp(insMs)}\t${srchMs.toFixed(
      2,
    )}\t${perOp(srchMs)}\t${delMs.toFixed(2)}\t${perOp(delMs)}`,
  );
}

function runSizes(sizes: number[], mode: 'random' | 'sequential') {
  console.log(
    'impl\tn\tlog2(n)\tinsert_total_ms\tinsert_us/op\tsearch_total_ms\tsearch_us/op\tdelete_total_ms\tdelete_us/op',
  );
  for (const n of sizes) {
    for (const name of Object.keys(implementations)) {
      try {
        const repeats = 2;
        const totals = { insertMs: 0, searchMs: 0, deleteMs: 0 };
        for (let r = 0; r < repeats; r++) {
          const res = runOnce(name, n, mode);
          totals.insertMs += res.insertMs;
          totals.searchMs += res.searchMs;
          totals.deleteMs += res.deleteMs;
        }
        printRow(name, n, totals.insertMs / repeats, totals.searchMs / repeats, totals.deleteMs / repeats);
      } catch (err) {
        console.error('error running size', n, 'for', name, err);
        return;
      }
    }
  }
}

function parseSizes(raw: string | undefined): number[] {
  const fallback = [1000, 10000, 100000];
  if (!raw) return fallback;
  const sizes = raw
    .split(',')
    .map((s) => Number.parseInt(s.trim(), 10))
    .filter((n) => Number.isInteger(n) && n > 0);
  return sizes.length ? sizes : fallback;
}

function main() {
  const sizes = parseSizes(process.env['BENCH_SIZES']);
  console.log('AVLTree against a sorted-array ordered multiset');
  console.log('Mode: random inserts/searches');
  runSizes(sizes, 'random');

  console.log('\nMode: sequential inserts/searches');
  runSizes(sizes, 'sequential');

  console.log('\nDone.');
}

main();
