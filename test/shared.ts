import MultiwayTree from '../multiway-tree';
import SortedArray from '../sorted-array';
import MersenneTwister from 'mersenne-twister';

const rand = new MersenneTwister(1234);

export function randInt(max: number): number {
  return rand.random_int() % max;
}

export function expectTreeEqualTo<T>(tree: MultiwayTree<T>, list: SortedArray<T>): void {
  tree.checkValid();
  expect(tree.size).toBe(list.size);
  expect(tree.toArray()).toEqual(list.getArray());
}

/** Walks the tree from `begin()` with cursors rather than through `toArray()`. */
export function forwardValues<T>(tree: MultiwayTree<T>): T[] {
  const out: T[] = [];
  for (const c = tree.begin(), end = tree.end(); !c.equals(end); c.next())
    out.push(c.value);
  return out;
}

/** Walks the tree from `rbegin()` to `rend()`. */
export function reverseValues<T>(tree: MultiwayTree<T>): T[] {
  const out: T[] = [];
  for (const c = tree.rbegin(), end = tree.rend(); !c.equals(end); c.next())
    out.push(c.value);
  return out;
}

/**
 * Makes `size` increasing integers in random order. With `collisionChance`
 * above 0, some entries repeat the one generated before them.
 */
export function makeArray(rng: MersenneTwister, size: number, collisionChance = 0): number[] {
  const keys: number[] = [];
  for (let i = 0, current = 0; i < size; i++) {
    if (i === 0 || rng.random() >= collisionChance)
      current += 1 + randomInt(rng, 10);
    keys.push(current);
  }
  for (let i = size - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [keys[i], keys[j]] = [keys[j], keys[i]];
  }
  return keys;
}

export const randomInt = (rng: MersenneTwister, maxExclusive: number) =>
  Math.floor(rng.random() * maxExclusive);
