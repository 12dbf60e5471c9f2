/** Index of a node within a tree's node pool. */
export type index = number;

/**
 * Orders two values: negative when a < b, zero when they are equal and
 * positive when a > b. Zero is also how the tree detects duplicates.
 */
export type Comparator<T> = (a: T, b: T) => number;

/** A (node, position) pair addressing one slot of a node's key list. */
export interface Location {
  node: index;
  index: number;
}

/** What a `forEach` callback may return to stop early with a result. */
export type EachResult<R> = { break?: R };
