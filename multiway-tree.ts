// Multiway search tree, derived from B+ tree by David Piepgrass. License: MIT
import type { Comparator, EachResult } from './core/types';
import { Cursor, ReadonlyCursor, ReverseCursor } from './cursor';
import { check } from './internal/assert';
import { NodePool } from './internal/nodes';

export type { Comparator, EachResult, Location } from './core/types';
export { Cursor, CursorBase, ReadonlyCursor, ReverseCursor } from './cursor';

/** Node capacity used when the constructor is not given one. */
export const DefaultCapacity = 40;

/**
 * Types that MultiwayTree supports by default
 */
export type DefaultComparable = number | bigint | string | boolean | Date | null | undefined |
  { valueOf: () => number | bigint | string | boolean };

/** The pair returned by `insert`: where the value is, and whether it was added. */
export type InsertResult<T> = [cursor: Cursor<T>, inserted: boolean];

// Values of different kinds are ordered by the name of their kind
function kindOf(v: unknown): string {
  return v === null ? 'null' : typeof v;
}

function primitiveOf(v: unknown): unknown {
  return typeof v === 'object' && v !== null ? v.valueOf() : v;
}

/**
 * Compares DefaultComparables to form a total order.
 *
 * Objects are compared by their valueOf(), so Dates sort chronologically.
 * Values of different types are ordered by type name (bigint < boolean <
 * null < number < string < undefined), so they can share a tree. NaN
 * equals NaN and sorts before other numbers; -0 equals +0.
 *
 * Anything else (symbols, functions, objects whose valueOf() returns the
 * object itself) is unordered, and the result is NaN, which the tree
 * rejects. Give the tree a comparator for such types.
 */
export function defaultComparator(a: unknown, b: unknown): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b;

  const pa = primitiveOf(a), pb = primitiveOf(b);
  const ka = kindOf(pa), kb = kindOf(pb);
  if (ka !== kb)
    return ka < kb ? -1 : 1;

  if (typeof pa === 'number' && typeof pb === 'number') {
    if (pa === pb) return 0; // also covers -0 and +0
    if (pa !== pa) return pb !== pb ? 0 : -1;
    if (pb !== pb) return 1;
    return pa < pb ? -1 : 1;
  }
  if (typeof pa === 'string' && typeof pb === 'string')
    return pa < pb ? -1 : pa > pb ? 1 : 0;
  if (typeof pa === 'bigint' && typeof pb === 'bigint')
    return pa < pb ? -1 : pa > pb ? 1 : 0;
  if (typeof pa === 'boolean' && typeof pb === 'boolean')
    return Number(pa) - Number(pb);
  if (pa === null || pa === undefined)
    return 0;
  return Number.NaN;
}

/**
 * An ordered set stored in a multiway search tree. Each node holds up to
 * `capacity` sorted values and has `capacity + 1` child slots; slot i
 * holds the values that fall between the node's values i-1 and i.
 *
 * Insertion fills a node until it is full and then passes later values
 * down into the matching child slot, creating that child if needed. Nodes
 * are never split or merged, so the shape of the tree depends entirely on
 * insertion order: sorted input makes a chain of nodes, and with capacity
 * 1 the tree is an ordinary binary search tree. There is no removal.
 *
 * Cursors (`begin()`, `find()`, ...) are positions in the ascending
 * sequence that step in both directions. The tree has value semantics on
 * request: `clone()`/`assign()` deep-copy the node graph, while `move()`/
 * `takeFrom()` hand it over and leave the source unusable until `clear()`
 * or another assignment.
 *
 * @example
 *     const tree = new MultiwayTree<number>([5, 3, 8], undefined, 2);
 *     tree.insert(1);
 *     tree.toString(); // "1 3 5 8"
 *     for (let c = tree.begin(); !c.done; c.next())
 *       console.log(c.value);
 */
export default class MultiwayTree<T = DefaultComparable> implements Iterable<T>
{
  private _pool: NodePool<T> | undefined;
  private _capacity: number;
  private _compare: Comparator<T>;

  /**
   * Initializes a tree holding `values`.
   * @param compare Custom function to compare elements. If not specified,
   *   defaultComparator is used, which is valid as long as T extends DefaultComparable.
   * @param capacity Maximum values per node; a positive integer (default 40).
   */
  public constructor(values?: Iterable<T>, compare?: Comparator<T>, capacity: number = DefaultCapacity) {
    check(Number.isInteger(capacity) && capacity >= 1, 'capacity must be a positive integer, got', capacity);
    this._capacity = capacity;
    this._compare = compare || defaultComparator;
    this._pool = new NodePool<T>(capacity, this._compare);
    if (values)
      this.addAll(values);
  }

  /** Copy construction: a new tree with its own copy of every node of `source`. */
  static copyOf<T>(source: MultiwayTree<T>): MultiwayTree<T> {
    return source.clone();
  }

  /** Move construction: a new tree that takes over the nodes of `source`. */
  static moveOf<T>(source: MultiwayTree<T>): MultiwayTree<T> {
    return source.move();
  }

  private get pool(): NodePool<T> {
    check(this._pool !== undefined, 'this tree was moved; call clear() or assign a new value before using it');
    return this._pool;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Properties ///////////////////////////////////////////////////////////////

  /** Gets the number of values in the tree. */
  get size(): number { return this.pool.size; }
  /** Returns true iff the tree contains no values. */
  get isEmpty(): boolean { return this.pool.size === 0; }
  /** Gets the maximum number of values per node. */
  get capacity(): number { return this._capacity; }
  /** Gets the comparator that orders the values. */
  get compare(): Comparator<T> { return this._compare; }
  /** Gets the number of nodes, the root included. */
  get nodeCount(): number { return this.pool.nodes.length; }
  /** True after `move()` or `takeFrom()` took this tree's nodes away. */
  get wasMoved(): boolean { return this._pool === undefined; }

  /** Gets the height of the tree: the number of edges on its longest
   *  root-to-node path (zero when everything fits in the root).
   *  Complexity: O(number of nodes) */
  get height(): number { return this.pool.height(); }

  /////////////////////////////////////////////////////////////////////////////
  // Insertion and lookup /////////////////////////////////////////////////////

  /**
   * Adds a value unless an equal one is already present.
   * @returns a cursor at the value in the tree (the existing one when it
   *          was a duplicate), and whether the value was added.
   * @description Allocates at most one node. May shift values within the
   *          receiving node, so other cursors into that node are not
   *          guaranteed to stay valid.
   */
  insert(value: T): InsertResult<T> {
    const pool = this.pool;
    const r = pool.insert(value);
    return [new Cursor<T>(pool, r), r.inserted];
  }

  /** Adds a value unless an equal one is already present.
   *  @returns true if the value was added. */
  add(value: T): boolean {
    return this.pool.insert(value).inserted;
  }

  /** Adds each of the values. @returns the number that were added. */
  addAll(values: Iterable<T>): number {
    const pool = this.pool;
    let added = 0;
    for (const v of values)
      if (pool.insert(v).inserted)
        added++;
    return added;
  }

  /** Returns true if a value equal to `value` is in the tree. */
  has(value: T): boolean {
    return this.pool.find(value) !== undefined;
  }

  /** Returns a cursor at the value equal to `value`, or `end()` if there is none. */
  find(value: T): Cursor<T> {
    const pool = this.pool;
    return new Cursor<T>(pool, pool.find(value) || pool.end());
  }

  /** Like `find`, but the returned cursor cannot replace the value. */
  findReadonly(value: T): ReadonlyCursor<T> {
    const pool = this.pool;
    return new ReadonlyCursor<T>(pool, pool.find(value) || pool.end());
  }

  /** Returns a cursor at the first value that is >= `value`, or `end()`. */
  lowerBound(value: T): Cursor<T> {
    const pool = this.pool;
    return new Cursor<T>(pool, pool.lowerBound(value) || pool.end());
  }

  /** Returns a cursor at the first value that is > `value`, or `end()`. */
  upperBound(value: T): Cursor<T> {
    const pool = this.pool;
    return new Cursor<T>(pool, pool.lowerBound(value, true) || pool.end());
  }

  /** Gets the lowest value in the tree. */
  minKey(): T | undefined {
    const pool = this.pool, at = pool.first();
    return pool.size === 0 ? undefined : pool.node(at.node).keys[at.index];
  }

  /** Gets the highest value in the tree. */
  maxKey(): T | undefined {
    const pool = this.pool, at = pool.last();
    return at === undefined ? undefined : pool.node(at.node).keys[at.index];
  }

  /////////////////////////////////////////////////////////////////////////////
  // Cursors //////////////////////////////////////////////////////////////////

  /** A cursor at the lowest value (equal to `end()` when the tree is empty). */
  begin(): Cursor<T> { return new Cursor<T>(this.pool, this.pool.first()); }
  /** The cursor one past the highest value. */
  end(): Cursor<T> { return new Cursor<T>(this.pool, this.pool.end()); }
  cbegin(): ReadonlyCursor<T> { return new ReadonlyCursor<T>(this.pool, this.pool.first()); }
  cend(): ReadonlyCursor<T> { return new ReadonlyCursor<T>(this.pool, this.pool.end()); }

  /** A reverse cursor at the highest value. */
  rbegin(): ReverseCursor<T, Cursor<T>> { return new ReverseCursor<T, Cursor<T>>(this.end()); }
  /** The reverse cursor one past the lowest value. */
  rend(): ReverseCursor<T, Cursor<T>> { return new ReverseCursor<T, Cursor<T>>(this.begin()); }
  crbegin(): ReverseCursor<T, ReadonlyCursor<T>> { return new ReverseCursor<T, ReadonlyCursor<T>>(this.cend()); }
  crend(): ReverseCursor<T, ReadonlyCursor<T>> { return new ReverseCursor<T, ReadonlyCursor<T>>(this.cbegin()); }

  /////////////////////////////////////////////////////////////////////////////
  // Iteration ////////////////////////////////////////////////////////////////

  /** Returns an iterator that provides values in ascending order.
   *  @param from Optional first value to be iterated; if it isn't present,
   *         iteration starts at the next higher value. An explicit
   *         `undefined` is a value like any other, so `keys(undefined)`
   *         starts where undefined sorts rather than at the beginning. */
  keys(...from: [] | [firstKey: T]): IterableIterator<T> {
    const c = from.length === 0 ? this.cbegin() : this.lowerBound(from[0]).asReadonly();
    return iterator<T>(() => {
      if (c.done)
        return { done: true, value: undefined };
      const value = c.value;
      c.next();
      return { done: false, value };
    });
  }

  /** Same as `keys()`; a set's values are its keys. */
  values(...from: [] | [firstKey: T]): IterableIterator<T> {
    return this.keys(...from);
  }

  /** Returns an iterator that provides values in descending order. */
  keysReversed(): IterableIterator<T> {
    const c = this.crbegin();
    return iterator<T>(() => {
      if (c.done)
        return { done: true, value: undefined };
      const value = c.value;
      c.next();
      return { done: false, value };
    });
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.keys();
  }

  /** Runs a function for each value, in ascending order. The callback
   *  can return {break:R} (where R is any value except undefined) to stop
   *  immediately and return R from forEach.
   * @param thisArg If provided, this parameter is assigned as the `this`
   *        value for each callback.
   * @returns the number of values that were sent to the callback,
   *        or the R value if the callback returned {break:R}. */
  forEach<R = number>(callback: (value: T, counter: number, tree: MultiwayTree<T>) => EachResult<R> | void, thisArg?: unknown): R | number {
    if (thisArg !== undefined)
      callback = callback.bind(thisArg);
    let counter = 0;
    for (const c = this.cbegin(); !c.done; c.next()) {
      const result = callback(c.value, counter++, this);
      if (result && result.break !== undefined)
        return result.break;
    }
    return counter;
  }

  /** Gets an array filled with the contents of the tree, in ascending order */
  toArray(maxLength: number = 0x7FFFFFFF): T[] {
    const results: T[] = [];
    for (const c = this.cbegin(); !c.done && results.length < maxLength; c.next())
      results.push(c.value);
    return results;
  }

  /** Renders the values in ascending order with `separator` between them. */
  join(separator: string = ' ', format: (value: T) => string = String): string {
    const parts: string[] = [];
    for (const c = this.cbegin(); !c.done; c.next())
      parts.push(format(c.value));
    return parts.join(separator);
  }

  /** The values in ascending order, separated by single spaces. */
  toString(): string {
    return this.join();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Copy and move ////////////////////////////////////////////////////////////

  /** Returns a deep copy: later changes to either tree don't affect the other. */
  clone(): MultiwayTree<T> {
    const result = new MultiwayTree<T>(undefined, this._compare, this._capacity);
    result._pool = this.pool.clone();
    return result;
  }

  /**
   * Copy assignment: replaces this tree's contents with a deep copy of
   * `source`, whose comparator and capacity this tree adopts. Cursors
   * into this tree's old contents become invalid.
   */
  assign(source: MultiwayTree<T>): this {
    if (source !== this)
      this.replacePool(source.pool.clone());
    return this;
  }

  /**
   * Move construction: returns a new tree that owns this tree's nodes.
   * This tree is left without nodes and throws if used before `clear()`
   * or an assignment. Cursors obtained from this tree become invalid.
   */
  move(): MultiwayTree<T> {
    const result = new MultiwayTree<T>(undefined, this._compare, this._capacity);
    result._pool = this.pool.transfer();
    this._pool = undefined;
    return result;
  }

  /**
   * Move assignment: replaces this tree's contents (comparator and
   * capacity included) with the nodes of `source`, which is left
   * unusable as after `move()`.
   */
  takeFrom(source: MultiwayTree<T>): this {
    if (source !== this) {
      this.replacePool(source.pool.transfer());
      source._pool = undefined;
    }
    return this;
  }

  /** Discards every value. Also makes a moved tree usable again. */
  clear(): void {
    this.replacePool(new NodePool<T>(this._capacity, this._compare));
  }

  private replacePool(pool: NodePool<T>) {
    // Detach the old graph so cursors into it fail instead of reading stale nodes
    if (this._pool !== undefined)
      this._pool.transfer();
    this._pool = pool;
    this._capacity = pool.capacity;
    this._compare = pool.compare;
  }

  /** Scans the tree for signs of serious bugs: keys out of order or
   *  outside the range of their slot, overfull nodes, broken parent links,
   *  unreachable nodes, or a stored size that doesn't match the count.
   *  Computational complexity: O(size). */
  checkValid(): void {
    this.pool.checkValid();
  }
}

function iterator<T>(next: () => IteratorResult<T>): IterableIterator<T> {
  const result: IterableIterator<T> = {
    next,
    [Symbol.iterator]() { return result; },
  };
  return result;
}
