import type { Comparator, index, Location } from '../core/types';
import { check } from './assert';

/** Marks an empty child slot, and the parent of the root. */
export const NoNode: index = -1;
/** The root always occupies the first slot of the pool. */
export const RootIndex: index = 0;

/** Result of inserting into the pool: where the value lives now. */
export interface InsertLocation extends Location {
  inserted: boolean;
}

/** Multiway node. ***********************************************************/
export class MNode<T> {
  // Sorted and duplicate-free. Never longer than the tree's capacity.
  keys: T[];
  // capacity+1 slots; children[i] holds values between keys[i-1] and keys[i].
  // Only a full node ever has children.
  children: index[];
  parent: index;

  constructor(keys: T[], children: index[], parent: index) {
    this.keys = keys;
    this.children = children;
    this.parent = parent;
  }

  static empty<T>(capacity: number, parent: index): MNode<T> {
    // filled eagerly so the array is never holey
    return new MNode<T>([], new Array<index>(capacity + 1).fill(NoNode), parent);
  }

  // If key not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(key: T, failXor: number, cmp: Comparator<T>): number {
    const keys = this.keys;
    let lo = 0, hi = keys.length, mid = hi >> 1;
    while (lo < hi) {
      const c = cmp(keys[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // key < keys[mid]
        hi = mid;
      else if (c === 0)
        return mid;
      else
        check(false, 'comparator returned NaN for', String(keys[mid]), 'and', String(key));
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }

  hasChildren(): boolean {
    return this.children.some(c => c !== NoNode);
  }

  clone(): MNode<T> {
    return new MNode<T>(this.keys.slice(0), this.children.slice(0), this.parent);
  }
}

/**
 * Owns every node of one tree. Parent and child links are indexes into
 * `nodes`, so a copy of the pool is a copy of the whole graph with no
 * links to repair, and handing the array to another pool moves the graph.
 *
 * Once `transfer()` has run, the pool is detached: every access through
 * `node()` throws, which is how cursors of a moved tree are invalidated.
 * @internal
 */
export class NodePool<T> {
  nodes: MNode<T>[];
  size: number;
  readonly capacity: number;
  readonly compare: Comparator<T>;
  private _detached = false;

  constructor(capacity: number, compare: Comparator<T>, nodes?: MNode<T>[], size = 0) {
    this.capacity = capacity;
    this.compare = compare;
    this.nodes = nodes ?? [MNode.empty<T>(capacity, NoNode)];
    this.size = size;
  }

  get detached(): boolean {
    return this._detached;
  }

  node(i: index): MNode<T> {
    check(!this._detached, 'this node graph was moved to another tree');
    const n = this.nodes[i];
    check(n !== undefined, 'no node at index', i);
    return n;
  }

  /** Adds `key` unless an equal key is present. */
  insert(key: T): InsertLocation {
    const cmp = this.compare;
    for (let i = RootIndex;;) {
      const node = this.node(i);
      let pos = node.indexOf(key, -1, cmp);
      if (pos >= 0)
        return { node: i, index: pos, inserted: false };
      pos = ~pos;
      if (node.keys.length < this.capacity) {
        // covers the empty node too: pos is 0 there
        node.keys.splice(pos, 0, key);
        this.size++;
        return { node: i, index: pos, inserted: true };
      }
      let child = node.children[pos];
      if (child === NoNode) {
        child = this.nodes.length;
        this.nodes.push(MNode.empty<T>(this.capacity, i));
        node.children[pos] = child;
      }
      i = child;
    }
  }

  /** Locates `key`, or returns undefined when it is absent. */
  find(key: T): Location | undefined {
    const cmp = this.compare;
    for (let i = RootIndex;;) {
      const node = this.node(i);
      const pos = node.indexOf(key, 0, cmp);
      if (pos < node.keys.length && cmp(node.keys[pos], key) === 0)
        return { node: i, index: pos };
      const child = node.children[pos];
      if (child === NoNode)
        return undefined;
      i = child;
    }
  }

  /**
   * Locates the first key that is >= `key` (or > `key` when `exclusive`).
   * A key found deeper in the tree is always smaller than any candidate
   * above it, so the last candidate seen on the way down wins.
   */
  lowerBound(key: T, exclusive?: boolean): Location | undefined {
    const cmp = this.compare;
    let best: Location | undefined;
    for (let i = RootIndex;;) {
      const node = this.node(i);
      let pos = node.indexOf(key, -1, cmp);
      if (pos >= 0) {
        if (!exclusive)
          return { node: i, index: pos };
        pos++;
      } else {
        pos = ~pos;
      }
      if (pos < node.keys.length)
        best = { node: i, index: pos };
      const child = node.children[pos];
      if (child === NoNode)
        return best;
      i = child;
    }
  }

  /** Follows slot 0 down from `from` until there is no child there. */
  leftmostNode(from: index = RootIndex): index {
    let i = from;
    for (let c = this.node(i).children[0]; c !== NoNode; c = this.node(i).children[0])
      i = c;
    return i;
  }

  /** Follows the last slot down from `from` until there is no child there. */
  rightmostNode(from: index = RootIndex): index {
    let i = from;
    for (;;) {
      const node = this.node(i);
      const c = node.children[node.keys.length];
      if (c === NoNode)
        return i;
      i = c;
    }
  }

  /** Location of the first key, or of the end when the pool is empty. */
  first(): Location {
    return { node: this.leftmostNode(), index: 0 };
  }

  /** Location of the last key, or undefined when the pool is empty. */
  last(): Location | undefined {
    const i = this.rightmostNode();
    const count = this.node(i).keys.length;
    return count === 0 ? undefined : { node: i, index: count - 1 };
  }

  /** The end location: the rightmost node, one past its last key. */
  end(): Location {
    const i = this.rightmostNode();
    return { node: i, index: this.node(i).keys.length };
  }

  /** Deep copy. Node indexes are preserved, so links need no rewriting. */
  clone(): NodePool<T> {
    check(!this._detached, 'cannot copy a tree that was moved');
    return new NodePool<T>(this.capacity, this.compare, this.nodes.map(n => n.clone()), this.size);
  }

  /** Hands the node graph to a new pool and detaches this one. */
  transfer(): NodePool<T> {
    check(!this._detached, 'cannot move a tree that was already moved');
    const result = new NodePool<T>(this.capacity, this.compare, this.nodes, this.size);
    this.nodes = [];
    this.size = 0;
    this._detached = true;
    return result;
  }

  /** Longest path from the root to any node, counted in edges. */
  height(): number {
    // iterative, since a degenerate tree can be as deep as it is large
    let max = 0;
    const stack: [index, number][] = [[RootIndex, 0]];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const [i, depth] = top;
      if (depth > max)
        max = depth;
      for (const c of this.node(i).children)
        if (c !== NoNode)
          stack.push([c, depth + 1]);
    }
    return max;
  }

  /**
   * Scans the whole graph for broken invariants and throws on the first
   * one found. O(size).
   */
  checkValid(): void {
    const cmp = this.compare;
    let counted = 0, reachable = 0;
    // low and high are the exclusive bounds inherited from the ancestors
    const stack: PendingCheck<T>[] = [{ i: RootIndex, parent: NoNode, low: undefined, high: undefined }];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const { i, parent, low, high } = top;
      const node = this.node(i);
      const keys = node.keys;
      reachable++;
      counted += keys.length;
      check(node.parent === parent, 'node', i, 'has parent', node.parent, 'but hangs below', parent);
      check(keys.length <= this.capacity, 'node', i, 'holds', keys.length, 'keys; capacity is', this.capacity);
      check(node.children.length === this.capacity + 1, 'node', i, 'has', node.children.length, 'child slots');
      check(i === RootIndex || keys.length > 0, 'empty node', i, 'below the root');
      check(keys.length === this.capacity || !node.hasChildren(), 'node', i, 'has children but is not full');
      for (let k = 1; k < keys.length; k++)
        check(cmp(keys[k - 1], keys[k]) < 0, 'keys out of order in node', i, 'at', k);
      if (keys.length > 0) {
        check(low === undefined || cmp(low[0], keys[0]) < 0, 'node', i, 'holds a key below its slot range');
        check(high === undefined || cmp(keys[keys.length - 1], high[0]) < 0, 'node', i, 'holds a key above its slot range');
      }
      node.children.forEach((c, slot) => {
        if (c !== NoNode)
          stack.push({
            i: c,
            parent: i,
            low: slot > 0 ? [keys[slot - 1]] : low,
            high: slot < keys.length ? [keys[slot]] : high,
          });
      });
    }
    check(reachable === this.nodes.length, 'only', reachable, 'of', this.nodes.length, 'nodes are reachable');
    check(counted === this.size, 'size mismatch: counted', counted, 'but stored', this.size);
  }
}

type PendingCheck<T> = { i: index, parent: index, low: [T] | undefined, high: [T] | undefined };
