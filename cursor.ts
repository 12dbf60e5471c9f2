import type { index, Location } from './core/types';
import { check } from './internal/assert';
import { NodePool, NoNode } from './internal/nodes';

/**
 * A position in a tree's ascending sequence: a node and an index into its
 * keys. The index may equal the node's key count only at the end cursor.
 *
 * Cursors walk the node graph through parent links and never consult the
 * tree object. Inserting into the tree may shift keys within a node, so a
 * cursor kept across an insertion (including an end cursor) can end up at
 * a different value or stop being the end; obtain fresh cursors after
 * mutating. Moving the tree invalidates its cursors outright: any use of
 * one afterward throws.
 */
export abstract class CursorBase<T> {
  protected _pool: NodePool<T>;
  protected _node: index;
  protected _index: number;

  constructor(pool: NodePool<T>, at: Location) {
    this._pool = pool;
    this._node = at.node;
    this._index = at.index;
  }

  /** True at the end cursor, which has no value. */
  get done(): boolean {
    return this._index >= this._pool.node(this._node).keys.length;
  }

  /** True when there is no earlier value to step back to. */
  get atStart(): boolean {
    return !this.asReadonly().prev();
  }

  /** The (node, index) pair this cursor denotes. */
  get location(): Location {
    return { node: this._node, index: this._index };
  }

  protected current(): T {
    const keys = this._pool.node(this._node).keys;
    check(this._index < keys.length, 'cannot read the value of an end cursor');
    return keys[this._index];
  }

  /**
   * Moves to the next larger value, or to the end cursor after the last one.
   * @returns false if the cursor was already at the end and did not move.
   */
  next(): boolean {
    const pool = this._pool;
    const node = pool.node(this._node);
    const keys = node.keys;
    if (this._index >= keys.length)
      return false;

    // Everything between this key and the next one lives in the child after it
    const child = node.children[this._index + 1];
    if (child !== NoNode) {
      this._node = pool.leftmostNode(child);
      this._index = 0;
      return true;
    }
    if (++this._index < keys.length)
      return true;

    // Last key of the node: climb until an ancestor holds something larger.
    // If none does, this node is the rightmost one and we stay at its end.
    const departed = keys[keys.length - 1];
    for (let i = node.parent; i !== NoNode;) {
      const ancestor = pool.node(i);
      const pos = ancestor.indexOf(departed, 0, pool.compare);
      if (pos < ancestor.keys.length) {
        this._node = i;
        this._index = pos;
        break;
      }
      i = ancestor.parent;
    }
    return true;
  }

  /**
   * Moves to the next smaller value. From the end cursor this reaches the
   * last value.
   * @returns false if the cursor was already at the first value (or the
   *          tree is empty) and did not move.
   */
  prev(): boolean {
    const pool = this._pool;
    const node = pool.node(this._node);
    const keys = node.keys;
    if (keys.length === 0)
      return false;

    const child = node.children[this._index];
    if (child !== NoNode) {
      this._node = pool.rightmostNode(child);
      this._index = pool.node(this._node).keys.length - 1;
      return true;
    }
    if (this._index > 0) {
      this._index--;
      return true;
    }

    const departed = keys[0];
    for (let i = node.parent; i !== NoNode;) {
      const ancestor = pool.node(i);
      const pos = ancestor.indexOf(departed, 0, pool.compare);
      if (pos > 0) {
        this._node = i;
        this._index = pos - 1;
        return true;
      }
      i = ancestor.parent;
    }
    return false;
  }

  /**
   * True if both cursors denote the same position of the same tree.
   * Mutable and read-only cursors compare equal to each other.
   */
  equals(other: CursorBase<T>): boolean {
    check(!this._pool.detached && !other._pool.detached, 'cannot compare cursors of a moved tree');
    return this._pool === other._pool && this._node === other._node && this._index === other._index;
  }

  /** A read-only cursor at the same position. */
  asReadonly(): ReadonlyCursor<T> {
    return new ReadonlyCursor<T>(this._pool, this.location);
  }
}

/** A cursor that can replace the value it points at. */
export class Cursor<T> extends CursorBase<T> {
  /**
   * The value at this position. It may be replaced only by a value that
   * compares equal to it, such as an object with the same sort key but
   * other data; anything else would break the tree's ordering and throws.
   */
  get value(): T {
    return this.current();
  }
  set value(v: T) {
    const keys = this._pool.node(this._node).keys;
    const old = this.current();
    check(this._pool.compare(old, v) === 0, 'replacement value', String(v), 'does not compare equal to', String(old));
    keys[this._index] = v;
  }

  clone(): Cursor<T> {
    return new Cursor<T>(this._pool, this.location);
  }
}

/** A cursor that can only read. */
export class ReadonlyCursor<T> extends CursorBase<T> {
  get value(): T {
    return this.current();
  }

  clone(): ReadonlyCursor<T> {
    return new ReadonlyCursor<T>(this._pool, this.location);
  }
}

/**
 * Walks a tree in descending order by driving a forward cursor backward.
 * It reads the value just before its base: reversing `end()` gives the
 * last value and reversing `begin()` gives the position past the first one.
 */
export class ReverseCursor<T, C extends CursorBase<T> = CursorBase<T>> {
  private _base: C;

  constructor(base: C) {
    this._base = base;
  }

  /** The underlying forward cursor. Moving it moves this cursor too. */
  get base(): C {
    return this._base;
  }

  get done(): boolean {
    return this._base.atStart;
  }

  get value(): T {
    const before = this._base.asReadonly();
    check(before.prev(), 'cannot read the value of a reverse end cursor');
    return before.value;
  }

  /** Moves to the next smaller value. */
  next(): boolean {
    return this._base.prev();
  }

  /** Moves to the next larger value. */
  prev(): boolean {
    return this._base.next();
  }

  equals(other: ReverseCursor<T, CursorBase<T>>): boolean {
    return this._base.equals(other._base);
  }
}
