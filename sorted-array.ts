import type { Comparator } from './core/types';
import { defaultComparator } from './multiway-tree';

/** A super-inefficient sorted set for testing purposes */
export default class SortedArray<T = number>
{
  a: T[];
  cmp: Comparator<T>;

  public constructor(values?: T[], compare?: Comparator<T>) {
    this.cmp = compare || defaultComparator;
    this.a = [];
    if (values !== undefined)
      for (const v of values)
        this.add(v);
  }

  get size() { return this.a.length; }
  add(value: T): boolean {
    const i = this.indexOf(value, -1);
    if (i <= -1)
      this.a.splice(~i, 0, value);
    return i <= -1;
  }
  has(value: T): boolean {
    return this.indexOf(value, -1) >= 0;
  }
  getArray() { return this.a; }
  minKey(): T | undefined { return this.a[0]; }
  maxKey(): T | undefined { return this.a[this.a.length - 1]; }

  indexOf(value: T, failXor: number): number {
    let lo = 0, hi = this.a.length, mid = hi >> 1;
    while (lo < hi) {
      const c = this.cmp(this.a[mid], value);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // a[mid] > value
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
