import MultiwayTree, { Cursor, ReadonlyCursor } from '../multiway-tree';

function scenarioTree() {
  return new MultiwayTree<number>([5, 3, 8, 1, 4, 7, 9], undefined, 2);
}

describe('Cursor stepping', () => {
  test('next() visits every value and stops at the end', () => {
    const tree = scenarioTree();
    const c = tree.begin();
    const seen: number[] = [];
    while (!c.done) {
      seen.push(c.value);
      expect(c.next()).toBe(true);
    }
    expect(seen).toEqual([1, 3, 4, 5, 7, 8, 9]);
    expect(c.equals(tree.end())).toBe(true);
    expect(c.next()).toBe(false);
    expect(c.equals(tree.end())).toBe(true);
  });

  test('prev() from the end visits every value and stops at the first', () => {
    const tree = scenarioTree();
    const c = tree.end();
    const seen: number[] = [];
    while (c.prev())
      seen.push(c.value);
    expect(seen).toEqual([9, 8, 7, 5, 4, 3, 1]);
    expect(c.equals(tree.begin())).toBe(true);
    expect(c.atStart).toBe(true);
    expect(c.value).toBe(1);
  });

  test('next() then prev() returns to the same position', () => {
    const tree = scenarioTree();
    for (const v of [1, 3, 4, 5, 7, 8]) {
      const c = tree.find(v);
      const start = c.clone();
      c.next();
      c.prev();
      expect(c.equals(start)).toBe(true);
      expect(c.value).toBe(v);
    }
  });

  test('descends into the child after a key', () => {
    const tree = scenarioTree();
    const c = tree.find(5);
    c.next();
    expect(c.value).toBe(7);
    const d = tree.find(8);
    d.next();
    expect(d.value).toBe(9);
  });

  test('ascends from the last key of a child', () => {
    const tree = scenarioTree();
    const c = tree.find(4);
    c.next();
    expect(c.value).toBe(5);
    const d = tree.find(7);
    d.prev();
    expect(d.value).toBe(5);
  });

  test('stepping back from 5 reaches the rightmost value of its left child', () => {
    const tree = scenarioTree();
    const c = tree.find(5);
    c.prev();
    expect(c.value).toBe(4);
    c.prev();
    expect(c.value).toBe(3);
    c.prev();
    expect(c.value).toBe(1);
    expect(c.prev()).toBe(false);
    expect(c.value).toBe(1);
  });

  test('the end cursor is the rightmost node past its last key', () => {
    const tree = scenarioTree();
    const end = tree.end();
    const nine = tree.find(9);
    expect(end.location.node).toBe(nine.location.node);
    expect(end.location.index).toBe(nine.location.index + 1);
    expect(end.done).toBe(true);
  });

  test('a cursor on an empty tree does not move', () => {
    const tree = new MultiwayTree<number>();
    const c = tree.begin();
    expect(c.next()).toBe(false);
    expect(c.prev()).toBe(false);
    expect(c.atStart).toBe(true);
  });
});

describe('Cursor equality', () => {
  const tree = scenarioTree();

  test('mutable and read-only cursors compare both ways', () => {
    expect(tree.find(4).equals(tree.findReadonly(4))).toBe(true);
    expect(tree.findReadonly(4).equals(tree.find(4))).toBe(true);
    expect(tree.find(42).equals(tree.cend())).toBe(true);
    expect(tree.cend().equals(tree.find(42))).toBe(true);
    expect(tree.find(4).equals(tree.cend())).toBe(false);
  });

  test('asReadonly keeps the position', () => {
    const c = tree.find(7);
    const r: ReadonlyCursor<number> = c.asReadonly();
    expect(r.equals(c)).toBe(true);
    expect(r.value).toBe(7);
    r.next();
    expect(c.value).toBe(7); // independent copies
  });

  test('cursors of different trees are never equal', () => {
    const copy = tree.clone();
    expect(copy.end().equals(tree.end())).toBe(false);
    expect(copy.find(5).equals(tree.find(5))).toBe(false);
    expect(copy.find(5).location).toEqual(tree.find(5).location);
  });
});

describe('Cursor values', () => {
  type Entry = { id: number, label: string };
  const byId = (a: Entry, b: Entry) => a.id - b.id;

  test('a value can be replaced by an equal one', () => {
    const tree = new MultiwayTree<Entry>([{ id: 2, label: 'b' }, { id: 1, label: 'a' }], byId, 4);
    const c: Cursor<Entry> = tree.find({ id: 2, label: '' });
    c.value = { id: 2, label: 'two' };
    expect(tree.toArray()).toEqual([{ id: 1, label: 'a' }, { id: 2, label: 'two' }]);
  });

  test('replacing with a value that sorts elsewhere throws', () => {
    const tree = new MultiwayTree<Entry>([{ id: 2, label: 'b' }], byId, 4);
    const c = tree.begin();
    expect(() => { c.value = { id: 5, label: 'e' }; }).toThrow('does not compare equal');
    expect(tree.toArray()).toEqual([{ id: 2, label: 'b' }]);
  });

  test('the end cursor has no value', () => {
    const tree = scenarioTree();
    expect(() => tree.end().value).toThrow('cannot read the value of an end cursor');
    expect(() => tree.cend().value).toThrow('end cursor');
  });
});

describe('ReverseCursor', () => {
  test('rbegin reads the last value and rend the position before the first', () => {
    const tree = scenarioTree();
    const r = tree.rbegin();
    expect(r.value).toBe(9);
    expect(r.base.equals(tree.end())).toBe(true);
    expect(tree.rend().base.equals(tree.begin())).toBe(true);
    expect(tree.rend().done).toBe(true);
    expect(() => tree.rend().value).toThrow('reverse end cursor');
  });

  test('walks down and back up', () => {
    const tree = scenarioTree();
    const r = tree.crbegin();
    const seen: number[] = [];
    for (; !r.equals(tree.crend()); r.next())
      seen.push(r.value);
    expect(seen).toEqual([9, 8, 7, 5, 4, 3, 1]);
    expect(r.prev()).toBe(true);
    expect(r.value).toBe(1);
  });

  test('reading does not move the base cursor', () => {
    const tree = scenarioTree();
    const r = tree.rbegin();
    expect(r.value).toBe(9);
    expect(r.value).toBe(9);
    expect(r.base.done).toBe(true);
  });
});

describe('Cursor invalidation', () => {
  test('cursors of a moved tree throw', () => {
    const tree = scenarioTree();
    const c = tree.find(4);
    const end = tree.cend();
    const moved = tree.move();
    expect(() => c.value).toThrow('moved to another tree');
    expect(() => c.next()).toThrow('moved to another tree');
    expect(() => end.equals(moved.cend())).toThrow('cannot compare cursors of a moved tree');
    expect(moved.find(4).value).toBe(4);
  });

  test('cursors of a cleared tree throw', () => {
    const tree = scenarioTree();
    const c = tree.begin();
    tree.clear();
    expect(() => c.value).toThrow('moved to another tree');
    expect(tree.begin().done).toBe(true);
  });
});
