#!/usr/bin/env node
import MultiwayTree from './multiway-tree';
import SortedArray from './sorted-array';

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { var ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap<T>(keys: T[], i: number, j: number) {
  var tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  var keys: number[] = [], i, n;
  for (i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T=void>(message: (t:T) => string, callback: () => T, minMillisec: number = 600, log = console.log) {
  var timer = new Timer(), counter = 0, ms;
  var result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

function fill(keys: number[], capacity: number) {
  var tree = new MultiwayTree<number>(undefined, undefined, capacity);
  for (let k of keys)
    tree.insert(k);
  return tree;
}

const capacities = [1, 4, 16, 40, 128];

console.log("Benchmark results (milliseconds with integer keys)");
console.log("--------------------------------------------------");

console.log();
console.log("### Insertions at random locations ###");

for (let size of [1000, 10000, 100000]) {
  console.log();
  var keys = makeArray(size, true);

  for (let capacity of capacities)
    measure(tree => `Insert ${tree.size} values, capacity ${capacity} (height ${tree.height})`,
      () => fill(keys, capacity));

  if (size <= 10000)
    measure(list => `Insert ${list.size} values in SortedArray`, () => {
      let list = new SortedArray<number>();
      for (let k of keys)
        list.add(k);
      return list;
    });
}

console.log();
console.log("### Insertions in sorted order ###");
// Nothing is ever rebalanced, so sorted input builds a chain of nodes
// and each insertion walks the whole chain.

for (let size of [1000, 10000]) {
  console.log();
  var keys = makeArray(size, false);

  for (let capacity of capacities)
    measure(tree => `Insert ${tree.size} sorted values, capacity ${capacity} (height ${tree.height})`,
      () => fill(keys, capacity));
}

console.log();
console.log("### Lookups, iteration and copying ###");

for (let size of [1000, 100000]) {
  console.log();
  var keys = makeArray(size, true);

  for (let capacity of [1, 40]) {
    let tree = fill(keys, capacity);
    measure(found => `Find each of ${found} values, capacity ${capacity}`, () => {
      let found = 0;
      for (let k of keys)
        if (!tree.find(k).done)
          found++;
      return found;
    });
    measure(sum => `Walk ${tree.size} values with a cursor (sum ${sum}), capacity ${capacity}`, () => {
      let sum = 0;
      for (let c = tree.cbegin(); !c.done; c.next())
        sum += c.value;
      return sum;
    });
    measure(sum => `Walk ${tree.size} values backward (sum ${sum}), capacity ${capacity}`, () => {
      let sum = 0;
      for (let r = tree.crbegin(); !r.done; r.next())
        sum += r.value;
      return sum;
    });
    measure(copy => `Clone a tree of ${copy.size} values (${copy.nodeCount} nodes), capacity ${capacity}`,
      () => tree.clone());
  }
}
