/** Throws an Error built from `args` unless `fact` holds. */
export function check(fact: boolean, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('multiway tree:'); // at beginning of message
    throw new Error(args.join(' '));
  }
}
