/**
 * IR Traversal Helpers
 */
import type { OpDefinition, Operation } from '@irkit/ir';

/**
 * Lazily yield `op` and every nested operation, pre-order
 */
export function* preorder(op: Operation): Generator<Operation> {
  yield op;
  for (const region of op.regions) {
    for (const block of region.blocks) {
      for (const nested of [...block.ops]) yield* preorder(nested);
    }
  }
}

/**
 * Find all operations matching a predicate
 */
export function findAll(root: Operation, predicate: (op: Operation) => boolean): Operation[] {
  const results: Operation[] = [];
  root.walk(op => {
    if (predicate(op)) results.push(op);
  });
  return results;
}

/**
 * Find the first operation matching a predicate, without visiting the rest
 */
export function findFirst(root: Operation, predicate: (op: Operation) => boolean): Operation | undefined {
  let result: Operation | undefined;
  root.walkAbortable(op => {
    if (!predicate(op)) return 'advance';
    result = op;
    return 'stop';
  });
  return result;
}

export function findAllOfKind(root: Operation, definition: OpDefinition): Operation[] {
  return findAll(root, op => op.isa(definition));
}

/**
 * Number of operations under `root`, itself included
 */
export function countOps(root: Operation, predicate: (op: Operation) => boolean = () => true): number {
  let count = 0;
  root.walk(op => {
    if (predicate(op)) count++;
  });
  return count;
}
