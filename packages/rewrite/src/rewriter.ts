/**
 * PatternRewriter - the mutation handle given to a pattern
 *
 * Every primitive keeps use-lists consistent before it returns and reports
 * what it touched to the listener, which is how the driver decides what to
 * look at again.
 */

import {
  IRStructureError,
  describeOperation,
  type Attribute,
  type Block,
  type Operation,
  type Value,
} from '@irkit/ir';

export interface RewriteListener {
  operationInserted?(op: Operation): void;
  operationModified?(op: Operation): void;
  /** Called after `op` was erased, with the operands it had */
  operationErased?(op: Operation, operands: readonly Value[]): void;
}

type Ops = Operation | readonly Operation[];

function toList(ops: Ops): readonly Operation[] {
  return Array.isArray(ops) ? ops : [ops];
}

export class PatternRewriter {
  private done = false;

  constructor(
    readonly currentOp: Operation,
    private readonly listener: RewriteListener = {}
  ) {}

  /** Whether any mutation went through this handle */
  get hasDone(): boolean {
    return this.done;
  }

  insertOpBeforeMatchedOp(ops: Ops): void {
    this.insertOpBefore(ops, this.currentOp);
  }

  insertOpAfterMatchedOp(ops: Ops): void {
    this.insertOpAfter(ops, this.currentOp);
  }

  insertOpBefore(ops: Ops, anchor: Operation): void {
    const list = toList(ops);
    blockOf(anchor, 'insert before').insertOpsBefore(list, anchor);
    this.inserted(list);
  }

  insertOpAfter(ops: Ops, anchor: Operation): void {
    const list = toList(ops);
    blockOf(anchor, 'insert after').insertOpsAfter(list, anchor);
    this.inserted(list);
  }

  /**
   * Replace the matched operation; see replaceOp
   */
  replaceMatchedOp(ops: Ops, newResults?: readonly Value[]): void {
    this.replaceOp(this.currentOp, ops, newResults);
  }

  /**
   * Insert `ops` before `op`, redirect the uses of its results to
   * `newResults` (by default the results of the last inserted operation),
   * then erase it.
   */
  replaceOp(op: Operation, ops: Ops, newResults?: readonly Value[]): void {
    const list = toList(ops);
    const results = newResults ?? list[list.length - 1]?.results ?? [];

    if (results.length !== op.results.length) {
      throw new IRStructureError(
        `cannot replace ${describeOperation(op)}: it has ${op.results.length} result(s), the replacement provides ${results.length}`
      );
    }

    if (list.length > 0) {
      blockOf(op, 'replace').insertOpsBefore(list, op);
      this.inserted(list);
    }
    op.results.forEach((result, i) => this.replaceAllUsesWith(result, results[i]));
    this.eraseOp(op);
  }

  eraseMatchedOp(): void {
    this.eraseOp(this.currentOp);
  }

  /**
   * Erase an operation whose results have no uses left
   */
  eraseOp(op: Operation): void {
    const operands = [...op.operands];
    op.erase();
    this.done = true;
    this.listener.operationErased?.(op, operands);
  }

  replaceAllUsesWith(from: Value, to: Value): void {
    if (from === to) return;
    const users = from.users;
    from.replaceAllUsesWith(to);
    this.done = true;
    for (const user of users) this.listener.operationModified?.(user);
  }

  replaceOperand(op: Operation, index: number, value: Value): void {
    op.setOperand(index, value);
    this.modified(op);
  }

  /**
   * Set an attribute, or remove it when `value` is undefined
   */
  modifyAttribute(op: Operation, name: string, value: Attribute | undefined): void {
    if (value === undefined) op.removeAttribute(name);
    else op.setAttribute(name, value);
    this.modified(op);
  }

  private inserted(ops: readonly Operation[]): void {
    this.done = true;
    for (const op of ops) this.listener.operationInserted?.(op);
  }

  private modified(op: Operation): void {
    this.done = true;
    this.listener.operationModified?.(op);
  }
}

function blockOf(op: Operation, action: string): Block {
  const block = op.parent;
  if (block === null) {
    throw new IRStructureError(`cannot ${action} ${describeOperation(op)}: it is not in a block`);
  }
  return block;
}
