/**
 * SSA values: every value has exactly one definition site (an operation
 * result or a block argument) and any number of uses.
 */

import type { Attribute } from './attributes.js';
import type { Block } from './block.js';
import type { Operation } from './operation.js';
import type { Use } from './types.js';

abstract class ValueBase {
  private readonly useList: Use[] = [];

  constructor(public readonly type: Attribute) {}

  get uses(): readonly Use[] {
    return this.useList;
  }

  get hasUses(): boolean {
    return this.useList.length > 0;
  }

  /**
   * Operations using this value, in use-list order, without duplicates
   */
  get users(): Operation[] {
    const users: Operation[] = [];
    for (const use of this.useList) {
      if (!users.includes(use.operation)) users.push(use.operation);
    }
    return users;
  }

  /** @internal called by Operation when an operand slot starts referencing this value */
  addUse(use: Use): void {
    this.useList.push(use);
  }

  /** @internal */
  removeUse(operation: Operation, index: number): void {
    const at = this.useList.findIndex(u => u.operation === operation && u.index === index);
    if (at >= 0) this.useList.splice(at, 1);
  }

  /**
   * Redirect every use of this value to `replacement`
   */
  replaceAllUsesWith(replacement: Value): void {
    const self: ValueBase = this;
    if (replacement === self) return;
    for (const use of [...this.useList]) {
      use.operation.setOperand(use.index, replacement);
    }
  }
}

export class OpResult extends ValueBase {
  readonly kind = 'result';

  constructor(
    type: Attribute,
    public readonly op: Operation,
    public readonly index: number
  ) {
    super(type);
  }

  get definingOp(): Operation {
    return this.op;
  }
}

export class BlockArgument extends ValueBase {
  readonly kind = 'blockArg';

  constructor(
    type: Attribute,
    public readonly block: Block,
    public readonly index: number
  ) {
    super(type);
  }

  get definingOp(): undefined {
    return undefined;
  }
}

export type Value = OpResult | BlockArgument;

export function isValue(value: unknown): value is Value {
  return value instanceof OpResult || value instanceof BlockArgument;
}
