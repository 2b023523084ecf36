/**
 * Block - owns its arguments and an ordered list of operations
 */

import type { Attribute } from './attributes.js';
import { IRStructureError } from './errors.js';
import type { Operation } from './operation.js';
import { describeBlock, describeOperation } from './references.js';
import type { Region } from './region.js';
import type { AbortableVisitor, Visitor } from './types.js';
import { BlockArgument } from './values.js';

export class Block {
  /** Arguments are stamped with this block and their index once, here */
  readonly args: readonly BlockArgument[];

  private readonly opList: Operation[] = [];
  private parentRegion: Region | null = null;

  constructor(argTypes: readonly Attribute[] = [], ops: readonly Operation[] = []) {
    this.args = Object.freeze(argTypes.map((type, i) => new BlockArgument(type, this, i)));
    this.addOps(ops);
  }

  get ops(): readonly Operation[] {
    return this.opList;
  }

  get argTypes(): Attribute[] {
    return this.args.map(arg => arg.type);
  }

  get parent(): Region | null {
    return this.parentRegion;
  }

  get parentOp(): Operation | null {
    return this.parentRegion?.parent ?? null;
  }

  get first(): Operation | undefined {
    return this.opList[0];
  }

  get last(): Operation | undefined {
    return this.opList[this.opList.length - 1];
  }

  /** @internal maintained by Region */
  setParent(region: Region | null): void {
    this.parentRegion = region;
  }

  indexOf(op: Operation): number {
    return this.opList.indexOf(op);
  }

  addOp(op: Operation): void {
    this.addOps([op]);
  }

  /**
   * Append operations; when any of them cannot be attached, none is
   */
  addOps(ops: readonly Operation[]): void {
    this.insertAt(this.opList.length, ops);
  }

  insertOpBefore(op: Operation, existing: Operation): void {
    this.insertOpsBefore([op], existing);
  }

  insertOpAfter(op: Operation, existing: Operation): void {
    this.insertOpsAfter([op], existing);
  }

  insertOpsBefore(ops: readonly Operation[], existing: Operation): void {
    this.insertAt(this.positionOf(existing), ops);
  }

  insertOpsAfter(ops: readonly Operation[], existing: Operation): void {
    this.insertAt(this.positionOf(existing) + 1, ops);
  }

  /**
   * Unlink an operation from this block. Use-lists are left untouched.
   */
  detachOp(op: Operation): Operation {
    const at = this.positionOf(op);
    this.opList.splice(at, 1);
    op.setParent(null);
    return op;
  }

  walk(visitor: Visitor): void {
    for (const op of [...this.opList]) op.walk(visitor);
  }

  walkAbortable(visitor: AbortableVisitor): boolean {
    for (const op of [...this.opList]) {
      if (!op.walkAbortable(visitor)) return false;
    }
    return true;
  }

  /**
   * Whether `op` (an operation) encloses this block
   */
  isNestedIn(op: Operation): boolean {
    const owner = this.parentOp;
    return owner !== null && (owner === op || op.isAncestorOf(owner));
  }

  private positionOf(op: Operation): number {
    const at = this.opList.indexOf(op);
    if (at < 0) {
      throw new IRStructureError(`${describeOperation(op)} is not in ${describeBlock(this)}`);
    }
    return at;
  }

  private insertAt(at: number, ops: readonly Operation[]): void {
    ops.forEach((op, i) => {
      if (op.parent !== null) {
        throw new IRStructureError(`${describeOperation(op)} already has a parent block`);
      }
      if (ops.indexOf(op) !== i) {
        throw new IRStructureError(`${describeOperation(op)} is listed twice`);
      }
      if (this.isNestedIn(op)) {
        throw new IRStructureError(`cannot insert ${describeOperation(op)} into a block it encloses`);
      }
    });
    for (const op of ops) op.setParent(this);
    this.opList.splice(at, 0, ...ops);
  }
}
