/**
 * Region - owns an ordered list of blocks
 */

import type { Attribute } from './attributes.js';
import { Block } from './block.js';
import { IRStructureError } from './errors.js';
import type { Operation } from './operation.js';
import { describeBlock } from './references.js';
import type { AbortableVisitor, Visitor } from './types.js';
import type { Value } from './values.js';

export class Region {
  private readonly blockList: Block[] = [];
  private parentOperation: Operation | null = null;

  constructor(blocks: readonly Block[] = []) {
    this.addBlocks(blocks);
  }

  /**
   * Single-block region holding `ops`
   */
  static fromOps(ops: readonly Operation[], argTypes: readonly Attribute[] = []): Region {
    return new Region([new Block(argTypes, ops)]);
  }

  get blocks(): readonly Block[] {
    return this.blockList;
  }

  /** First block, the common single-block case */
  get block(): Block | undefined {
    return this.blockList[0];
  }

  /** Operations of the first block, or none */
  get ops(): readonly Operation[] {
    return this.block?.ops ?? [];
  }

  get parent(): Operation | null {
    return this.parentOperation;
  }

  /** @internal maintained by Operation */
  setParent(op: Operation | null): void {
    this.parentOperation = op;
  }

  indexOf(block: Block): number {
    return this.blockList.indexOf(block);
  }

  addBlock(block: Block): void {
    this.addBlocks([block]);
  }

  /**
   * Append blocks; when any of them cannot be adopted, none is
   */
  addBlocks(blocks: readonly Block[]): void {
    const owner = this.parentOperation;
    blocks.forEach((block, i) => {
      if (block.parent !== null || blocks.indexOf(block) !== i) {
        throw new IRStructureError(`${describeBlock(block)} already belongs to a region`);
      }
      if (owner !== null && block.ops.some(op => op === owner || op.isAncestorOf(owner))) {
        throw new IRStructureError(`cannot add ${describeBlock(block)} to a region nested inside it`);
      }
    });
    for (const block of blocks) block.setParent(this);
    this.blockList.push(...blocks);
  }

  detachBlock(block: Block): Block {
    const at = this.blockList.indexOf(block);
    if (at < 0) {
      throw new IRStructureError(`${describeBlock(block)} is not in this region`);
    }
    this.blockList.splice(at, 1);
    block.setParent(null);
    return block;
  }

  walk(visitor: Visitor): void {
    for (const block of [...this.blockList]) block.walk(visitor);
  }

  walkAbortable(visitor: AbortableVisitor): boolean {
    for (const block of [...this.blockList]) {
      if (!block.walkAbortable(visitor)) return false;
    }
    return true;
  }

  /**
   * Whether any operation inside this region references `value`; stops at the first use
   */
  valueUsedInside(value: Value): boolean {
    let found = false;
    this.walkAbortable(op => {
      if (op.operands.includes(value)) {
        found = true;
        return 'stop';
      }
      return 'advance';
    });
    return found;
  }
}
