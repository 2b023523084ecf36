/**
 * Conversion between the mutable graph and the immutable mirror
 *
 * Both directions record a correspondence map as they go. Blocks of a
 * region are declared before any operation is converted, so successor
 * references to later blocks resolve.
 */

import {
  Block,
  Region,
  createOperation,
  describeBlock,
  describeOperation,
  describeValue,
  type Operation,
  type Value,
} from '@irkit/ir';
import { UnresolvedReferenceError } from './errors.js';
import { IBlock, IOp, IRegion, describeIOp, describeIValue, opData, type IValue } from './nodes.js';

export interface ConversionContext {
  readonly values: Map<Value, IValue>;
  readonly blocks: Map<Block, IBlock>;
  readonly ops: Map<Operation, IOp>;
  /** Operations whose conversion has started but not finished */
  readonly pending: Set<Operation>;
}

export function createConversionContext(): ConversionContext {
  return { values: new Map(), blocks: new Map(), ops: new Map(), pending: new Set() };
}

/**
 * Mirror an operation and everything nested in it. Operands produced by an
 * operation not converted yet are converted on demand; a later visit of
 * that operation reuses the result.
 */
export function fromMutable(op: Operation, ctx: ConversionContext = createConversionContext()): IOp {
  const existing = ctx.ops.get(op);
  if (existing !== undefined) return existing;

  ctx.pending.add(op);
  const operands = op.operands.map(value => resolveValue(value, op, ctx));
  const successors = op.successors.map(block => {
    const target = ctx.blocks.get(block);
    if (target === undefined) {
      throw new UnresolvedReferenceError(describeBlock(block), describeOperation(op));
    }
    return target;
  });
  const regions = op.regions.map(region => fromMutableRegion(region, ctx));
  ctx.pending.delete(op);

  const iop = new IOp(opData(op.definition, op.attributes), operands, op.resultTypes, successors, regions);
  ctx.ops.set(op, iop);
  op.results.forEach((result, i) => ctx.values.set(result, iop.results.get(i)));
  return iop;
}

function resolveValue(value: Value, user: Operation, ctx: ConversionContext): IValue {
  const known = ctx.values.get(value);
  if (known !== undefined) return known;

  // A block argument is only known once its block has been declared
  if (value.kind === 'blockArg' || ctx.pending.has(value.op)) {
    throw new UnresolvedReferenceError(describeValue(value), describeOperation(user));
  }
  return fromMutable(value.op, ctx).results.get(value.index);
}

function declareBlock(block: Block, ctx: ConversionContext): IBlock {
  const iblock = new IBlock(block.argTypes);
  ctx.blocks.set(block, iblock);
  block.args.forEach((arg, i) => ctx.values.set(arg, iblock.args.get(i)));
  return iblock;
}

export function fromMutableBlock(block: Block, ctx: ConversionContext = createConversionContext()): IBlock {
  const existing = ctx.blocks.get(block);
  if (existing?.isSealed) return existing;

  const iblock = existing ?? declareBlock(block, ctx);
  return iblock.seal(block.ops.map(op => fromMutable(op, ctx)));
}

export function fromMutableRegion(region: Region, ctx: ConversionContext = createConversionContext()): IRegion {
  const iblocks = region.blocks.map(block => declareBlock(block, ctx));
  region.blocks.forEach(block => fromMutableBlock(block, ctx));
  return new IRegion(iblocks);
}

export interface MutableMapping {
  readonly values: Map<IValue, Value>;
  readonly blocks: Map<IBlock, Block>;
}

export function createMutableMapping(): MutableMapping {
  return { values: new Map(), blocks: new Map() };
}

/**
 * Build a fresh mutable operation from an immutable one. The source is
 * left untouched; every operand and successor must already be in `mapping`.
 */
export function toMutable(iop: IOp, mapping: MutableMapping = createMutableMapping()): Operation {
  const operands = iop.operands.map(value => {
    const mapped = mapping.values.get(value);
    if (mapped === undefined) {
      throw new UnresolvedReferenceError(describeIValue(value), describeIOp(iop));
    }
    return mapped;
  });
  const successors = iop.successors.map(block => {
    const mapped = mapping.blocks.get(block);
    if (mapped === undefined) {
      throw new UnresolvedReferenceError(`immutable block (${block.args.length} args)`, describeIOp(iop));
    }
    return mapped;
  });
  const regions = iop.regions.map(region => toMutableRegion(region, mapping));

  const op = createOperation(iop.definition, {
    operands,
    resultTypes: iop.resultTypes,
    attributes: iop.attributes,
    successors,
    regions,
  });
  iop.results.forEach((result, i) => mapping.values.set(result, op.results[i]));
  return op;
}

function createBlock(iblock: IBlock, mapping: MutableMapping): Block {
  const block = new Block(iblock.argTypes);
  mapping.blocks.set(iblock, block);
  iblock.args.forEach((arg, i) => mapping.values.set(arg, block.args[i]));
  return block;
}

function fillBlock(block: Block, iblock: IBlock, mapping: MutableMapping): Block {
  for (const iop of iblock.ops) block.addOp(toMutable(iop, mapping));
  return block;
}

export function toMutableBlock(iblock: IBlock, mapping: MutableMapping = createMutableMapping()): Block {
  return fillBlock(createBlock(iblock, mapping), iblock, mapping);
}

export function toMutableRegion(iregion: IRegion, mapping: MutableMapping = createMutableMapping()): Region {
  const blocks = iregion.blocks.map(iblock => createBlock(iblock, mapping));
  iregion.blocks.forEach((iblock, i) => fillBlock(blocks[i], iblock, mapping));
  return new Region(blocks);
}
