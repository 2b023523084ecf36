/**
 * Localized rebuild
 *
 * A rebuilt block gets fresh arguments. Operations that reach none of the
 * substituted values (including through nested regions) are reused as they
 * are; the rest are rebuilt with remapped operands and their results are
 * added to the substitution for the operations after them.
 */

import { IRStructureError } from '@irkit/ir';
import { IBlock, IOp, IRegion, describeIOp, type IValue } from './nodes.js';

export interface RebuildOptions {
  /** Operation list of the new block, defaulting to the old block's */
  readonly ops?: Iterable<IOp>;
  /** Successor replacements, old block to new block */
  readonly blocks?: ReadonlyMap<IBlock, IBlock>;
}

interface RebuildEnv {
  readonly values: Map<IValue, IValue>;
  readonly blocks: Map<IBlock, IBlock>;
}

export function rebuildBlockWithSubstitution(
  block: IBlock,
  substitution: ReadonlyMap<IValue, IValue>,
  options: RebuildOptions = {}
): IBlock {
  const env: RebuildEnv = { values: new Map(substitution), blocks: new Map(options.blocks ?? []) };
  const fresh = declareBlock(block, env);
  return fillBlock(fresh, options.ops ?? block.ops, env);
}

/** Anything answering membership: a map of substitutions or a set of stale keys */
interface Lookup<K> {
  has(key: K): boolean;
}

/**
 * Whether `op` or anything nested in it refers to a substituted value or block.
 * Stops at the first hit.
 */
export function needsRebuild(
  op: IOp,
  values: Lookup<IValue>,
  blocks: Lookup<IBlock> = new Map<IBlock, IBlock>()
): boolean {
  return !op.walkAbortable(nested =>
    nested.operands.some(value => values.has(value)) || nested.successors.some(block => blocks.has(block))
      ? 'stop'
      : 'advance'
  );
}

function declareBlock(block: IBlock, env: RebuildEnv): IBlock {
  const fresh = new IBlock(block.argTypes);
  block.args.forEach((arg, i) => {
    // An explicit substitution of an argument wins over the freshly minted one
    if (!env.values.has(arg)) env.values.set(arg, fresh.args.get(i));
  });
  env.blocks.set(block, fresh);
  return fresh;
}

function fillBlock(fresh: IBlock, ops: Iterable<IOp>, env: RebuildEnv): IBlock {
  return fresh.seal([...ops].map(op => rebuildOp(op, env)));
}

function rebuildOp(op: IOp, env: RebuildEnv): IOp {
  if (!needsRebuild(op, env.values, env.blocks)) return op;

  const regions = op.regions.map(region =>
    region.blocks.some(block => block.ops.some(nested => needsRebuild(nested, env.values, env.blocks)))
      ? rebuildRegion(region, env)
      : region
  );
  const operands = op.operands.map(value => env.values.get(value) ?? value);
  const successors = op.successors.map(block => env.blocks.get(block) ?? block);

  // Same metadata record: only the wiring changes
  const rebuilt = new IOp(op.data, operands, op.resultTypes, successors, regions);
  op.results.forEach((result, i) => env.values.set(result, rebuilt.results.get(i)));
  return rebuilt;
}

/**
 * Only the blocks of the region that reach a substituted value or block are
 * rebuilt; the others are shared. A rebuilt block mints new arguments and may
 * rebuild results, so blocks using those, or branching to it, are rebuilt
 * too, until nothing more is affected. Affected blocks are all declared
 * before any is filled, so branches between them resolve to the new blocks.
 */
function rebuildRegion(region: IRegion, env: RebuildEnv): IRegion {
  const staleValues = new Set<IValue>(env.values.keys());
  const staleBlocks = new Set<IBlock>(env.blocks.keys());
  const affected = new Set<IBlock>();

  for (let grew = true; grew; ) {
    grew = false;
    for (const block of region.blocks) {
      if (affected.has(block) || !block.ops.some(op => needsRebuild(op, staleValues, staleBlocks))) continue;
      affected.add(block);
      staleBlocks.add(block);
      block.args.forEach(arg => staleValues.add(arg));
      block.walk(op => op.results.forEach(result => staleValues.add(result)));
      grew = true;
    }
  }

  if (affected.size === 0) return region;

  const declared = new Map<IBlock, IBlock>();
  for (const block of region.blocks) {
    if (affected.has(block)) declared.set(block, declareBlock(block, env));
  }
  for (const [block, fresh] of declared) fillBlock(fresh, block.ops, env);
  return new IRegion(region.blocks.map(block => declared.get(block) ?? block));
}

/**
 * Replace one operation of `block` with `replacement` (the last replacement
 * operation's results take over the target's), returning the new block
 */
export function replaceInBlock(block: IBlock, target: IOp, replacement: IOp | readonly IOp[]): IBlock {
  const index = block.ops.indexOf(target);
  if (index < 0) {
    throw new IRStructureError(`${describeIOp(target)} is not in the block being rewritten`);
  }

  const replacements = replacement instanceof IOp ? [replacement] : [...replacement];
  const last = replacements.at(-1);
  const substitution = new Map<IValue, IValue>();

  if (target.results.length > 0) {
    if (last === undefined || last.results.length !== target.results.length) {
      throw new IRStructureError(
        `cannot replace ${describeIOp(target)}: ${target.results.length} result(s) need a replacement with as many`
      );
    }
    target.results.forEach((result, i) => substitution.set(result, last.results.get(i)));
  }

  const ops = block.ops.toArray();
  ops.splice(index, 1, ...replacements);
  return rebuildBlockWithSubstitution(block, substitution, { ops });
}
