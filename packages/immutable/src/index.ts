/**
 * @irkit/immutable - Immutable IR Mirror
 *
 * Frozen, structurally shared dual of the mutable graph, conversion in both
 * directions, localized rebuild and rewrite combinators.
 */

export { ImmutabilityError, UnresolvedReferenceError } from './errors.js';
export { ListBuilder, SealedList, SealedMap } from './sealed-list.js';
export { IOp, IResult, IBlockArg, IBlock, IRegion, opData, isIValue, describeIValue, describeIOp } from './nodes.js';
export type { OpData, IValue, IOpInit, IVisitor, IAbortableVisitor } from './nodes.js';
export {
  fromMutable,
  fromMutableBlock,
  fromMutableRegion,
  toMutable,
  toMutableBlock,
  toMutableRegion,
  createConversionContext,
  createMutableMapping,
} from './convert.js';
export type { ConversionContext, MutableMapping } from './convert.js';
export { rebuildBlockWithSubstitution, replaceInBlock, needsRebuild } from './rebuild.js';
export type { RebuildOptions } from './rebuild.js';
export { newOp, fromOp } from './combinators.js';
export type { OperandSpec, OpSpec } from './combinators.js';
