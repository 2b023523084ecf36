/**
 * Rewrite combinators
 *
 * Both return the operations a rewrite has to insert, in definition order,
 * ending with the operation they built. An operand may be a value, or an
 * operation (or list of operations) built earlier in the same rewrite, in
 * which case its first result is used and the operation is folded into the
 * returned list once.
 */

import { IRStructureError, type Attribute, type OpDefinition } from '@irkit/ir';
import {
  IBlockArg,
  IOp,
  IResult,
  describeIOp,
  opData,
  type IBlock,
  type IRegion,
  type IValue,
} from './nodes.js';

/** A list of operations supplies the first result of its last operation; all of them are folded */
export type OperandSpec = IValue | IOp | readonly IOp[];

export interface OpSpec {
  operands?: readonly OperandSpec[];
  resultTypes?: Iterable<Attribute>;
  attributes?: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>;
  successors?: Iterable<IBlock>;
  regions?: Iterable<IRegion>;
}

export function newOp(definition: OpDefinition, spec: OpSpec = {}): IOp[] {
  const { values, folded } = resolveOperands(spec.operands ?? []);
  const op = new IOp(opData(definition, spec.attributes), values, spec.resultTypes, spec.successors, spec.regions);
  return [...folded, op];
}

/**
 * Derive an operation from `old`, overriding only the given fields. The
 * metadata record is shared unless attributes are overridden. When `env` is
 * given, operands found in it are replaced by their mapped values and old
 * results are mapped to the new ones.
 */
export function fromOp(old: IOp, overrides: OpSpec = {}, env?: Map<IValue, IValue>): IOp[] {
  const { values, folded } =
    overrides.operands === undefined ? { values: old.operands.toArray(), folded: [] } : resolveOperands(overrides.operands);
  const data = overrides.attributes === undefined ? old.data : opData(old.definition, overrides.attributes);
  const operands = env === undefined ? values : values.map(value => env.get(value) ?? value);

  const op = new IOp(
    data,
    operands,
    overrides.resultTypes ?? old.resultTypes,
    overrides.successors ?? old.successors,
    overrides.regions ?? old.regions
  );

  if (env !== undefined) {
    old.results.forEach((result, i) => {
      const next = op.results.at(i);
      if (next !== undefined) env.set(result, next);
    });
  }
  return [...folded, op];
}

function resolveOperands(specs: readonly OperandSpec[]): { values: IValue[]; folded: IOp[] } {
  const folded: IOp[] = [];
  const seen = new Set<IOp>();

  const fold = (op: IOp): void => {
    if (seen.has(op)) return;
    seen.add(op);
    folded.push(op);
  };

  const values = specs.map(spec => {
    if (spec instanceof IResult || spec instanceof IBlockArg) return spec;
    if (spec instanceof IOp) {
      fold(spec);
      return firstResult(spec);
    }
    spec.forEach(fold);
    const last = spec.at(-1);
    if (last === undefined) {
      throw new IRStructureError('an empty operation list cannot be used as an operand');
    }
    return firstResult(last);
  });

  return { values, folded };
}

function firstResult(op: IOp): IResult {
  const result = op.result;
  if (result === undefined) {
    throw new IRStructureError(`${describeIOp(op)} has no result to use as an operand`);
  }
  return result;
}
