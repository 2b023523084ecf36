/**
 * Toy dialects used across the test suites
 *
 * A handful of integer arithmetic, control flow and container operations,
 * just enough to exercise the generic machinery.
 */

import {
  Attr,
  Block,
  Region,
  Types,
  VerifyError,
  createOperation,
  defineDialect,
  defineOp,
  describeOperation,
  getIntAttr,
  type Attribute,
  type OpResult,
  type Operation,
  type Value,
} from '@irkit/ir';

export const ModuleOp = defineOp('builtin.module', {
  summary: 'Top-level container with a single region',
  verify: op => {
    if (op.regions.length !== 1) {
      throw new VerifyError('module must have exactly one region', describeOperation(op));
    }
  },
});

export const ConstantOp = defineOp('arith.constant', {
  results: ['result'],
  verify: op => {
    if (op.attributes.get('value')?.kind !== 'int') {
      throw new VerifyError('constant needs an integer value attribute', describeOperation(op));
    }
  },
});

export const AddiOp = defineOp('arith.addi', { operands: ['lhs', 'rhs'], results: ['result'] });
export const MuliOp = defineOp('arith.muli', { operands: ['lhs', 'rhs'], results: ['result'] });
export const CmpiOp = defineOp('arith.cmpi', { operands: ['lhs', 'rhs'], results: ['result'] });

export const BranchOp = defineOp('cf.br');
export const CondBranchOp = defineOp('cf.cond_br', { operands: ['cond'] });
export const ReturnOp = defineOp('func.return');
export const ContainerOp = defineOp('test.container', { summary: 'Holds one region, produces nothing' });

export const arith = defineDialect('arith', [ConstantOp, AddiOp, MuliOp, CmpiOp]);
export const cf = defineDialect('cf', [BranchOp, CondBranchOp]);
export const builtin = defineDialect('builtin', [ModuleOp]);
export const func = defineDialect('func', [ReturnOp]);

export function constant(value: bigint | number, type: Attribute = Types.i32): Operation {
  return createOperation(ConstantOp, {
    attributes: { value: Attr.int(value, 32) },
    resultTypes: [type],
  });
}

export function addi(lhs: Value, rhs: Value): Operation {
  return createOperation(AddiOp, { operands: [lhs, rhs], resultTypes: [lhs.type] });
}

export function muli(lhs: Value, rhs: Value): Operation {
  return createOperation(MuliOp, { operands: [lhs, rhs], resultTypes: [lhs.type] });
}

export function cmpi(predicate: number, lhs: Value, rhs: Value): Operation {
  return createOperation(CmpiOp, {
    operands: [lhs, rhs],
    resultTypes: [Types.i1],
    attributes: { predicate: Attr.int(predicate, 64) },
  });
}

export function ret(values: readonly Value[] = []): Operation {
  return createOperation(ReturnOp, { operands: values });
}

export function br(target: Block, args: readonly Value[] = []): Operation {
  return createOperation(BranchOp, { operands: args, successors: [target] });
}

export function condBr(cond: Value, thenBlock: Block, elseBlock: Block): Operation {
  return createOperation(CondBranchOp, { operands: [cond], successors: [thenBlock, elseBlock] });
}

export function container(ops: readonly Operation[], argTypes: readonly Attribute[] = []): Operation {
  return createOperation(ContainerOp, { regions: [Region.fromOps(ops, argTypes)] });
}

export function moduleOp(ops: readonly Operation[] = [], argTypes: readonly Attribute[] = []): Operation {
  return createOperation(ModuleOp, { regions: [new Region([new Block(argTypes, ops)])] });
}

/**
 * First result of an operation, failing the test when there is none
 */
export function res(op: Operation): OpResult {
  const result = op.result;
  if (result === undefined) throw new Error(`${op.name} has no result`);
  return result;
}

export function constantValue(op: Operation): bigint {
  return getIntAttr(op, 'value');
}

/**
 * The single block of a module or container
 */
export function body(op: Operation): Block {
  const block = op.region?.block;
  if (block === undefined) throw new Error(`${op.name} has no body block`);
  return block;
}

export function names(ops: readonly Operation[]): string[] {
  return ops.map(op => op.name);
}
