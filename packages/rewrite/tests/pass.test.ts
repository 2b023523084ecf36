import { describe, it, expect } from 'vitest';
import {
  IRError,
  LogLevel,
  Logger,
  createOperation,
  defineOp,
  getIntAttr,
  type OpDefinition,
} from '@irkit/ir';
import {
  PassPipeline,
  PatternRewritePass,
  UnsupportedOperationError,
  opRewritePattern,
  type ModulePass,
} from '../src/index.js';
import {
  CmpiOp,
  MuliOp,
  addi,
  body,
  cmpi,
  constant,
  moduleOp,
  muli,
  names,
  res,
} from '../../../test/fixtures/toy-dialect.js';

const SeqOp = defineOp('rv.seq', { operands: ['lhs', 'rhs'], results: ['rd'] });
const SneOp = defineOp('rv.sne', { operands: ['lhs', 'rhs'], results: ['rd'] });

function targetFor(predicate: bigint): OpDefinition | undefined {
  if (predicate === 0n) return SeqOp;
  if (predicate === 1n) return SneOp;
  return undefined;
}

const lowerCmpi = opRewritePattern(CmpiOp, (op, rewriter) => {
  const predicate = getIntAttr(op, 'predicate');
  const target = targetFor(predicate);
  if (target === undefined) {
    throw new UnsupportedOperationError(op, `predicate ${predicate} has no lowering`);
  }
  rewriter.replaceMatchedOp(createOperation(target, { operands: op.operands, resultTypes: op.resultTypes }));
});

const mulToAdd = opRewritePattern(MuliOp, (op, rewriter) => {
  const [lhs, rhs] = op.operands;
  rewriter.replaceMatchedOp(addi(lhs, rhs));
});

function capture() {
  const lines: string[] = [];
  const logger = new Logger('pipeline', LogLevel.DEBUG, line => lines.push(line));
  const entries = () => lines.map(line => JSON.parse(line));
  return { logger, entries };
}

const silent = new Logger('rewrite', LogLevel.ERROR, () => undefined);

describe('PassPipeline', () => {
  it('runs passes in order', () => {
    const order: string[] = [];
    const named = (name: string): ModulePass => ({ name, apply: () => void order.push(name) });
    const { logger, entries } = capture();

    const pipeline = new PassPipeline([named('first')], { logger }).add(named('second'));
    pipeline.run(moduleOp());

    expect(pipeline.passNames).toEqual(['first', 'second']);
    expect(order).toEqual(['first', 'second']);
    expect(entries().map(entry => `${entry.message} ${entry.pass}`)).toEqual([
      'pass started first',
      'pass finished first',
      'pass started second',
      'pass finished second',
    ]);
  });

  it('lowers every supported comparison', () => {
    const a = constant(1);
    const eq = cmpi(0, res(a), res(a));
    const ne = cmpi(1, res(a), res(eq));
    const module = moduleOp([a, eq, ne]);
    const pass = new PatternRewritePass('lower-cmpi', [lowerCmpi], { logger: silent });

    new PassPipeline([pass], { verifyEach: true, logger: capture().logger }).run(module);

    const [, seq, sne] = body(module).ops;
    expect(names(body(module).ops)).toEqual(['arith.constant', 'rv.seq', 'rv.sne']);
    expect(sne.operands).toEqual([res(a), res(seq)]);
    expect(pass.lastResult).toEqual({ changed: true, rewrites: 2, visits: 6 });
  });

  it('chains rewrite passes', () => {
    const a = constant(3);
    const product = muli(res(a), res(a));
    const module = moduleOp([a, product, cmpi(0, res(product), res(a))]);

    new PassPipeline(
      [
        new PatternRewritePass('mul-to-add', [mulToAdd], { logger: silent }),
        new PatternRewritePass('lower-cmpi', [lowerCmpi], { logger: silent }),
      ],
      { logger: capture().logger }
    ).run(module);

    expect(names(body(module).ops)).toEqual(['arith.constant', 'arith.addi', 'rv.seq']);
  });

  it('reports an unsupported predicate as a catchable error', () => {
    const a = constant(1);
    const eq = cmpi(0, res(a), res(a));
    const odd = cmpi(7, res(a), res(a));
    const module = moduleOp([a, eq, odd]);
    const { logger, entries } = capture();
    const pipeline = new PassPipeline(
      [new PatternRewritePass('lower-cmpi', [lowerCmpi], { logger: silent })],
      { logger }
    );

    let caught: unknown;
    try {
      pipeline.run(module);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedOperationError);
    expect(caught).toBeInstanceOf(IRError);
    if (!(caught instanceof UnsupportedOperationError)) return;
    expect(caught.message).toBe("cannot lower 'arith.cmpi' at /0.0.2: predicate 7 has no lowering");
    expect(caught.operation).toBe(odd);
    expect(caught.reference).toBe("'arith.cmpi' at /0.0.2");

    // the part already lowered stays consistent
    expect(names(body(module).ops)).toEqual(['arith.constant', 'rv.seq', 'arith.cmpi']);
    expect(res(a).users).toEqual([odd, body(module).ops[1]]);

    expect(entries()).toEqual([
      { level: 'INFO', component: 'pipeline', message: 'pass started', pass: 'lower-cmpi' },
      {
        level: 'ERROR',
        component: 'pipeline',
        message: 'pass failed',
        error: "cannot lower 'arith.cmpi' at /0.0.2: predicate 7 has no lowering",
        errorName: 'UnsupportedOperationError',
        pass: 'lower-cmpi',
      },
    ]);
  });
});
