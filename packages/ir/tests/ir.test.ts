import { describe, it, expect } from 'vitest';
import {
  Attr,
  Block,
  Region,
  Types,
  IRStructureError,
  createOperation,
  describeOperation,
  describeValue,
  describeBlock,
  type Operation,
} from '../src/index.js';
import {
  AddiOp,
  ContainerOp,
  addi,
  body,
  constant,
  container,
  moduleOp,
  names,
  res,
} from '../../../test/fixtures/toy-dialect.js';

describe('Operation construction', () => {
  it('synthesizes results with increasing indices', () => {
    const op = createOperation(AddiOp, {
      operands: [],
      resultTypes: [Types.i32, Types.i64, Types.i1],
    });

    expect(op.results.map(r => r.index)).toEqual([0, 1, 2]);
    expect(op.results.every(r => r.op === op)).toBe(true);
    expect(op.resultTypes).toEqual([Types.i32, Types.i64, Types.i1]);
    expect(Object.isFrozen(op.results)).toBe(true);
  });

  it('exposes name, kind tag and attributes', () => {
    const c = constant(7);

    expect(c.name).toBe('arith.constant');
    expect(c.attributes.get('value')).toEqual(Attr.int(7, 32));
    expect(c.isa(AddiOp)).toBe(false);
  });

  it('registers operand uses', () => {
    const a = constant(1);
    const b = constant(2);
    const sum = addi(res(a), res(b));

    expect(res(a).uses).toEqual([{ operation: sum, index: 0 }]);
    expect(res(b).uses).toEqual([{ operation: sum, index: 1 }]);
    expect(sum.operand('lhs')).toBe(res(a));
    expect(sum.operand('rhs')).toBe(res(b));
    expect(sum.operand('missing')).toBeUndefined();
    expect(sum.resultField('result')).toBe(sum.result);
  });

  it('stamps block arguments with their block and index', () => {
    const block = new Block([Types.i32, Types.i1]);

    expect(block.args.map(a => a.index)).toEqual([0, 1]);
    expect(block.args.every(a => a.block === block)).toBe(true);
    expect(block.argTypes).toEqual([Types.i32, Types.i1]);
  });

  it('refuses to adopt a region that already has a parent', () => {
    const region = Region.fromOps([]);
    createOperation(ContainerOp, { regions: [region] });

    expect(() => createOperation(ContainerOp, { regions: [region] })).toThrow(IRStructureError);
  });

  it('leaves no uses or parent links behind when construction fails', () => {
    const c = constant(1);
    const fresh = Region.fromOps([]);
    const owned = Region.fromOps([]);
    createOperation(ContainerOp, { regions: [owned] });

    expect(() => createOperation(ContainerOp, { operands: [res(c)], regions: [fresh, owned] })).toThrow(
      IRStructureError
    );
    expect(res(c).hasUses).toBe(false);
    expect(fresh.parent).toBeNull();
    expect(() => c.erase()).not.toThrow();
  });
});

describe('Use-lists', () => {
  it('moves a use when an operand is replaced', () => {
    const a = constant(1);
    const b = constant(2);
    const sum = addi(res(a), res(a));

    sum.setOperand(1, res(b));

    expect(res(a).uses).toEqual([{ operation: sum, index: 0 }]);
    expect(res(b).uses).toEqual([{ operation: sum, index: 1 }]);
  });

  it('replaceAllUsesWith redirects every use', () => {
    const a = constant(1);
    const b = constant(2);
    const first = addi(res(a), res(a));
    const second = addi(res(a), res(b));

    res(a).replaceAllUsesWith(res(b));

    expect(res(a).hasUses).toBe(false);
    expect(first.operands).toEqual([res(b), res(b)]);
    expect(second.operands).toEqual([res(b), res(b)]);
    expect(res(b).users).toEqual([second, first]);
  });

  it('erase drops references of the erased subtree', () => {
    const a = constant(1);
    const inner = addi(res(a), res(a));
    const box = container([inner]);
    const module = moduleOp([a, box]);

    box.erase();

    expect(res(a).hasUses).toBe(false);
    expect(body(module).ops).toEqual([a]);
    expect(box.parent).toBeNull();
  });

  it('erase fails while a result is still used', () => {
    const a = constant(1);
    const sum = addi(res(a), res(a));
    moduleOp([a, sum]);

    expect(() => a.erase()).toThrow(IRStructureError);
    expect(() => a.erase()).toThrow("result #0 of 'arith.constant' at /0.0.0 still has 2 use(s)");
  });
});

describe('Ownership', () => {
  it('rejects attaching an operation twice', () => {
    const op = constant(1);
    new Block([], [op]);

    expect(() => new Block([], [op])).toThrow(IRStructureError);
  });

  it('attaches all operations of a list or none of them', () => {
    const placed = constant(1);
    new Block([], [placed]);
    const loose = constant(2);
    const block = new Block();

    expect(() => block.addOps([loose, placed])).toThrow('already has a parent block');
    expect(block.ops).toEqual([]);
    expect(loose.parent).toBeNull();

    expect(() => new Block([], [loose, placed])).toThrow(IRStructureError);
    expect(loose.parent).toBeNull();
  });

  it('adopts all blocks of a list or none of them', () => {
    const owned = new Block();
    new Region([owned]);
    const fresh = new Block();

    expect(() => new Region([fresh, owned])).toThrow('already belongs to a region');
    expect(fresh.parent).toBeNull();
  });

  it('rejects inserting an operation into a block it encloses', () => {
    const inner = new Block();
    const box = createOperation(ContainerOp, { regions: [new Region([inner])] });

    expect(() => inner.addOp(box)).toThrow('into a block it encloses');
  });

  it('inserts before and after an anchor', () => {
    const a = constant(1);
    const c = constant(3);
    const block = new Block([], [a, c]);
    const b = constant(2);
    const d = constant(4);

    block.insertOpBefore(b, c);
    block.insertOpAfter(d, c);

    expect(block.ops).toEqual([a, b, c, d]);
    expect(block.first).toBe(a);
    expect(block.last).toBe(d);
  });

  it('tracks the parent chain', () => {
    const inner = constant(1);
    const box = container([inner]);
    const module = moduleOp([box]);

    expect(inner.parentOp).toBe(box);
    expect(box.parentOp).toBe(module);
    expect(module.isAncestorOf(inner)).toBe(true);
    expect(inner.isAncestorOf(module)).toBe(false);
  });
});

describe('Traversal', () => {
  function nested(): { module: Operation; order: Operation[] } {
    const a = constant(1);
    const innerA = constant(2);
    const innerB = constant(3);
    const box = container([innerA, innerB]);
    const b = constant(4);
    const module = moduleOp([a, box, b]);
    return { module, order: [module, a, box, innerA, innerB, b] };
  }

  it('walks in pre-order', () => {
    const { module, order } = nested();
    const seen: Operation[] = [];

    module.walk(op => seen.push(op));

    expect(seen).toEqual(order);
  });

  it('stops an abortable walk immediately', () => {
    const { module, order } = nested();
    const seen: Operation[] = [];

    const completed = module.walkAbortable(op => {
      seen.push(op);
      return op === order[3] ? 'stop' : 'advance';
    });

    expect(completed).toBe(false);
    expect(seen).toEqual(order.slice(0, 4));
  });

  it('reports completion when nothing stops the walk', () => {
    const { module } = nested();
    expect(module.walkAbortable(() => 'advance')).toBe(true);
  });

  it('finds a value used inside a region', () => {
    const a = constant(1);
    const unused = constant(2);
    const box = container([addi(res(a), res(a))]);
    moduleOp([a, unused, box]);

    const region = box.region;
    expect(region?.valueUsedInside(res(a))).toBe(true);
    expect(region?.valueUsedInside(res(unused))).toBe(false);
  });
});

describe('Stable references', () => {
  it('names operations by ownership path', () => {
    const a = constant(1);
    const inner = constant(2);
    const box = container([inner], [Types.i32]);
    const module = moduleOp([a, box]);

    expect(describeOperation(module)).toBe("'builtin.module' at /");
    expect(describeOperation(a)).toBe("'arith.constant' at /0.0.0");
    expect(describeOperation(inner)).toBe("'arith.constant' at /0.0.1/0.0.0");
    expect(describeBlock(body(box))).toBe('block /0.0.1/0.0');
    expect(describeValue(body(box).args[0] ?? res(a))).toBe('argument #0 of block /0.0.1/0.0');
    expect(describeValue(res(inner))).toBe("result #0 of 'arith.constant' at /0.0.1/0.0.0");
  });

  it('marks detached blocks', () => {
    const a = constant(1);
    new Block([], [constant(0), a]);

    expect(describeOperation(a)).toBe("'arith.constant' at /~.1");
    expect(names([a])).toEqual(['arith.constant']);
  });
});
