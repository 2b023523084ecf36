/**
 * Immutable IR nodes
 *
 * Frozen counterparts of the mutable graph. Nodes carry no parent links, so
 * one block or region can be shared by several parents across rewrite
 * steps. Equality is identity.
 */

import { toAttributeMap, type Attribute, type OpDefinition, type WalkControl } from '@irkit/ir';
import { ImmutabilityError } from './errors.js';
import { SealedList, SealedMap } from './sealed-list.js';

type Attributes = ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>;

export type IVisitor = (op: IOp) => void;
export type IAbortableVisitor = (op: IOp) => WalkControl;

/**
 * Identity-independent part of an operation, shared between versions of it
 */
export interface OpData {
  readonly name: string;
  readonly definition: OpDefinition;
  readonly attributes: SealedMap<string, Attribute>;
}

export function opData(definition: OpDefinition, attributes?: Attributes): OpData {
  return Object.freeze({
    name: definition.name,
    definition,
    attributes: new SealedMap(toAttributeMap(attributes)),
  });
}

export class IResult {
  readonly kind = 'result';

  constructor(
    public readonly type: Attribute,
    public readonly op: IOp,
    public readonly index: number
  ) {
    Object.freeze(this);
  }
}

export class IBlockArg {
  readonly kind = 'blockArg';

  constructor(
    public readonly type: Attribute,
    public readonly block: IBlock,
    public readonly index: number
  ) {
    Object.freeze(this);
  }
}

export type IValue = IResult | IBlockArg;

export function isIValue(value: unknown): value is IValue {
  return value instanceof IResult || value instanceof IBlockArg;
}

export interface IOpInit {
  operands?: Iterable<IValue>;
  resultTypes?: Iterable<Attribute>;
  attributes?: Attributes;
  successors?: Iterable<IBlock>;
  regions?: Iterable<IRegion>;
}

export class IOp {
  readonly operands: SealedList<IValue>;
  readonly results: SealedList<IResult>;
  readonly successors: SealedList<IBlock>;
  readonly regions: SealedList<IRegion>;

  constructor(
    public readonly data: OpData,
    operands: Iterable<IValue> = [],
    resultTypes: Iterable<Attribute> = [],
    successors: Iterable<IBlock> = [],
    regions: Iterable<IRegion> = []
  ) {
    this.operands = new SealedList(operands);
    this.results = new SealedList([...resultTypes].map((type, i) => new IResult(type, this, i)));
    this.successors = new SealedList(successors);
    this.regions = new SealedList(regions);
    Object.freeze(this);
  }

  static create(definition: OpDefinition, init: IOpInit = {}): IOp {
    return new IOp(opData(definition, init.attributes), init.operands, init.resultTypes, init.successors, init.regions);
  }

  get name(): string {
    return this.data.name;
  }

  get definition(): OpDefinition {
    return this.data.definition;
  }

  get attributes(): SealedMap<string, Attribute> {
    return this.data.attributes;
  }

  get result(): IResult | undefined {
    return this.results.first;
  }

  get region(): IRegion | undefined {
    return this.regions.first;
  }

  get resultTypes(): Attribute[] {
    return this.results.map(r => r.type);
  }

  isa(definition: OpDefinition): boolean {
    return this.data.definition === definition;
  }

  getAttribute(name: string): Attribute | undefined {
    return this.data.attributes.get(name);
  }

  /**
   * Operand by slot name (from the definition) or position
   */
  operand(field: string | number): IValue | undefined {
    const index = typeof field === 'number' ? field : this.definition.operands.indexOf(field);
    return index >= 0 ? this.operands.at(index) : undefined;
  }

  walk(visitor: IVisitor): void {
    visitor(this);
    for (const region of this.regions) region.walk(visitor);
  }

  walkAbortable(visitor: IAbortableVisitor): boolean {
    if (visitor(this) === 'stop') return false;
    return this.regions.every(region => region.walkAbortable(visitor));
  }
}

/**
 * Arguments are minted by the constructor; the operation list is supplied
 * once through seal(), which lets successors refer to a block before its
 * body exists.
 */
export class IBlock {
  readonly args: SealedList<IBlockArg>;
  private opList: SealedList<IOp> | null = null;

  constructor(argTypes: Iterable<Attribute> = []) {
    this.args = new SealedList([...argTypes].map((type, i) => new IBlockArg(type, this, i)));
  }

  static create(argTypes: Iterable<Attribute>, build: (args: SealedList<IBlockArg>) => Iterable<IOp>): IBlock {
    const block = new IBlock(argTypes);
    block.seal(build(block.args));
    return block;
  }

  get isSealed(): boolean {
    return this.opList !== null;
  }

  get ops(): SealedList<IOp> {
    if (this.opList === null) {
      throw new ImmutabilityError(`block with ${this.args.length} args read before it was sealed`);
    }
    return this.opList;
  }

  get argTypes(): Attribute[] {
    return this.args.map(arg => arg.type);
  }

  seal(ops: Iterable<IOp>): this {
    if (this.opList !== null) {
      throw new ImmutabilityError('block is already sealed');
    }
    this.opList = new SealedList(ops);
    Object.freeze(this);
    return this;
  }

  walk(visitor: IVisitor): void {
    for (const op of this.ops) op.walk(visitor);
  }

  walkAbortable(visitor: IAbortableVisitor): boolean {
    return this.ops.every(op => op.walkAbortable(visitor));
  }
}

export class IRegion {
  readonly blocks: SealedList<IBlock>;

  constructor(blocks: Iterable<IBlock> = []) {
    this.blocks = new SealedList(blocks);
    Object.freeze(this);
  }

  /** Single-block region holding `ops` */
  static fromOps(ops: Iterable<IOp>, argTypes: Iterable<Attribute> = []): IRegion {
    return new IRegion([new IBlock(argTypes).seal(ops)]);
  }

  get block(): IBlock | undefined {
    return this.blocks.first;
  }

  get ops(): SealedList<IOp> {
    return this.block?.ops ?? EMPTY_OPS;
  }

  walk(visitor: IVisitor): void {
    for (const block of this.blocks) block.walk(visitor);
  }

  walkAbortable(visitor: IAbortableVisitor): boolean {
    return this.blocks.every(block => block.walkAbortable(visitor));
  }

  valueUsedInside(value: IValue): boolean {
    return !this.walkAbortable(op => (op.operands.includes(value) ? 'stop' : 'advance'));
  }
}

const EMPTY_OPS = new SealedList<IOp>();

/**
 * Printable reference; immutable nodes have no position, so only local facts are used
 */
export function describeIValue(value: IValue): string {
  return value.kind === 'result'
    ? `result #${value.index} of immutable '${value.op.name}'`
    : `argument #${value.index} of immutable block (${value.block.args.length} args)`;
}

export function describeIOp(op: IOp): string {
  return `immutable '${op.name}'`;
}
