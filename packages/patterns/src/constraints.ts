/**
 * Constraints - predicates over a match context
 *
 * Each constraint declares the variables it reads and the ones it may bind,
 * which lets a query reject constraints that depend on a later one.
 */

import { attrEquals, attrToString, type Attribute, type OpDefinition } from '@irkit/ir';
import {
  type AnyVariable,
  type AttributeVariable,
  type MatchContext,
  type OperationVariable,
  type OpResultVariable,
  type ValueVariable,
} from './variables.js';

export interface Constraint {
  readonly reads: readonly AnyVariable[];
  readonly binds: readonly AnyVariable[];
  check(ctx: MatchContext): boolean;
  describe(): string;
}

/**
 * The bound operation is of the given kind
 */
export class TypeConstraint implements Constraint {
  readonly binds: readonly AnyVariable[] = [];
  readonly reads: readonly AnyVariable[];

  constructor(
    private readonly operation: OperationVariable,
    private readonly definition: OpDefinition
  ) {
    this.reads = [operation];
  }

  check(ctx: MatchContext): boolean {
    return this.operation.get(ctx)?.isa(this.definition) ?? false;
  }

  describe(): string {
    return `${this.operation} isa '${this.definition.name}'`;
  }
}

/**
 * The bound value has the given type attribute
 */
export class ValueTypeConstraint implements Constraint {
  readonly binds: readonly AnyVariable[] = [];
  readonly reads: readonly AnyVariable[];

  constructor(
    private readonly value: ValueVariable | OpResultVariable,
    private readonly type: Attribute
  ) {
    this.reads = [value];
  }

  check(ctx: MatchContext): boolean {
    const value = this.value.get(ctx);
    return value !== undefined && attrEquals(value.type, this.type);
  }

  describe(): string {
    return `${this.value} has type ${attrToString(this.type)}`;
  }
}

/**
 * Binds `target` to a named attribute of the bound operation
 */
export class OperationAttributeConstraint implements Constraint {
  readonly reads: readonly AnyVariable[];
  readonly binds: readonly AnyVariable[];

  constructor(
    private readonly operation: OperationVariable,
    private readonly attribute: string,
    private readonly target: AttributeVariable
  ) {
    this.reads = [operation];
    this.binds = [target];
  }

  check(ctx: MatchContext): boolean {
    const attr = this.operation.get(ctx)?.attributes.get(this.attribute);
    return attr !== undefined && this.target.set(ctx, attr);
  }

  describe(): string {
    return `${this.target} = attribute '${this.attribute}' of ${this.operation}`;
  }
}

/**
 * Binds `target` to an operand of the bound operation, by slot name or index
 */
export class OperationOperandConstraint implements Constraint {
  readonly reads: readonly AnyVariable[];
  readonly binds: readonly AnyVariable[];

  constructor(
    private readonly operation: OperationVariable,
    private readonly field: string | number,
    private readonly target: ValueVariable
  ) {
    this.reads = [operation];
    this.binds = [target];
  }

  check(ctx: MatchContext): boolean {
    const operand = this.operation.get(ctx)?.operand(this.field);
    return operand !== undefined && this.target.set(ctx, operand);
  }

  describe(): string {
    return `${this.target} = operand ${String(this.field)} of ${this.operation}`;
  }
}

/**
 * Binds `target` to a result of the bound operation, by slot name or index
 */
export class OperationResultConstraint implements Constraint {
  readonly reads: readonly AnyVariable[];
  readonly binds: readonly AnyVariable[];

  constructor(
    private readonly operation: OperationVariable,
    private readonly field: string | number,
    private readonly target: OpResultVariable
  ) {
    this.reads = [operation];
    this.binds = [target];
  }

  check(ctx: MatchContext): boolean {
    const result = this.operation.get(ctx)?.resultField(this.field);
    return result !== undefined && this.target.set(ctx, result);
  }

  describe(): string {
    return `${this.target} = result ${String(this.field)} of ${this.operation}`;
  }
}

/** Binds `right` to the value of `left`, or checks them equal when `right` is already bound */
export class EqConstraint implements Constraint {
  readonly binds: readonly AnyVariable[];
  readonly reads: readonly AnyVariable[];

  constructor(
    private readonly left: AnyVariable,
    private readonly right: AnyVariable
  ) {
    this.reads = [left];
    this.binds = [right];
  }

  check(ctx: MatchContext): boolean {
    const value = this.left.get(ctx);
    return value !== undefined && this.right.set(ctx, value);
  }

  describe(): string {
    return `${this.right} = ${this.left}`;
  }
}

export class AttributeValueConstraint implements Constraint {
  readonly binds: readonly AnyVariable[] = [];
  readonly reads: readonly AnyVariable[];

  constructor(
    private readonly attribute: AttributeVariable,
    private readonly expected: Attribute
  ) {
    this.reads = [attribute];
  }

  check(ctx: MatchContext): boolean {
    const attr = this.attribute.get(ctx);
    return attr !== undefined && attrEquals(attr, this.expected);
  }

  describe(): string {
    return `${this.attribute} == ${attrToString(this.expected)}`;
  }
}

/**
 * Binds `target` to the operation defining the bound value. A block
 * argument has no defining operation and does not match.
 */
export class OpResultOpConstraint implements Constraint {
  readonly reads: readonly AnyVariable[];
  readonly binds: readonly AnyVariable[];

  constructor(
    private readonly value: ValueVariable | OpResultVariable,
    private readonly target: OperationVariable
  ) {
    this.reads = [value];
    this.binds = [target];
  }

  check(ctx: MatchContext): boolean {
    const value = this.value.get(ctx);
    if (value === undefined || value.kind === 'blockArg') return false;
    return this.target.set(ctx, value.op);
  }

  describe(): string {
    return `${this.target} = defining op of ${this.value}`;
  }
}
