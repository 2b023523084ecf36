/**
 * Binding variables
 *
 * A variable is a named slot in a match context. Setting an already bound
 * variable succeeds only when the new value equals the bound one:
 * attributes compare structurally, IR nodes by identity.
 */

import { Operation, OpResult, attrEquals, isAttribute, isValue, type Attribute, type Value } from '@irkit/ir';

export type Bindable = Operation | Attribute | Value;

export type VariableKind = 'operation' | 'attribute' | 'value' | 'opResult';

export class MatchContext {
  private readonly bindings = new Map<string, Bindable>();

  lookup(name: string): Bindable | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  bind(name: string, value: Bindable): void {
    this.bindings.set(name, value);
  }

  entries(): [string, Bindable][] {
    return [...this.bindings];
  }
}

export abstract class Variable<T extends Bindable> {
  abstract readonly kind: VariableKind;

  constructor(public readonly name: string) {}

  protected abstract accepts(value: Bindable): value is T;

  protected abstract same(a: T, b: T): boolean;

  get(ctx: MatchContext): T | undefined {
    const bound = ctx.lookup(this.name);
    return bound !== undefined && this.accepts(bound) ? bound : undefined;
  }

  /**
   * Bind `value`, or check it against the existing binding. False on a
   * conflict or when the value is of the wrong kind for this variable.
   */
  set(ctx: MatchContext, value: Bindable): boolean {
    if (!this.accepts(value)) return false;

    const existing = ctx.lookup(this.name);
    if (existing === undefined) {
      ctx.bind(this.name, value);
      return true;
    }
    return this.accepts(existing) && this.same(existing, value);
  }

  toString(): string {
    return `${this.kind} '${this.name}'`;
  }
}

export class OperationVariable extends Variable<Operation> {
  readonly kind = 'operation';

  protected accepts(value: Bindable): value is Operation {
    return value instanceof Operation;
  }

  protected same(a: Operation, b: Operation): boolean {
    return a === b;
  }
}

export class AttributeVariable extends Variable<Attribute> {
  readonly kind = 'attribute';

  protected accepts(value: Bindable): value is Attribute {
    return isAttribute(value);
  }

  protected same(a: Attribute, b: Attribute): boolean {
    return attrEquals(a, b);
  }
}

export class ValueVariable extends Variable<Value> {
  readonly kind = 'value';

  protected accepts(value: Bindable): value is Value {
    return isValue(value);
  }

  protected same(a: Value, b: Value): boolean {
    return a === b;
  }
}

export class OpResultVariable extends Variable<OpResult> {
  readonly kind = 'opResult';

  protected accepts(value: Bindable): value is OpResult {
    return value instanceof OpResult;
  }

  protected same(a: OpResult, b: OpResult): boolean {
    return a === b;
  }
}

export type AnyVariable = OperationVariable | AttributeVariable | ValueVariable | OpResultVariable;

/**
 * Equality used when two variables are compared with each other
 */
export function bindableEquals(a: Bindable, b: Bindable): boolean {
  if (isAttribute(a)) return isAttribute(b) && attrEquals(a, b);
  return a === b;
}
