/**
 * Query - ordered variables and constraints anchored at a root operation
 *
 * Constraints run strictly in the order they were added and the first
 * failing one ends the match. A constraint may only read variables bound by
 * the root or by a constraint added before it; anything else is rejected
 * when the constraint is added.
 *
 * ```typescript
 * const q = Query.root(AddiOp);
 * const lhs = q.operandOf(q.root, 'lhs');
 * const producer = q.definingOp(lhs, 'producer');
 * q.isa(producer, ConstantOp);
 *
 * for (const m of q.matches(module)) {
 *   console.log(m.get(producer).name);
 * }
 * ```
 */

import type { Attribute, OpDefinition, Operation } from '@irkit/ir';
import {
  AttributeValueConstraint,
  EqConstraint,
  OpResultOpConstraint,
  OperationAttributeConstraint,
  OperationOperandConstraint,
  OperationResultConstraint,
  TypeConstraint,
  ValueTypeConstraint,
  type Constraint,
} from './constraints.js';
import { QueryDefinitionError } from './errors.js';
import { preorder } from './traversal.js';
import {
  AttributeVariable,
  MatchContext,
  OpResultVariable,
  OperationVariable,
  ValueVariable,
  type AnyVariable,
  type Bindable,
  type Variable,
} from './variables.js';

export class Query {
  readonly root: OperationVariable;

  private readonly variableMap = new Map<string, AnyVariable>();
  private readonly constraintList: Constraint[] = [];
  private readonly bound = new Set<AnyVariable>();

  private constructor(rootName: string) {
    this.root = this.operation(rootName);
    this.bound.add(this.root);
  }

  /**
   * A query whose root must be an operation of `definition`
   */
  static root(definition: OpDefinition, rootName = 'root'): Query {
    const query = new Query(rootName);
    query.where(new TypeConstraint(query.root, definition));
    return query;
  }

  get variables(): AnyVariable[] {
    return [...this.variableMap.values()];
  }

  get constraints(): readonly Constraint[] {
    return this.constraintList;
  }

  // Variable declaration. Declaring a name again returns the same variable.

  operation(name: string): OperationVariable {
    return this.declare(name, 'operation', () => new OperationVariable(name), v => v.kind === 'operation' ? v : undefined);
  }

  attribute(name: string): AttributeVariable {
    return this.declare(name, 'attribute', () => new AttributeVariable(name), v => v.kind === 'attribute' ? v : undefined);
  }

  value(name: string): ValueVariable {
    return this.declare(name, 'value', () => new ValueVariable(name), v => v.kind === 'value' ? v : undefined);
  }

  opResult(name: string): OpResultVariable {
    return this.declare(name, 'opResult', () => new OpResultVariable(name), v => v.kind === 'opResult' ? v : undefined);
  }

  /**
   * Append a constraint. Its variables must already be bound by an earlier one.
   */
  where(constraint: Constraint): this {
    for (const variable of constraint.reads) {
      if (this.variableMap.get(variable.name) !== variable) {
        throw new QueryDefinitionError(`${constraint.describe()}: ${variable} is not declared by this query`);
      }
      if (!this.bound.has(variable)) {
        throw new QueryDefinitionError(`${constraint.describe()}: reads ${variable} before any constraint binds it`);
      }
    }
    for (const variable of constraint.binds) {
      if (this.variableMap.get(variable.name) !== variable) {
        throw new QueryDefinitionError(`${constraint.describe()}: ${variable} is not declared by this query`);
      }
      this.bound.add(variable);
    }
    this.constraintList.push(constraint);
    return this;
  }

  // Constraint helpers

  isa(operation: OperationVariable, definition: OpDefinition): this {
    return this.where(new TypeConstraint(operation, definition));
  }

  hasType(value: ValueVariable | OpResultVariable, type: Attribute): this {
    return this.where(new ValueTypeConstraint(value, type));
  }

  equal(left: AnyVariable, right: AnyVariable): this {
    return this.where(new EqConstraint(left, right));
  }

  attributeEquals(attribute: AttributeVariable, expected: Attribute): this {
    return this.where(new AttributeValueConstraint(attribute, expected));
  }

  attributeOf(operation: OperationVariable, attribute: string, name = `${operation.name}.${attribute}`): AttributeVariable {
    const target = this.attribute(name);
    this.where(new OperationAttributeConstraint(operation, attribute, target));
    return target;
  }

  operandOf(operation: OperationVariable, field: string | number, name = `${operation.name}.${field}`): ValueVariable {
    const target = this.value(name);
    this.where(new OperationOperandConstraint(operation, field, target));
    return target;
  }

  resultOf(operation: OperationVariable, field: string | number, name = `${operation.name}.${field}`): OpResultVariable {
    const target = this.opResult(name);
    this.where(new OperationResultConstraint(operation, field, target));
    return target;
  }

  definingOp(value: ValueVariable | OpResultVariable, name: string): OperationVariable {
    const target = this.operation(name);
    this.where(new OpResultOpConstraint(value, target));
    return target;
  }

  /**
   * Match against one operation. Undefined when a constraint fails or a
   * declared variable is left unbound.
   */
  match(op: Operation): Match | undefined {
    const ctx = new MatchContext();
    this.root.set(ctx, op);

    for (const constraint of this.constraintList) {
      if (!constraint.check(ctx)) return undefined;
    }
    for (const variable of this.variableMap.values()) {
      if (!ctx.has(variable.name)) return undefined;
    }
    return new Match(op, ctx);
  }

  /**
   * One match per operation under `module` (itself included), pre-order.
   * Each call is a fresh scan.
   */
  *matches(module: Operation): Generator<Match> {
    for (const op of preorder(module)) {
      const found = this.match(op);
      if (found !== undefined) yield found;
    }
  }

  private declare<V extends AnyVariable>(
    name: string,
    kind: AnyVariable['kind'],
    create: () => V,
    narrow: (existing: AnyVariable) => V | undefined
  ): V {
    const existing = this.variableMap.get(name);
    if (existing === undefined) {
      const variable = create();
      this.variableMap.set(name, variable);
      return variable;
    }
    const same = narrow(existing);
    if (same === undefined) {
      throw new QueryDefinitionError(`'${name}' is already declared as ${existing.kind}, not ${kind}`);
    }
    return same;
  }
}

/**
 * Complete binding set of a successful match
 */
export class Match {
  constructor(
    readonly op: Operation,
    private readonly ctx: MatchContext
  ) {}

  get<T extends Bindable>(variable: Variable<T>): T {
    const value = variable.get(this.ctx);
    if (value === undefined) {
      throw new QueryDefinitionError(`${variable} is not bound by this match`);
    }
    return value;
  }

  get names(): string[] {
    return this.ctx.entries().map(([name]) => name);
  }

  toRecord(): Record<string, Bindable> {
    return Object.fromEntries(this.ctx.entries());
  }
}
