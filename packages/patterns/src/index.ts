/**
 * @irkit/patterns - Constraint Matcher
 *
 * Declarative queries over the IR: typed binding variables, composable
 * constraints, and a matcher producing complete binding sets.
 */

export { QueryDefinitionError } from './errors.js';
export {
  MatchContext,
  Variable,
  OperationVariable,
  AttributeVariable,
  ValueVariable,
  OpResultVariable,
  bindableEquals,
} from './variables.js';
export type { Bindable, VariableKind, AnyVariable } from './variables.js';
export {
  TypeConstraint,
  ValueTypeConstraint,
  OperationAttributeConstraint,
  OperationOperandConstraint,
  OperationResultConstraint,
  EqConstraint,
  AttributeValueConstraint,
  OpResultOpConstraint,
} from './constraints.js';
export type { Constraint } from './constraints.js';
export { Query, Match } from './query.js';
export { preorder, findAll, findFirst, findAllOfKind, countOps } from './traversal.js';
