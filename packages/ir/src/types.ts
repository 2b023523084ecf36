/**
 * @irkit/ir - Core IR
 *
 * Shared shapes for the mutable SSA graph: operations own regions, regions own
 * blocks, blocks own arguments and operations. Only operand and successor
 * references point across that tree.
 */

import type { Attribute } from './attributes.js';
import type { Block } from './block.js';
import type { OpDefinition } from './definition.js';
import type { Operation } from './operation.js';
import type { Region } from './region.js';
import type { Value } from './values.js';

/**
 * What a walk visitor returns to keep going or halt the traversal
 */
export type WalkControl = 'advance' | 'stop';

export type Visitor = (op: Operation) => void;

export type AbortableVisitor = (op: Operation) => WalkControl;

/**
 * A single operand slot referencing a value
 */
export interface Use {
  readonly operation: Operation;
  readonly index: number;
}

/**
 * Everything needed to build an operation of any kind
 */
export interface OperationInit {
  operands?: readonly Value[];
  resultTypes?: readonly Attribute[];
  attributes?: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>;
  successors?: readonly Block[];
  regions?: readonly Region[];
}

/**
 * Operation factory: any registered kind is constructible from an init record
 */
export type OperationFactory = (definition: OpDefinition, init: OperationInit) => Operation;

/**
 * Anything carrying a name and an attribute map (mutable or immutable operations)
 */
export interface AttributeHolder {
  readonly name: string;
  readonly attributes: ReadonlyMap<string, Attribute>;
}
