/**
 * Operation kinds and dialects
 *
 * The core never decides what an operation means. A definition is only a
 * kind tag with named operand/result slots and an optional verify hook.
 */

import { Operation } from './operation.js';
import type { OperationInit } from './types.js';

export interface OpDefinition {
  readonly name: string;
  /** Names of the fixed operand slots, in order */
  readonly operands: readonly string[];
  /** Names of the fixed result slots, in order */
  readonly results: readonly string[];
  readonly summary?: string;
  /** Throws a VerifyError when the operation is malformed */
  readonly verify?: (op: Operation) => void;
}

export interface OpDefinitionOptions {
  operands?: readonly string[];
  results?: readonly string[];
  summary?: string;
  verify?: (op: Operation) => void;
}

export function defineOp(name: string, options: OpDefinitionOptions = {}): OpDefinition {
  return Object.freeze({
    name,
    operands: Object.freeze([...(options.operands ?? [])]),
    results: Object.freeze([...(options.results ?? [])]),
    ...(options.summary !== undefined ? { summary: options.summary } : {}),
    ...(options.verify !== undefined ? { verify: options.verify } : {}),
  });
}

/**
 * The factory contract every kind satisfies
 */
export function createOperation(definition: OpDefinition, init: OperationInit = {}): Operation {
  return new Operation(definition, init);
}

export interface Dialect {
  readonly name: string;
  readonly operations: readonly OpDefinition[];
}

export function defineDialect(name: string, operations: readonly OpDefinition[]): Dialect {
  return Object.freeze({ name, operations: Object.freeze([...operations]) });
}
