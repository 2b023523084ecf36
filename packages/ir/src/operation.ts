/**
 * Operation - the single node kind of the IR graph
 */

import { toAttributeMap, type Attribute } from './attributes.js';
import type { Block } from './block.js';
import type { OpDefinition } from './definition.js';
import { IRStructureError } from './errors.js';
import { describeOperation, describeValue } from './references.js';
import type { Region } from './region.js';
import type { AbortableVisitor, OperationInit, Visitor } from './types.js';
import { OpResult, type Value } from './values.js';

export class Operation {
  readonly definition: OpDefinition;
  readonly results: readonly OpResult[];
  readonly attributes: Map<string, Attribute>;

  private readonly operandList: Value[] = [];
  private readonly successorList: Block[];
  private readonly regionList: Region[];
  private parentBlock: Block | null = null;

  constructor(definition: OpDefinition, init: OperationInit = {}) {
    const regions = [...(init.regions ?? [])];
    // validated before any use or parent link is created
    regions.forEach((region, i) => {
      if (region.parent !== null) {
        throw new IRStructureError(
          `cannot attach a region to '${definition.name}': it already belongs to ${describeOperation(region.parent)}`
        );
      }
      if (regions.indexOf(region) !== i) {
        throw new IRStructureError(`cannot attach the same region to '${definition.name}' twice`);
      }
    });

    this.definition = definition;
    this.attributes = toAttributeMap(init.attributes);

    for (const operand of init.operands ?? []) {
      this.operandList.push(operand);
      operand.addUse({ operation: this, index: this.operandList.length - 1 });
    }

    // Result indices are fixed for the lifetime of the operation
    this.results = Object.freeze((init.resultTypes ?? []).map((type, i) => new OpResult(type, this, i)));
    this.successorList = [...(init.successors ?? [])];

    this.regionList = regions;
    for (const region of regions) region.setParent(this);
  }

  get name(): string {
    return this.definition.name;
  }

  get operands(): readonly Value[] {
    return this.operandList;
  }

  get successors(): readonly Block[] {
    return this.successorList;
  }

  get regions(): readonly Region[] {
    return this.regionList;
  }

  /** First result, if any */
  get result(): OpResult | undefined {
    return this.results[0];
  }

  /** First region, if any */
  get region(): Region | undefined {
    return this.regionList[0];
  }

  get parent(): Block | null {
    return this.parentBlock;
  }

  get parentOp(): Operation | null {
    return this.parentBlock?.parent?.parent ?? null;
  }

  get resultTypes(): Attribute[] {
    return this.results.map(r => r.type);
  }

  isa(definition: OpDefinition): boolean {
    return this.definition === definition;
  }

  /**
   * Operand by slot name (from the definition) or position
   */
  operand(field: string | number): Value | undefined {
    const index = slotIndex(this.definition.operands, field);
    return index >= 0 ? this.operandList[index] : undefined;
  }

  /**
   * Result by slot name (from the definition) or position
   */
  resultField(field: string | number): OpResult | undefined {
    const index = slotIndex(this.definition.results, field);
    return index >= 0 ? this.results[index] : undefined;
  }

  /** @internal maintained by Block */
  setParent(block: Block | null): void {
    this.parentBlock = block;
  }

  setOperand(index: number, value: Value): void {
    const previous = this.operandList[index];
    if (previous === undefined) {
      throw new IRStructureError(`${describeOperation(this)} has no operand #${index}`);
    }
    if (previous === value) return;
    previous.removeUse(this, index);
    this.operandList[index] = value;
    value.addUse({ operation: this, index });
  }

  setSuccessor(index: number, block: Block): void {
    if (index < 0 || index >= this.successorList.length) {
      throw new IRStructureError(`${describeOperation(this)} has no successor #${index}`);
    }
    this.successorList[index] = block;
  }

  setAttribute(name: string, value: Attribute): void {
    this.attributes.set(name, value);
  }

  removeAttribute(name: string): boolean {
    return this.attributes.delete(name);
  }

  /**
   * Detach all regions from this operation and hand them to the caller
   */
  detachRegions(): Region[] {
    const regions = this.regionList.splice(0, this.regionList.length);
    for (const region of regions) region.setParent(null);
    return regions;
  }

  /**
   * Remove this operation's operands from the use-lists of the values they reference
   */
  dropAllReferences(): void {
    this.operandList.forEach((operand, index) => operand.removeUse(this, index));
    this.operandList.length = 0;
    this.successorList.length = 0;
  }

  /**
   * Unlink from the parent block without touching use-lists
   */
  detach(): this {
    this.parentBlock?.detachOp(this);
    return this;
  }

  /**
   * Unlink and drop every reference held by this operation and its nested operations.
   * Fails when a result is still used outside the erased subtree.
   */
  erase(): void {
    const subtree = new Set<Operation>();
    this.walk(op => subtree.add(op));

    for (const op of subtree) {
      for (const result of op.results) {
        const outside = result.uses.filter(use => !subtree.has(use.operation));
        if (outside.length > 0) {
          throw new IRStructureError(
            `cannot erase ${describeOperation(this)}: ${describeValue(result)} still has ${outside.length} use(s)`
          );
        }
      }
    }

    this.detach();
    for (const op of subtree) op.dropAllReferences();
  }

  isAncestorOf(other: Operation): boolean {
    let current = other.parentOp;
    while (current !== null) {
      if (current === this) return true;
      current = current.parentOp;
    }
    return false;
  }

  /**
   * Pre-order: this operation, then every nested operation depth-first
   */
  walk(visitor: Visitor): void {
    visitor(this);
    for (const region of [...this.regionList]) region.walk(visitor);
  }

  /**
   * Like walk, but the visitor can return 'stop'. Returns true when the walk completed.
   */
  walkAbortable(visitor: AbortableVisitor): boolean {
    if (visitor(this) === 'stop') return false;
    for (const region of [...this.regionList]) {
      if (!region.walkAbortable(visitor)) return false;
    }
    return true;
  }

  /**
   * Run the kind's verify hook on this operation and every nested one
   */
  verify(): void {
    this.walk(op => op.definition.verify?.(op));
  }

  toString(): string {
    return describeOperation(this);
  }
}

/**
 * Resolve a named or positional slot to an index (-1 when unknown)
 */
function slotIndex(names: readonly string[], field: string | number): number {
  return typeof field === 'number' ? field : names.indexOf(field);
}
