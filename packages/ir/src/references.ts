/**
 * Stable, printable references to IR nodes
 *
 * A node is named by its position along the ownership tree, never by memory
 * identity: `/0.0.2` is operation 2 of block 0 of region 0 of the root.
 * A `~` segment marks a detached block or region.
 */

import type { Block } from './block.js';
import type { Operation } from './operation.js';
import type { Value } from './values.js';

function operationSegments(op: Operation): string[] {
  const segments: string[] = [];
  let current: Operation = op;

  for (;;) {
    const block = current.parent;
    if (block === null) return segments;

    const opIndex = block.indexOf(current);
    const region = block.parent;
    if (region === null) {
      segments.unshift(`~.${opIndex}`);
      return segments;
    }

    const blockIndex = region.indexOf(block);
    const owner = region.parent;
    if (owner === null) {
      segments.unshift(`~.${blockIndex}.${opIndex}`);
      return segments;
    }

    segments.unshift(`${owner.regions.indexOf(region)}.${blockIndex}.${opIndex}`);
    current = owner;
  }
}

export function operationPath(op: Operation): string {
  return `/${operationSegments(op).join('/')}`;
}

export function describeOperation(op: Operation): string {
  return `'${op.name}' at ${operationPath(op)}`;
}

export function describeBlock(block: Block): string {
  const region = block.parent;
  if (region === null) return `detached block (${block.args.length} args)`;

  const blockIndex = region.indexOf(block);
  const owner = region.parent;
  if (owner === null) return `block ~.${blockIndex}`;

  const segments = [...operationSegments(owner), `${owner.regions.indexOf(region)}.${blockIndex}`];
  return `block /${segments.join('/')}`;
}

export function describeValue(value: Value): string {
  return value.kind === 'result'
    ? `result #${value.index} of ${describeOperation(value.op)}`
    : `argument #${value.index} of ${describeBlock(value.block)}`;
}
