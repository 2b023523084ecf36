/**
 * Position-based description of a module, for comparing two graphs
 * without comparing identities
 */

import { attrToString, type Block, type Operation, type Value } from '@irkit/ir';

export function shapeOf(root: Operation): string[] {
  const opIds = new Map<Operation, number>();
  const blockIds = new Map<Block, number>();

  root.walk(op => {
    opIds.set(op, opIds.size);
    for (const region of op.regions) {
      for (const block of region.blocks) blockIds.set(block, blockIds.size);
    }
  });

  const valueRef = (value: Value): string =>
    value.kind === 'result'
      ? `%${opIds.get(value.op) ?? '?'}#${value.index}`
      : `^${blockIds.get(value.block) ?? '?'}#${value.index}`;

  const lines: string[] = [];
  root.walk(op => {
    const attributes = [...op.attributes].map(([key, value]) => `${key}=${attrToString(value)}`);
    const regions = op.regions.map(region =>
      region.blocks.map(block => `^${blockIds.get(block) ?? '?'}(${block.argTypes.map(attrToString).join(',')})`).join(' ')
    );
    lines.push(
      [
        op.name,
        `(${op.operands.map(valueRef).join(', ')})`,
        `-> [${op.resultTypes.map(attrToString).join(', ')}]`,
        `{${attributes.join(', ')}}`,
        `succ [${op.successors.map(block => `^${blockIds.get(block) ?? '?'}`).join(', ')}]`,
        `regions [${regions.join(' | ')}]`,
      ].join(' ')
    );
  });
  return lines;
}
