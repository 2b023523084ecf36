/**
 * Attributes - immutable, structurally compared values attached to operations
 * or used as the type of a value.
 */

import { AttributeKindError, assertNever } from './errors.js';
import type { AttributeHolder } from './types.js';

export type Attribute =
  | { readonly kind: 'int'; readonly value: bigint; readonly width: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'unit' }
  | { readonly kind: 'array'; readonly elements: readonly Attribute[] }
  | { readonly kind: 'type'; readonly name: string; readonly params: readonly Attribute[] }
  | { readonly kind: 'symbol'; readonly name: string }
  | { readonly kind: 'dict'; readonly entries: readonly (readonly [string, Attribute])[] }
  | { readonly kind: 'opaque'; readonly dialect: string; readonly name: string; readonly data: string };

export type AttributeKind = Attribute['kind'];

export type AttributeOf<K extends AttributeKind> = Extract<Attribute, { kind: K }>;

const ATTRIBUTE_KINDS: ReadonlySet<string> = new Set<AttributeKind>([
  'int', 'float', 'string', 'bool', 'unit', 'array', 'type', 'symbol', 'dict', 'opaque',
]);

/**
 * Attribute constructors. Every attribute is frozen on creation.
 */
export const Attr = {
  int: (value: bigint | number, width = 64): AttributeOf<'int'> =>
    Object.freeze({ kind: 'int', value: BigInt(value), width }),
  float: (value: number): AttributeOf<'float'> => Object.freeze({ kind: 'float', value }),
  string: (value: string): AttributeOf<'string'> => Object.freeze({ kind: 'string', value }),
  bool: (value: boolean): AttributeOf<'bool'> => Object.freeze({ kind: 'bool', value }),
  unit: (): AttributeOf<'unit'> => UNIT,
  array: (elements: readonly Attribute[]): AttributeOf<'array'> =>
    Object.freeze({ kind: 'array', elements: Object.freeze([...elements]) }),
  type: (name: string, params: readonly Attribute[] = []): AttributeOf<'type'> =>
    Object.freeze({ kind: 'type', name, params: Object.freeze([...params]) }),
  symbol: (name: string): AttributeOf<'symbol'> => Object.freeze({ kind: 'symbol', name }),
  dict: (entries: Iterable<readonly [string, Attribute]>): AttributeOf<'dict'> =>
    Object.freeze({
      kind: 'dict',
      entries: Object.freeze([...entries].map(([key, value]) => Object.freeze([key, value] as const))),
    }),
  opaque: (dialect: string, name: string, data: string): AttributeOf<'opaque'> =>
    Object.freeze({ kind: 'opaque', dialect, name, data }),
};

const UNIT: AttributeOf<'unit'> = Object.freeze({ kind: 'unit' });

/**
 * Common value types
 */
export const Types = {
  i1: Attr.type('i1'),
  i32: Attr.type('i32'),
  i64: Attr.type('i64'),
  index: Attr.type('index'),
  f64: Attr.type('f64'),
  none: Attr.type('none'),
};

export function isAttribute(value: unknown): value is Attribute {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    ATTRIBUTE_KINDS.has(value.kind) &&
    // Operations and values are classes; attributes are plain records
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Structural equality
 */
export function attrEquals(a: Attribute, b: Attribute): boolean {
  if (a === b) return true;

  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && a.value === b.value && a.width === b.width;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'unit':
      return b.kind === 'unit';
    case 'array':
      return b.kind === 'array' && listEquals(a.elements, b.elements);
    case 'type':
      return b.kind === 'type' && a.name === b.name && listEquals(a.params, b.params);
    case 'symbol':
      return b.kind === 'symbol' && a.name === b.name;
    case 'dict':
      return (
        b.kind === 'dict' &&
        a.entries.length === b.entries.length &&
        a.entries.every(([key, value], i) => {
          const other = b.entries[i];
          return other !== undefined && other[0] === key && attrEquals(value, other[1]);
        })
      );
    case 'opaque':
      return b.kind === 'opaque' && a.dialect === b.dialect && a.name === b.name && a.data === b.data;
    default:
      return assertNever(a, 'attrEquals');
  }
}

function listEquals(a: readonly Attribute[], b: readonly Attribute[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === undefined || y === undefined || !attrEquals(x, y)) return false;
  }
  return true;
}

export function attributeMapsEqual(
  a: ReadonlyMap<string, Attribute>,
  b: ReadonlyMap<string, Attribute>
): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !attrEquals(value, other)) return false;
  }
  return true;
}

/**
 * Deterministic textual form, used in diagnostics
 */
export function attrToString(attr: Attribute): string {
  switch (attr.kind) {
    case 'int':
      return `${attr.value} : i${attr.width}`;
    case 'float':
      return String(attr.value);
    case 'string':
      return JSON.stringify(attr.value);
    case 'bool':
      return attr.value ? 'true' : 'false';
    case 'unit':
      return 'unit';
    case 'array':
      return `[${attr.elements.map(attrToString).join(', ')}]`;
    case 'type':
      return attr.params.length === 0
        ? attr.name
        : `${attr.name}<${attr.params.map(attrToString).join(', ')}>`;
    case 'symbol':
      return `@${attr.name}`;
    case 'dict':
      return `{${attr.entries.map(([key, value]) => `${key} = ${attrToString(value)}`).join(', ')}}`;
    case 'opaque':
      return `#${attr.dialect}.${attr.name}<${JSON.stringify(attr.data)}>`;
    default:
      return assertNever(attr, 'attrToString');
  }
}

/**
 * Copy an attribute record or map into an ordered, owned map
 */
export function toAttributeMap(
  attributes: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>> | undefined
): Map<string, Attribute> {
  if (attributes === undefined) return new Map();
  if (isAttributeMap(attributes)) return new Map(attributes);
  return new Map(Object.entries(attributes));
}

function isAttributeMap(
  attributes: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>
): attributes is ReadonlyMap<string, Attribute> {
  return typeof attributes.get === 'function';
}

// Typed accessors

export function getAttr(holder: AttributeHolder, name: string): Attribute {
  const attr = holder.attributes.get(name);
  if (attr === undefined) {
    throw new AttributeKindError(holder.name, name, 'any attribute', undefined);
  }
  return attr;
}

export function getAttrOfKind<K extends AttributeKind>(
  holder: AttributeHolder,
  name: string,
  kind: K
): AttributeOf<K> {
  const attr = holder.attributes.get(name);
  if (attr === undefined) {
    throw new AttributeKindError(holder.name, name, kind, undefined);
  }
  if (!isAttributeOfKind(attr, kind)) {
    throw new AttributeKindError(holder.name, name, kind, attr.kind);
  }
  return attr;
}

export function isAttributeOfKind<K extends AttributeKind>(attr: Attribute, kind: K): attr is AttributeOf<K> {
  return attr.kind === kind;
}

export function getIntAttr(holder: AttributeHolder, name: string): bigint {
  return getAttrOfKind(holder, name, 'int').value;
}

export function getStringAttr(holder: AttributeHolder, name: string): string {
  return getAttrOfKind(holder, name, 'string').value;
}

export function getBoolAttr(holder: AttributeHolder, name: string): boolean {
  return getAttrOfKind(holder, name, 'bool').value;
}

export function getTypeAttr(holder: AttributeHolder, name: string): AttributeOf<'type'> {
  return getAttrOfKind(holder, name, 'type');
}

export function getArrayAttr(holder: AttributeHolder, name: string): readonly Attribute[] {
  return getAttrOfKind(holder, name, 'array').elements;
}
