/**
 * @irkit/ir - Intermediate Representation
 *
 * Mutable SSA graph: operations, values, blocks, regions and attributes,
 * plus the registry, configuration and logging shared by the other packages.
 */

export * from './types.js';
export {
  Attr,
  Types,
  attrEquals,
  attrToString,
  attributeMapsEqual,
  isAttribute,
  isAttributeOfKind,
  toAttributeMap,
  getAttr,
  getAttrOfKind,
  getIntAttr,
  getStringAttr,
  getBoolAttr,
  getTypeAttr,
  getArrayAttr,
} from './attributes.js';
export type { Attribute, AttributeKind, AttributeOf } from './attributes.js';
export { OpResult, BlockArgument, isValue } from './values.js';
export type { Value } from './values.js';
export { Operation } from './operation.js';
export { Block } from './block.js';
export { Region } from './region.js';
export { defineOp, defineDialect, createOperation } from './definition.js';
export type { OpDefinition, OpDefinitionOptions, Dialect } from './definition.js';
export { DialectRegistry } from './registry.js';
export { describeOperation, describeBlock, describeValue, operationPath } from './references.js';
export {
  IRError,
  IRStructureError,
  VerifyError,
  AttributeKindError,
  DuplicateDefinitionError,
  UnknownOperationError,
  UnhandledCaseError,
  assertNever,
} from './errors.js';
export { ConfigService, parseLogLevel } from './config.js';
export { Logger, LogLevel, createLogger } from './logger.js';
export type { LogMetadata, LogSink } from './logger.js';
