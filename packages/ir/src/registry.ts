/**
 * Dialect registry - maps operation names to their definitions
 *
 * Built once at startup by whoever assembles a tool, then handed to the
 * collaborators (parsers, builders) that need name lookup. There is no
 * process-wide instance and no unregistration.
 */

import { createOperation, type Dialect, type OpDefinition } from './definition.js';
import { DuplicateDefinitionError, UnknownOperationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { Operation } from './operation.js';
import type { OperationInit } from './types.js';

export class DialectRegistry {
  private readonly definitions = new Map<string, OpDefinition>();
  private readonly dialects = new Map<string, Dialect>();
  private readonly logger: Logger;

  constructor(dialects: readonly Dialect[] = [], logger: Logger = createLogger('registry')) {
    this.logger = logger;
    for (const dialect of dialects) this.loadDialect(dialect);
  }

  /**
   * Register every operation of a dialect. Loading the same dialect object twice is a no-op.
   */
  loadDialect(dialect: Dialect): void {
    const existing = this.dialects.get(dialect.name);
    if (existing === dialect) return;

    for (const definition of dialect.operations) this.register(definition);
    this.dialects.set(dialect.name, dialect);
    this.logger.debug('dialect loaded', { dialect: dialect.name, operations: dialect.operations.length });
  }

  register(definition: OpDefinition): void {
    if (this.definitions.has(definition.name)) {
      throw new DuplicateDefinitionError(definition.name);
    }
    this.definitions.set(definition.name, definition);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  lookup(name: string): OpDefinition | undefined {
    return this.definitions.get(name);
  }

  get(name: string): OpDefinition {
    const definition = this.definitions.get(name);
    if (definition === undefined) {
      throw new UnknownOperationError(name);
    }
    return definition;
  }

  /**
   * Build an operation of a registered kind by name
   */
  create(name: string, init: OperationInit = {}): Operation {
    return createOperation(this.get(name), init);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  loadedDialects(): string[] {
    return [...this.dialects.keys()];
  }
}
