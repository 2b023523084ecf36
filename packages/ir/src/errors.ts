/**
 * IR error types
 *
 * Messages carry stable, printable node references (see references.ts) so a
 * failure reads the same on every run.
 */

/**
 * Base class for every error raised by the IR packages
 */
export class IRError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IRError';
  }
}

/**
 * Ownership or use-list invariant would be broken by the requested change
 */
export class IRStructureError extends IRError {
  constructor(message: string) {
    super(message);
    this.name = 'IRStructureError';
  }
}

/**
 * A kind's verification hook rejected an operation
 */
export class VerifyError extends IRError {
  constructor(
    message: string,
    public readonly reference: string
  ) {
    super(`${message} (${reference})`);
    this.name = 'VerifyError';
  }
}

export class AttributeKindError extends IRError {
  constructor(
    public readonly holder: string,
    public readonly attribute: string,
    public readonly expected: string,
    public readonly actual: string | undefined
  ) {
    super(
      actual === undefined
        ? `operation '${holder}' has no attribute '${attribute}' (expected ${expected})`
        : `attribute '${attribute}' of '${holder}' is ${actual}, expected ${expected}`
    );
    this.name = 'AttributeKindError';
  }
}

export class DuplicateDefinitionError extends IRError {
  constructor(public readonly operationName: string) {
    super(`operation '${operationName}' is already registered`);
    this.name = 'DuplicateDefinitionError';
  }
}

export class UnknownOperationError extends IRError {
  constructor(public readonly operationName: string) {
    super(`operation '${operationName}' is not registered`);
    this.name = 'UnknownOperationError';
  }
}

/**
 * A closed enumeration reached a case nobody handled
 */
export class UnhandledCaseError extends IRError {
  constructor(
    public readonly context: string,
    public readonly value: unknown
  ) {
    super(`unhandled case in ${context}: ${describeUnknown(value)}`);
    this.name = 'UnhandledCaseError';
  }
}

/**
 * Exhaustiveness check for switch statements over closed unions
 */
export function assertNever(value: never, context: string): never {
  throw new UnhandledCaseError(context, value);
}

function describeUnknown(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return `kind ${String(value.kind)}`;
  }
  return typeof value === 'bigint' ? `${value}n` : String(value);
}
