import { IRError, describeOperation, type Operation } from '@irkit/ir';

/**
 * A dialect-specific pattern met an operation it has no lowering for
 */
export class UnsupportedOperationError extends IRError {
  readonly reference: string;

  constructor(
    public readonly operation: Operation,
    public readonly detail: string
  ) {
    const reference = describeOperation(operation);
    super(`cannot lower ${reference}: ${detail}`);
    this.name = 'UnsupportedOperationError';
    this.reference = reference;
  }
}
