import { IRError } from '@irkit/ir';

/**
 * A sealed container or node was asked to change
 */
export class ImmutabilityError extends IRError {
  constructor(message: string) {
    super(message);
    this.name = 'ImmutabilityError';
  }
}

/**
 * Conversion met a value or block that is not in the active correspondence map
 */
export class UnresolvedReferenceError extends IRError {
  constructor(
    public readonly reference: string,
    public readonly user: string
  ) {
    super(`unresolved reference to ${reference} from ${user}`);
    this.name = 'UnresolvedReferenceError';
  }
}
