import { IRError } from '@irkit/ir';

/**
 * A query was put together wrongly: a constraint reads a variable nothing
 * bound before it, a name is reused for a different kind of variable, or a
 * match is asked for a variable the query never declared.
 */
export class QueryDefinitionError extends IRError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryDefinitionError';
  }
}
