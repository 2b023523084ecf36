import type { OpDefinition, Operation } from '@irkit/ir';
import type { Match, Query } from '@irkit/patterns';
import type { PatternRewriter } from './rewriter.js';

/**
 * A local transformation: inspect `op` and, if it applies, mutate through the rewriter.
 * A pattern that does not apply leaves the rewriter untouched.
 */
export interface RewritePattern {
  matchAndRewrite(op: Operation, rewriter: PatternRewriter): void;
}

/**
 * Pattern that only runs on operations of one kind
 */
export function opRewritePattern(
  definition: OpDefinition,
  rewrite: (op: Operation, rewriter: PatternRewriter) => void
): RewritePattern {
  return {
    matchAndRewrite(op, rewriter) {
      if (op.isa(definition)) rewrite(op, rewriter);
    },
  };
}

/**
 * Pattern driven by a declarative query: the rewrite runs with the complete
 * binding set whenever the query matches.
 */
export class QueryRewritePattern implements RewritePattern {
  constructor(
    readonly query: Query,
    private readonly rewrite: (match: Match, rewriter: PatternRewriter) => void
  ) {}

  matchAndRewrite(op: Operation, rewriter: PatternRewriter): void {
    const found = this.query.match(op);
    if (found !== undefined) this.rewrite(found, rewriter);
  }
}
