import type { Operation } from '@irkit/ir';
import type { RewritePattern } from './pattern.js';
import type { PatternRewriter } from './rewriter.js';

/**
 * Tries patterns in order and stops at the first one that mutates the IR
 */
export class GreedyRewritePatternApplier implements RewritePattern {
  readonly patterns: readonly RewritePattern[];

  constructor(patterns: readonly RewritePattern[]) {
    this.patterns = [...patterns];
  }

  matchAndRewrite(op: Operation, rewriter: PatternRewriter): void {
    for (const pattern of this.patterns) {
      pattern.matchAndRewrite(op, rewriter);
      if (rewriter.hasDone) return;
    }
  }
}
