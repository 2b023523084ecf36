/**
 * PatternRewriteWalker - worklist-driven fixpoint driver
 *
 * Seeds a FIFO worklist with every operation nested under the root in
 * pre-order, then applies the pattern to one operation at a time. Mutations
 * reported by the rewriter put exactly the affected operations back on the
 * worklist:
 *
 * - inserted operations and everything nested in them
 * - users of values that were replaced or operations whose operands or attributes changed
 * - producers of the operands of an erased operation
 *
 * An operation already waiting is never queued twice, and erased operations
 * are dropped.
 */

import { ConfigService, createLogger, describeOperation, type Logger, type Operation, type Value } from '@irkit/ir';
import type { RewritePattern } from './pattern.js';
import { PatternRewriter, type RewriteListener } from './rewriter.js';

export interface RewriteWalkerOptions {
  /** Run verify hooks on the root once the fixpoint is reached (default from IRKIT_VERIFY_AFTER_REWRITE) */
  verifyAfterRewrite?: boolean;
  /** Log every applied pattern at debug level (default from IRKIT_TRACE_REWRITES) */
  traceRewrites?: boolean;
  logger?: Logger;
}

export interface RewriteResult {
  /** Whether any pattern mutated the IR */
  changed: boolean;
  rewrites: number;
  /** Pattern invocations */
  visits: number;
}

class Worklist {
  private readonly queue: Operation[] = [];
  private readonly pending = new Set<Operation>();
  private head = 0;

  push(op: Operation): void {
    if (this.pending.has(op)) return;
    this.pending.add(op);
    this.queue.push(op);
  }

  remove(op: Operation): void {
    this.pending.delete(op);
  }

  pop(): Operation | undefined {
    while (this.head < this.queue.length) {
      const op = this.queue[this.head++];
      // drop the consumed prefix once it outweighs the live part
      if (this.head * 2 > this.queue.length) {
        this.queue.splice(0, this.head);
        this.head = 0;
      }
      // stale entries were removed or already re-queued further back
      if (this.pending.delete(op)) return op;
    }
    return undefined;
  }
}

export class PatternRewriteWalker {
  private readonly verifyAfterRewrite: boolean;
  private readonly traceRewrites: boolean;
  private readonly logger: Logger;

  constructor(
    readonly pattern: RewritePattern,
    options: RewriteWalkerOptions = {}
  ) {
    const config = ConfigService.getInstance();
    this.verifyAfterRewrite = options.verifyAfterRewrite ?? config.verifyAfterRewrite;
    this.traceRewrites = options.traceRewrites ?? config.traceRewrites;
    this.logger = options.logger ?? createLogger('rewrite');
  }

  /**
   * Apply the pattern until no operation under `root` changes.
   * The root itself is never handed to the pattern.
   */
  rewriteModule(root: Operation): RewriteResult {
    const worklist = new Worklist();
    root.walk(op => {
      if (op !== root) worklist.push(op);
    });

    const listener: RewriteListener = {
      operationInserted: op => op.walk(nested => worklist.push(nested)),
      operationModified: op => worklist.push(op),
      operationErased: (op, operands) => {
        worklist.remove(op);
        for (const producer of definingOps(operands)) worklist.push(producer);
      },
    };

    let rewrites = 0;
    let visits = 0;

    for (let op = worklist.pop(); op !== undefined; op = worklist.pop()) {
      if (!root.isAncestorOf(op)) continue;

      visits++;
      // trace before the pattern runs: the matched op may be gone afterwards
      const reference = this.traceRewrites ? describeOperation(op) : '';
      const rewriter = new PatternRewriter(op, listener);
      this.pattern.matchAndRewrite(op, rewriter);

      if (rewriter.hasDone) {
        rewrites++;
        if (this.traceRewrites) this.logger.debug('pattern applied', { op: reference });
      }
    }

    if (this.verifyAfterRewrite) root.verify();

    this.logger.debug('rewrite finished', { rewrites, visits });
    return { changed: rewrites > 0, rewrites, visits };
  }
}

function definingOps(values: readonly Value[]): Operation[] {
  const ops: Operation[] = [];
  for (const value of values) {
    if (value.kind === 'result') ops.push(value.op);
  }
  return ops;
}
