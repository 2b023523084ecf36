/**
 * Module passes and a pipeline running them in order
 */

import { createLogger, type Logger, type Operation } from '@irkit/ir';
import { GreedyRewritePatternApplier } from './applier.js';
import type { RewritePattern } from './pattern.js';
import { PatternRewriteWalker, type RewriteResult, type RewriteWalkerOptions } from './walker.js';

export interface ModulePass {
  readonly name: string;
  apply(module: Operation): void;
}

/**
 * Pass that drives a list of patterns to a fixpoint, first match wins
 */
export class PatternRewritePass implements ModulePass {
  private readonly walker: PatternRewriteWalker;
  private last: RewriteResult | undefined;

  constructor(
    readonly name: string,
    patterns: readonly RewritePattern[],
    options: RewriteWalkerOptions = {}
  ) {
    this.walker = new PatternRewriteWalker(new GreedyRewritePatternApplier(patterns), options);
  }

  /** Outcome of the most recent run */
  get lastResult(): RewriteResult | undefined {
    return this.last;
  }

  apply(module: Operation): void {
    this.last = this.walker.rewriteModule(module);
  }
}

export interface PassPipelineOptions {
  /** Run verify hooks after every pass */
  verifyEach?: boolean;
  logger?: Logger;
}

export class PassPipeline {
  private readonly passes: ModulePass[];
  private readonly verifyEach: boolean;
  private readonly logger: Logger;

  constructor(passes: readonly ModulePass[] = [], options: PassPipelineOptions = {}) {
    this.passes = [...passes];
    this.verifyEach = options.verifyEach ?? false;
    this.logger = options.logger ?? createLogger('pipeline');
  }

  get passNames(): string[] {
    return this.passes.map(pass => pass.name);
  }

  add(pass: ModulePass): this {
    this.passes.push(pass);
    return this;
  }

  run(module: Operation): void {
    for (const pass of this.passes) {
      this.logger.info('pass started', { pass: pass.name });
      try {
        pass.apply(module);
        if (this.verifyEach) module.verify();
      } catch (error) {
        if (error instanceof Error) this.logger.error('pass failed', error, { pass: pass.name });
        throw error;
      }
      this.logger.info('pass finished', { pass: pass.name });
    }
  }
}
