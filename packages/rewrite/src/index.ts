/**
 * @irkit/rewrite - Pattern Rewriting
 *
 * Patterns mutate the IR through a PatternRewriter; the walker drives them
 * to a fixpoint and passes chain walkers into pipelines.
 */

export { UnsupportedOperationError } from './errors.js';
export { PatternRewriter } from './rewriter.js';
export type { RewriteListener } from './rewriter.js';
export { opRewritePattern, QueryRewritePattern } from './pattern.js';
export type { RewritePattern } from './pattern.js';
export { GreedyRewritePatternApplier } from './applier.js';
export { PatternRewriteWalker } from './walker.js';
export type { RewriteWalkerOptions, RewriteResult } from './walker.js';
export { PatternRewritePass, PassPipeline } from './pass.js';
export type { ModulePass, PassPipelineOptions } from './pass.js';
