export * from './tree/index.js';
export { TreeVisitor } from './visitor/tree-visitor.js';
export type { TreeVisitorOptions, VisitorHandlers } from './visitor/tree-visitor.js';
export { TreeTransformer } from './visitor/tree-transformer.js';
export type { TreeTransformerOptions, TransformerHandlers } from './visitor/tree-transformer.js';
export { DEFAULT_MAX_DEPTH, TRAVERSAL } from './visitor/context.js';
export type {
  TraversalContext,
  TraversalState,
  TraversalPosition,
  WalkerOptions,
  DispatchListener,
} from './visitor/context.js';
export type { NodeHandler, HandlerMap } from './visitor/dispatch.js';
export { TransformArityError, NodeArityError, TraversalDepthError } from './errors.js';
