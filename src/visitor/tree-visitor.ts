import { childrenOf } from '../tree/structure.js';
import type { QueryNode } from '../tree/types.js';
import {
  descend,
  resolveWalkerConfig,
  rootContext,
  type ResolvedWalkerConfig,
  type TraversalContext,
  type WalkerOptions,
} from './context.js';
import { createHandlerTable, resolveHandler, type HandlerMap, type HandlerTable } from './dispatch.js';

export type VisitorHandlers<R, C extends object = Record<string, unknown>> = HandlerMap<
  TraversalContext<C>,
  TreeVisitor<R, C>,
  R
>;

export interface TreeVisitorOptions<R, C extends object = Record<string, unknown>> extends WalkerOptions {
  handlers?: VisitorHandlers<R, C>;
}

/**
 * Read-only, depth-first traversal of a query tree.
 *
 * Each node is dispatched to the most specific handler registered for
 * its kind or one of its abstract types; nodes without one go to
 * genericVisit, which yields nothing and recurses into the children.
 * Results come only from handlers, so a visitor without handlers yields
 * an empty sequence.
 *
 * @example
 * const terms = new TreeVisitor<string>({
 *   handlers: {
 *     *term(node) { yield node.value; },
 *   },
 * });
 * [...terms.visit(tree)]
 */
export class TreeVisitor<R = unknown, C extends object = Record<string, unknown>> {
  protected readonly config: ResolvedWalkerConfig;
  private readonly table: HandlerTable<TraversalContext<C>, TreeVisitor<R, C>, R>;

  constructor(options: TreeVisitorOptions<R, C> = {}) {
    this.config = resolveWalkerConfig(options);
    this.table = createHandlerTable(options.handlers ?? {});
  }

  /** Lazily yields the results of visiting `tree`. Each call starts a fresh traversal. */
  *visit(tree: QueryNode, context?: C): Generator<R, void, undefined> {
    yield* this.visitNode(tree, rootContext<C>(context, this.config));
  }

  /** Visits `tree` to completion and returns every result in order. */
  collect(tree: QueryNode, context?: C): R[] {
    return [...this.visit(tree, context)];
  }

  visitNode(node: QueryNode, context: TraversalContext<C>): Iterable<R> {
    const resolved = resolveHandler(this.table, node);
    this.config.onDispatch?.(node, resolved?.type ?? null);
    if (resolved === undefined) {
      return this.genericVisit(node, context);
    }
    return resolved.handle(node, context, this);
  }

  /**
   * Structural fallback: yields nothing of its own and visits every
   * child in order. Handlers call it through their `visitor` argument to
   * continue into the subtree.
   */
  *genericVisit(node: QueryNode, context: TraversalContext<C>): Generator<R, void, undefined> {
    for (const [index, child] of childrenOf(node).entries()) {
      yield* this.visitNode(child, this.childContext(node, index, context));
    }
  }

  childContext(node: QueryNode, index: number, context: TraversalContext<C>): TraversalContext<C> {
    return descend(node, index, context, this.config);
  }
}
