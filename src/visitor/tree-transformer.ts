import { TransformArityError } from '../errors.js';
import { childrenOf, withChildren } from '../tree/structure.js';
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

export type TransformerHandlers<C extends object = Record<string, unknown>> = HandlerMap<
  TraversalContext<C>,
  TreeTransformer<C>,
  QueryNode
>;

export interface TreeTransformerOptions<C extends object = Record<string, unknown>> extends WalkerOptions {
  handlers?: TransformerHandlers<C>;
  /** Record, under `newParents`, each ancestor as handed to `rebuild`. Default false. */
  trackNewParents?: boolean;
}

/**
 * Rebuilds a query tree bottom-up.
 *
 * A handler yields the replacement(s) for its node: nothing deletes it,
 * one node replaces it, several nodes take its place side by side in the
 * parent. Nodes without a handler are rebuilt by genericVisit from their
 * children's replacements, keeping every other attribute.
 */
export class TreeTransformer<C extends object = Record<string, unknown>> {
  protected readonly config: ResolvedWalkerConfig;
  private readonly table: HandlerTable<TraversalContext<C>, TreeTransformer<C>, QueryNode>;

  constructor(options: TreeTransformerOptions<C> = {}) {
    this.config = resolveWalkerConfig(options);
    this.table = createHandlerTable(options.handlers ?? {});
  }

  /**
   * Transforms `tree` and returns the new root.
   *
   * @throws TransformArityError unless the root yields exactly one node
   */
  visit(tree: QueryNode, context?: C): QueryNode {
    const [root, ...rest] = this.visitNode(tree, rootContext<C>(context, this.config));
    if (root === undefined || rest.length > 0) {
      throw new TransformArityError(root === undefined ? 0 : rest.length + 1);
    }
    return root;
  }

  /** Replacements for `node`, in order. May be empty or hold several nodes. */
  visitNode(node: QueryNode, context: TraversalContext<C>): QueryNode[] {
    const resolved = resolveHandler(this.table, node);
    this.config.onDispatch?.(node, resolved?.type ?? null);
    if (resolved === undefined) {
      return [...this.genericVisit(node, context)];
    }
    return [...resolved.handle(node, context, this)];
  }

  /** Structural fallback: the node rebuilt from its transformed children. */
  genericVisit(node: QueryNode, context: TraversalContext<C>): Iterable<QueryNode> {
    return [this.rebuild(node, context)];
  }

  /**
   * Transforms every child of `node` and splices the replacements, in
   * child order, into a copy of `node`. Handlers call this to run the
   * default rebuild and then inspect the result.
   *
   * @throws NodeArityError when the replacements do not fit a fixed-arity node
   */
  rebuild(node: QueryNode, context: TraversalContext<C>): QueryNode {
    const children = childrenOf(node);
    if (children.length === 0) return node;

    const replaced = children.flatMap((child, index) =>
      this.visitNode(child, this.childContext(node, index, context)),
    );
    return withChildren(node, replaced);
  }

  childContext(node: QueryNode, index: number, context: TraversalContext<C>): TraversalContext<C> {
    return descend(node, index, context, this.config);
  }
}
