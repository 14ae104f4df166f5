import { ancestryOf, isNodeType } from '../tree/hierarchy.js';
import type { NodeKind, NodeType, NodeTypeMap, QueryNode } from '../tree/types.js';

/**
 * Handles one node. Yields whatever the walker collects for it: arbitrary
 * results for a TreeVisitor, replacement nodes for a TreeTransformer.
 */
export type NodeHandler<N extends QueryNode, Ctx, W, R> = (
  node: N,
  context: Ctx,
  walker: W,
) => Iterable<R>;

/**
 * Handlers keyed by concrete kind or abstract type. A handler registered
 * under an abstract type (e.g. `baseOperation`) receives every node
 * descending from it that has no more specific handler.
 */
export type HandlerMap<Ctx, W, R> = {
  readonly [T in NodeType]?: NodeHandler<NodeTypeMap[T], Ctx, W, R>;
};

export interface ResolvedHandler<Ctx, W, R> {
  /** The name the handler was registered under. */
  readonly type: NodeType;
  readonly handle: NodeHandler<QueryNode, Ctx, W, R>;
}

export interface HandlerTable<Ctx, W, R> {
  readonly handlers: HandlerMap<Ctx, W, R>;
  /** Resolution per concrete kind; null records "no handler, use the fallback". */
  readonly resolved: Map<NodeKind, ResolvedHandler<Ctx, W, R> | null>;
}

/** Snapshots `handlers`: later changes to the caller's object do not reach the table. */
export function createHandlerTable<Ctx, W, R>(handlers: HandlerMap<Ctx, W, R>): HandlerTable<Ctx, W, R> {
  return { handlers: { ...handlers }, resolved: new Map() };
}

function bindHandler<T extends NodeType, Ctx, W, R>(
  handlers: HandlerMap<Ctx, W, R>,
  type: T,
): ResolvedHandler<Ctx, W, R> | undefined {
  const handler = handlers[type];
  if (handler === undefined) return undefined;
  return {
    type,
    handle: (node, context, walker) => {
      // Unreachable through resolveHandler, which binds only types from the
      // node's own ancestry; the guard narrows `node` to the handler's type.
      if (!isNodeType(node, type)) {
        throw new TypeError(`Handler registered for "${type}" cannot take a "${node.kind}" node`);
      }
      return handler(node, context, walker);
    },
  };
}

/**
 * Finds the most specific handler for `node` by walking its declared
 * ancestry, most specific first. Returns undefined when nothing matches.
 */
export function resolveHandler<Ctx, W, R>(
  table: HandlerTable<Ctx, W, R>,
  node: QueryNode,
): ResolvedHandler<Ctx, W, R> | undefined {
  const cached = table.resolved.get(node.kind);
  if (cached !== undefined) return cached ?? undefined;

  let found: ResolvedHandler<Ctx, W, R> | null = null;
  for (const type of ancestryOf(node.kind)) {
    const bound = bindHandler(table.handlers, type);
    if (bound !== undefined) {
      found = bound;
      break;
    }
  }
  table.resolved.set(node.kind, found);
  return found ?? undefined;
}
