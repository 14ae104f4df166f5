import { TraversalDepthError } from '../errors.js';
import type { NodeType, QueryNode } from '../tree/types.js';

/**
 * Key of the walker-owned position in every context. A symbol, so no
 * caller key can collide with it.
 */
export const TRAVERSAL: unique symbol = Symbol('query-tree.traversal');

export interface TraversalPosition {
  /** Distance from the root; the root is 0. */
  readonly depth: number;
  /** Child indices leading from the root to the node. Only with `trackPaths`; `[]` at the root. */
  readonly path?: readonly number[];
}

/**
 * What the walkers maintain in every context. `parents` and `newParents`
 * are the only string keys they write; everything else belongs to the caller.
 */
export interface TraversalState {
  readonly [TRAVERSAL]: TraversalPosition;
  /** Strict ancestors, root first, immediate parent last. Only with `trackParents`; absent at the root. */
  readonly parents?: readonly QueryNode[];
  /**
   * TreeTransformer only, with `trackNewParents`: ancestors as they were
   * handed to `rebuild` when descent into their children began.
   */
  readonly newParents?: readonly QueryNode[];
}

/** What a handler sees: the caller's keys, possibly missing, plus the traversal state. */
export type TraversalContext<C extends object> = Partial<C> & TraversalState;

export const DEFAULT_MAX_DEPTH = 1000;

export type DispatchListener = (node: QueryNode, handlerType: NodeType | null) => void;

export interface WalkerOptions {
  /** Record the ancestor chain under `parents`. Default false. */
  trackParents?: boolean;
  /** Record child indices from the root under `context[TRAVERSAL].path`. Default false. */
  trackPaths?: boolean;
  /** Deepest level the walker descends to before failing. Default 1000. */
  maxDepth?: number;
  /** Called for every node, with the handler type chosen or null for the structural fallback. */
  onDispatch?: DispatchListener;
  /** Log every dispatch to the console when no onDispatch is given. */
  debug?: boolean;
}

export interface ResolvedWalkerConfig {
  trackParents: boolean;
  trackNewParents: boolean;
  trackPaths: boolean;
  maxDepth: number;
  onDispatch?: DispatchListener;
}

export function resolveWalkerConfig(
  options: WalkerOptions & { trackNewParents?: boolean },
): ResolvedWalkerConfig {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  const onDispatch: DispatchListener | undefined =
    options.onDispatch ??
    (options.debug === true
      ? (node, handlerType) => {
          console.debug(`[query-tree] ${node.kind} -> ${handlerType ?? 'generic'}`);
        }
      : undefined);

  return {
    trackParents: options.trackParents ?? false,
    trackNewParents: options.trackNewParents ?? false,
    trackPaths: options.trackPaths ?? false,
    maxDepth,
    ...(onDispatch !== undefined ? { onDispatch } : {}),
  };
}

export function rootContext<C extends object>(
  context: Partial<C> | undefined,
  config: ResolvedWalkerConfig,
): TraversalContext<C> {
  const base: Partial<C> = context ?? {};
  const position: TraversalPosition = { depth: 0, ...(config.trackPaths ? { path: [] } : {}) };
  return { ...base, [TRAVERSAL]: position };
}

/**
 * Context for the child at `index` of `parent`: the parent's context with
 * the traversal state advanced one level.
 *
 * @throws TraversalDepthError past the configured maxDepth
 */
export function descend<C extends object>(
  parent: QueryNode,
  index: number,
  context: TraversalContext<C>,
  config: ResolvedWalkerConfig,
): TraversalContext<C> {
  const current = context[TRAVERSAL];
  const depth = current.depth + 1;
  if (depth > config.maxDepth) {
    throw new TraversalDepthError(config.maxDepth);
  }

  const position: TraversalPosition = {
    depth,
    ...(config.trackPaths ? { path: [...(current.path ?? []), index] } : {}),
  };
  return {
    ...context,
    [TRAVERSAL]: position,
    ...(config.trackParents ? { parents: [...(context.parents ?? []), parent] } : {}),
    ...(config.trackNewParents ? { newParents: [...(context.newParents ?? []), parent] } : {}),
  };
}
