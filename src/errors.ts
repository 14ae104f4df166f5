import type { NodeKind } from './tree/types.js';

export class TransformArityError extends Error {
  override readonly name = 'TransformArityError';

  constructor(
    readonly count: number,
    message?: string,
  ) {
    super(message ?? `The transformation did not produce exactly one result (got ${count})`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NodeArityError extends Error {
  override readonly name = 'NodeArityError';

  constructor(
    readonly kind: NodeKind,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`A ${kind} node takes exactly ${expected} ${expected === 1 ? 'child' : 'children'}, got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TraversalDepthError extends Error {
  override readonly name = 'TraversalDepthError';

  constructor(readonly maxDepth: number) {
    super(`Tree is nested deeper than the configured maxDepth of ${maxDepth}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
