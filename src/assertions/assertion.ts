/**
 * Assertion: an immutable boolean expression over leaf expectations.
 *
 * Trees are built from single-leaf assertions (see `AssertionLayer.matches`)
 * with `and`, `or` and `negate`. Combinators share their operands' nodes, so
 * a leaf used in two trees is the same leaf: satisfying or resetting it is
 * visible through both. `repeat()` is the way to get an independent copy.
 *
 * @example
 * ```typescript
 * const started = layer.matches('server started');
 * const failed = layer.matchesPattern(/^error:/);
 * const healthy = and(started, negate(failed));
 *
 * layer.deliver('server started');
 * healthy.assert(); // passes
 * ```
 */

import { AssertionFailedError } from '../errors';
import {
  AssertionNode,
  LeafNode,
  evaluateNode,
  forEachLeaf,
  mapLeaves,
} from './nodes';
import { RenderOptions, renderNode } from './render';

export class Assertion {
  constructor(
    readonly node: AssertionNode,
    readonly presentation: RenderOptions = {}
  ) {}

  /**
   * Current value of the expression. Never throws for an unsatisfied tree.
   */
  evaluate(): boolean {
    return evaluateNode(this.node);
  }

  /**
   * @throws AssertionFailedError carrying the rendered tree when it evaluates false
   */
  assert(label?: string): void {
    if (this.evaluate()) {
      return;
    }
    throw AssertionFailedError.fromRendering(
      this.render(),
      this.render({ color: false }),
      label
    );
  }

  /**
   * Clear every reachable leaf and re-enrol the satisfied ones for matching.
   */
  reset(): void {
    forEachLeaf(this.node, leaf => {
      leaf.registry.reset(leaf.id);
    });
  }

  /**
   * Same structure, every leaf replaced by a fresh pending leaf with the same spec.
   */
  repeat(): Assertion {
    return new Assertion(mapLeaves(this.node, freshLeaf), this.presentation);
  }

  /**
   * A single leaf is cloned into a fresh pending leaf; a composite tree is
   * shared as-is.
   */
  clone(): Assertion {
    if (this.node.kind === 'leaf') {
      return new Assertion(freshLeaf(this.node), this.presentation);
    }
    return new Assertion(this.node, this.presentation);
  }

  and(other: Assertion): Assertion {
    return and(this, other);
  }

  or(other: Assertion): Assertion {
    return or(this, other);
  }

  not(): Assertion {
    return negate(this);
  }

  /** Ids of the leaves in the tree, left to right, one entry per occurrence. */
  leafIds(): number[] {
    const ids: number[] = [];
    forEachLeaf(this.node, leaf => {
      ids.push(leaf.id);
    });
    return ids;
  }

  render(options: RenderOptions = {}): string {
    return renderNode(this.node, { ...this.presentation, ...options });
  }

  toString(): string {
    return this.render({ color: false });
  }
}

function freshLeaf(leaf: LeafNode): LeafNode {
  const spec = leaf.registry.leaf(leaf.id).spec;
  const fresh = leaf.registry.declare(spec);
  return { kind: 'leaf', registry: leaf.registry, id: fresh.id };
}

export function and(left: Assertion, right: Assertion): Assertion {
  return new Assertion({ kind: 'and', left: left.node, right: right.node }, left.presentation);
}

export function or(left: Assertion, right: Assertion): Assertion {
  return new Assertion({ kind: 'or', left: left.node, right: right.node }, left.presentation);
}

export function negate(child: Assertion): Assertion {
  return new Assertion({ kind: 'not', child: child.node }, child.presentation);
}

/**
 * Left fold of `and` over one or more assertions.
 */
export function allOf(first: Assertion, ...rest: Assertion[]): Assertion {
  return rest.reduce((acc, next) => and(acc, next), first);
}

/**
 * Left fold of `or` over one or more assertions.
 */
export function anyOf(first: Assertion, ...rest: Assertion[]): Assertion {
  return rest.reduce((acc, next) => or(acc, next), first);
}
