/**
 * Expression tree nodes and their evaluation.
 *
 * Nodes are immutable and store no boolean of their own: the value of a tree
 * is a pure function of its leaves' latches (and their registries' override
 * switches) at the time it is read.
 */

import { ExpectationRegistry } from '../expectations/registry';

export interface LeafNode {
  readonly kind: 'leaf';
  readonly registry: ExpectationRegistry;
  readonly id: number;
}

export interface AndNode {
  readonly kind: 'and';
  readonly left: AssertionNode;
  readonly right: AssertionNode;
}

export interface OrNode {
  readonly kind: 'or';
  readonly left: AssertionNode;
  readonly right: AssertionNode;
}

export interface NotNode {
  readonly kind: 'not';
  readonly child: AssertionNode;
}

export type AssertionNode = LeafNode | AndNode | OrNode | NotNode;

/**
 * Value of a single leaf. The override is passed in rather than read from
 * ambient state so every caller states which switch it honours.
 */
export function leafValue(overridden: boolean, registry: ExpectationRegistry, id: number): boolean {
  return overridden ? true : registry.leaf(id).satisfied;
}

export function evaluateNode(node: AssertionNode): boolean {
  switch (node.kind) {
    case 'leaf':
      return leafValue(node.registry.isOverridden(), node.registry, node.id);
    case 'and': {
      // Both sides are always read.
      const left = evaluateNode(node.left);
      const right = evaluateNode(node.right);
      return left && right;
    }
    case 'or': {
      const left = evaluateNode(node.left);
      const right = evaluateNode(node.right);
      return left || right;
    }
    case 'not':
      return !evaluateNode(node.child);
  }
}

/**
 * Visit every leaf reachable from `node`, left to right. A leaf shared by
 * several branches is visited once per occurrence.
 */
export function forEachLeaf(node: AssertionNode, visit: (leaf: LeafNode) => void): void {
  switch (node.kind) {
    case 'leaf':
      visit(node);
      return;
    case 'and':
    case 'or':
      forEachLeaf(node.left, visit);
      forEachLeaf(node.right, visit);
      return;
    case 'not':
      forEachLeaf(node.child, visit);
      return;
  }
}

/**
 * Rebuild `node` with `replace` applied to every leaf.
 */
export function mapLeaves(
  node: AssertionNode,
  replace: (leaf: LeafNode) => LeafNode
): AssertionNode {
  switch (node.kind) {
    case 'leaf':
      return replace(node);
    case 'and':
      return {
        kind: 'and',
        left: mapLeaves(node.left, replace),
        right: mapLeaves(node.right, replace),
      };
    case 'or':
      return {
        kind: 'or',
        left: mapLeaves(node.left, replace),
        right: mapLeaves(node.right, replace),
      };
    case 'not':
      return { kind: 'not', child: mapLeaves(node.child, replace) };
  }
}
