import { describeSpec } from '../expectations/match-spec';
import { AssertionNode, leafValue } from './nodes';

export const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
} as const;

export interface RenderOptions {
  /** Wrap each leaf in green (satisfied) or red (unsatisfied) escapes. Default true. */
  color?: boolean;
}

function paint(text: string, satisfied: boolean, color: boolean): string {
  if (!color) {
    return text;
  }
  return `${satisfied ? COLORS.green : COLORS.red}${text}${COLORS.reset}`;
}

/**
 * Render the tree as infix text reflecting its current state.
 *
 * Leaves show their match spec; `&&` and `||` are always parenthesized and
 * negation is a `!` prefix, e.g. `(("a" && "b") || !/c+/)`.
 */
export function renderNode(node: AssertionNode, options: RenderOptions = {}): string {
  const color = options.color ?? true;
  switch (node.kind) {
    case 'leaf': {
      const leaf = node.registry.leaf(node.id);
      const satisfied = leafValue(node.registry.isOverridden(), node.registry, node.id);
      return paint(describeSpec(leaf.spec), satisfied, color);
    }
    case 'and':
      return `(${renderNode(node.left, options)} && ${renderNode(node.right, options)})`;
    case 'or':
      return `(${renderNode(node.left, options)} || ${renderNode(node.right, options)})`;
    case 'not':
      return `!${renderNode(node.child, options)}`;
  }
}
