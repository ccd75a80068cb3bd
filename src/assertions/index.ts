export { Assertion, and, or, negate, allOf, anyOf } from './assertion';
export { AssertionNode, LeafNode, AndNode, OrNode, NotNode, evaluateNode } from './nodes';
export { RenderOptions, COLORS, renderNode } from './render';
