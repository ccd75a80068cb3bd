export { ExpectationRegistry, RegistryOptions } from './registry';
export { LeafExpectation } from './leaf';
export {
  MatchSpec,
  LiteralSpec,
  PatternSpec,
  literal,
  debugLiteral,
  pattern,
  matchesPayload,
  describeSpec,
} from './match-spec';
