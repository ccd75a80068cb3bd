/**
 * Event-driven assertions for log and trace output.
 *
 * Declare what should be emitted, let the code under test run, then assert.
 * Expectations are latched as events arrive, so checking them never
 * re-scans earlier output.
 *
 * Main exports:
 * - AssertionLayer: declares expectations and receives event payloads
 * - Assertion, and, or, negate: boolean expressions over expectations
 * - AssertionSink: TraceSink adapter that feeds a layer from a trace pipeline
 *
 * Error Handling
 * --------------
 *
 * - `AssertionFailedError`: an asserted expression was not satisfied; the
 *   message shows every expectation in the expression
 * - `InvalidPatternError`: `matchesPattern()` got a pattern that does not compile
 * - `RegistryPoisonedError`: internal bookkeeping failed earlier; the layer
 *   must be discarded
 */

export { AssertionLayer, LogLevel } from './layer';
export { AssertionLayerOptions, AssertionLayerOptionsSchema } from './config';

export {
  Assertion,
  and,
  or,
  negate,
  allOf,
  anyOf,
  AssertionNode,
  RenderOptions,
  COLORS,
} from './assertions';

export {
  ExpectationRegistry,
  LeafExpectation,
  MatchSpec,
  LiteralSpec,
  PatternSpec,
  literal,
  debugLiteral,
  pattern,
  describeSpec,
} from './expectations';

export { TraceSink } from './tracing/sink';
export { TraceEvent, TraceEventSchema } from './tracing/types';
export {
  AssertionSink,
  AssertionSinkOptions,
  PayloadExtractor,
  extractMessage,
} from './tracing/assertion-sink';

export {
  AssertionFailedError,
  InvalidPatternError,
  InvalidOptionsError,
  InvariantViolationError,
  RegistryPoisonedError,
} from './errors';
