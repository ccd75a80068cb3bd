/**
 * AssertionLayer: the public facade over one expectation registry.
 *
 * Test code declares expectations through the layer and the event pipeline
 * hands every event payload to `deliver()`. An expectation only observes
 * payloads delivered after it was declared.
 *
 * @example
 * ```typescript
 * const layer = new AssertionLayer();
 * const two = layer.matches('two');
 *
 * layer.deliver('one');
 * two.evaluate(); // false
 * layer.deliver('two');
 * two.assert(); // passes
 *
 * // Declared after the payload was delivered: not satisfied.
 * layer.matches('two').evaluate(); // false
 * ```
 */

import { Assertion } from './assertions/assertion';
import { AssertionLayerOptions, ResolvedLayerOptions, resolveLayerOptions } from './config';
import { ExpectationRegistry } from './expectations/registry';
import { MatchSpec, debugLiteral, describeSpec, literal, pattern } from './expectations/match-spec';
import { AssertionSink, AssertionSinkOptions } from './tracing/assertion-sink';

export type LogLevel = 'debug' | 'warn';

export class AssertionLayer {
  readonly registry: ExpectationRegistry;
  private readonly options: ResolvedLayerOptions;

  constructor(options: AssertionLayerOptions = {}) {
    this.options = resolveLayerOptions(options);
    this.registry = new ExpectationRegistry({
      onDeclare: leaf => this.log('debug', `declared #${leaf.id} ${describeSpec(leaf.spec)}`),
    });
    this.registry.setOverride(!this.options.enabled);
  }

  /**
   * Expect a payload exactly equal to `value`.
   */
  matches(value: string): Assertion {
    return this.declare(literal(value));
  }

  /**
   * Expect a payload equal to `value` as formatted by `util.inspect`
   * (strings are taken verbatim).
   */
  debugMatches(value: unknown): Assertion {
    return this.declare(debugLiteral(value));
  }

  /**
   * Expect a payload the regular expression finds a match in.
   *
   * @throws InvalidPatternError when the pattern does not compile
   */
  matchesPattern(source: string | RegExp, flags?: string): Assertion {
    return this.declare(pattern(source, flags));
  }

  declare(spec: MatchSpec): Assertion {
    const leaf = this.registry.declare(spec);
    return new Assertion(
      { kind: 'leaf', registry: this.registry, id: leaf.id },
      { color: this.options.color }
    );
  }

  /**
   * Offer one event payload to every pending expectation.
   *
   * @returns Number of expectations the payload satisfied
   */
  deliver(payload: string): number {
    const satisfied = this.registry.dispatch(payload);
    if (satisfied > 0) {
      this.log('debug', `${JSON.stringify(payload)} satisfied ${satisfied} expectation(s)`);
    }
    return satisfied;
  }

  /**
   * Restore per-leaf evaluation.
   */
  enable(): void {
    this.registry.setOverride(false);
  }

  /**
   * Make every expectation of this layer read as satisfied. Latches and the
   * pending list are left untouched, so `enable()` restores them as they were.
   */
  disable(): void {
    this.registry.setOverride(true);
  }

  isEnabled(): boolean {
    return !this.registry.isOverridden();
  }

  get pendingCount(): number {
    return this.registry.pendingCount;
  }

  /**
   * A TraceSink that delivers the payload of each emitted event to this layer.
   */
  sink(options: AssertionSinkOptions = {}): AssertionSink {
    return new AssertionSink(this, options);
  }

  log(level: LogLevel, message: string): void {
    const line = `[${this.options.name}] ${message}`;
    if (level === 'warn') {
      console.warn(line);
    } else if (this.options.verbose) {
      console.debug(line);
    }
  }
}
