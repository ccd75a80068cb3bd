/**
 * Match specifications: the rule a leaf expectation applies to each payload.
 */

import { inspect } from 'util';
import { InvalidPatternError } from '../errors';

/**
 * Exact string equality with the payload.
 */
export interface LiteralSpec {
  readonly kind: 'literal';
  readonly value: string;
}

/**
 * Regular-expression search over the payload.
 */
export interface PatternSpec {
  readonly kind: 'pattern';
  readonly source: string;
  readonly flags: string;
  readonly regex: RegExp;
}

export type MatchSpec = LiteralSpec | PatternSpec;

// `g` and `y` make RegExp.test() depend on lastIndex left over from the previous payload.
const STATEFUL_FLAGS = /[gy]/g;

export function literal(value: string): LiteralSpec {
  return { kind: 'literal', value };
}

/**
 * Format an arbitrary value into a literal spec, the way it would appear
 * when the value itself is logged with `util.inspect`.
 *
 * Strings are used as-is rather than quoted.
 */
export function debugLiteral(value: unknown): LiteralSpec {
  if (typeof value === 'string') {
    return literal(value);
  }
  return literal(inspect(value, { depth: null, breakLength: Infinity }));
}

/**
 * Compile a pattern spec.
 *
 * @throws InvalidPatternError when the source or flags do not compile
 */
export function pattern(input: string | RegExp, flags?: string): PatternSpec {
  const source = typeof input === 'string' ? input : input.source;
  const requested = flags ?? (typeof input === 'string' ? '' : input.flags);
  const effective = requested.replace(STATEFUL_FLAGS, '');

  let regex: RegExp;
  try {
    regex = new RegExp(source, effective);
  } catch (e) {
    throw InvalidPatternError.fromSyntax(source, requested, e);
  }
  return { kind: 'pattern', source, flags: effective, regex };
}

export function matchesPayload(spec: MatchSpec, payload: string): boolean {
  switch (spec.kind) {
    case 'literal':
      return spec.value === payload;
    case 'pattern':
      return spec.regex.test(payload);
  }
}

/**
 * Human-readable form used by diagnostics. Patterns use the compiled source,
 * in which `/` is escaped.
 */
export function describeSpec(spec: MatchSpec): string {
  switch (spec.kind) {
    case 'literal':
      return JSON.stringify(spec.value);
    case 'pattern':
      return `/${spec.regex.source}/${spec.flags}`;
  }
}
