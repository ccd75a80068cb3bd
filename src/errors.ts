/**
 * Error types raised by the assertion engine.
 *
 * - `AssertionFailedError`: an asserted expression evaluated false
 * - `InvalidPatternError`: a pattern expectation could not be compiled
 * - `InvalidOptionsError`: layer or sink options failed validation
 * - `InvariantViolationError`: internal bookkeeping is broken
 * - `RegistryPoisonedError`: a registry refuses work after a failed critical section
 */

/**
 * Raised by `Assertion.assert()` when the expression is not satisfied.
 *
 * `rendered` carries the coloured form of the expression at the moment of
 * failure, `plain` the same rendering without escape codes.
 */
export class AssertionFailedError extends Error {
  constructor(
    message: string,
    public readonly rendered: string,
    public readonly plain: string,
    public readonly label?: string
  ) {
    super(message);
    this.name = 'AssertionFailedError';
  }

  static fromRendering(rendered: string, plain: string, label?: string): AssertionFailedError {
    const prefix = label ? `assertion '${label}' failed` : 'assertion failed';
    return new AssertionFailedError(`${prefix}: ${plain}`, rendered, plain, label);
  }
}

export class InvalidPatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
    public readonly detail: string
  ) {
    super(message);
    this.name = 'InvalidPatternError';
  }

  static fromSyntax(pattern: string, flags: string, cause: unknown): InvalidPatternError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const shown = flags ? `/${pattern}/${flags}` : `/${pattern}/`;
    return new InvalidPatternError(`invalid pattern ${shown}: ${detail}`, pattern, detail);
  }
}

export class InvalidOptionsError extends Error {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`invalid ${subject} options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class RegistryPoisonedError extends Error {
  readonly original: Error;

  constructor(original: Error) {
    super(`expectation registry is poisoned: ${original.message}`);
    this.name = 'RegistryPoisonedError';
    this.original = original;
  }
}
