import { MatchSpec, matchesPayload } from './match-spec';

/**
 * One-shot latch paired with a match rule.
 *
 * The latch only moves false -> true through `trip()` (called by registry
 * dispatch) and back through `clear()` (called by reset). Both return the
 * previous value so the caller can keep the pending list in step.
 */
export class LeafExpectation {
  private latch: boolean = false;

  constructor(
    readonly id: number,
    readonly spec: MatchSpec
  ) {}

  get satisfied(): boolean {
    return this.latch;
  }

  matches(payload: string): boolean {
    return matchesPayload(this.spec, payload);
  }

  trip(): boolean {
    const previous = this.latch;
    this.latch = true;
    return previous;
  }

  clear(): boolean {
    const previous = this.latch;
    this.latch = false;
    return previous;
  }
}
