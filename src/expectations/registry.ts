/**
 * Shared registry of leaf expectations.
 *
 * Leaves live in an arena keyed by a stable numeric id; assertion trees hold
 * `(registry, id)` pairs rather than the leaf objects themselves. The ordered
 * `pending` list holds the ids still eligible for matching.
 *
 * Invariant: an id is in `pending` iff its leaf's latch is false. Dispatch is
 * the only path that trips a latch, and it removes the id in the same
 * critical section.
 *
 * Every mutation of `pending` goes through `withLock()`. The guard is not
 * re-entrant, and an exception escaping a critical section poisons the
 * registry: every later locked operation throws `RegistryPoisonedError`.
 */

import { InvariantViolationError, RegistryPoisonedError } from '../errors';
import { LeafExpectation } from './leaf';
import { MatchSpec } from './match-spec';

export interface RegistryOptions {
  /** Called after each leaf is declared, outside the lock. */
  onDeclare?: (leaf: LeafExpectation) => void;
}

export class ExpectationRegistry {
  private overrideAll: boolean = false;
  private readonly leaves = new Map<number, LeafExpectation>();
  private pending: number[] = [];
  private nextId: number = 1;
  private locked: boolean = false;
  private poisonedBy: Error | null = null;
  private readonly onDeclare?: (leaf: LeafExpectation) => void;

  constructor(options: RegistryOptions = {}) {
    this.onDeclare = options.onDeclare;
  }

  /**
   * Allocate a leaf with an open latch and enrol it for matching.
   */
  declare(spec: MatchSpec): LeafExpectation {
    const leaf = this.withLock(() => {
      const created = new LeafExpectation(this.nextId++, spec);
      this.leaves.set(created.id, created);
      this.pending.push(created.id);
      return created;
    });
    this.onDeclare?.(leaf);
    return leaf;
  }

  /**
   * Offer a payload to every pending leaf.
   *
   * Specs are evaluated against a snapshot of `pending` outside the lock; the
   * latch flip and removal happen together under it, and only for leaves that
   * are still pending, so a leaf is matched at most once per generation.
   *
   * @returns Number of leaves newly satisfied by this payload
   */
  dispatch(payload: string): number {
    const candidates = this.withLock(() => this.pending.map(id => this.leaf(id)));
    const hits = candidates.filter(leaf => leaf.matches(payload));
    if (hits.length === 0) {
      return 0;
    }

    return this.withLock(() => {
      let satisfied = 0;
      for (const leaf of hits) {
        const index = this.pending.indexOf(leaf.id);
        if (index === -1) {
          continue;
        }
        this.pending.splice(index, 1);
        if (leaf.trip()) {
          throw new InvariantViolationError(`leaf #${leaf.id} was pending while satisfied`);
        }
        satisfied++;
      }
      return satisfied;
    });
  }

  /**
   * Clear a leaf's latch and re-enrol it if dispatch had removed it.
   *
   * @returns Whether the leaf had been satisfied
   */
  reset(id: number): boolean {
    const leaf = this.leaf(id);
    if (!leaf.satisfied) {
      return false;
    }
    this.withLock(() => {
      if (this.pending.includes(id)) {
        throw new InvariantViolationError(`leaf #${id} was satisfied while pending`);
      }
      leaf.clear();
      this.pending.push(id);
    });
    return true;
  }

  leaf(id: number): LeafExpectation {
    const leaf = this.leaves.get(id);
    if (!leaf) {
      throw this.poison(new InvariantViolationError(`leaf #${id} is not registered`));
    }
    return leaf;
  }

  isOverridden(): boolean {
    return this.overrideAll;
  }

  setOverride(value: boolean): void {
    this.overrideAll = value;
  }

  isPending(id: number): boolean {
    return this.pending.includes(id);
  }

  pendingIds(): readonly number[] {
    return [...this.pending];
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Number of leaves ever declared. */
  get size(): number {
    return this.leaves.size;
  }

  get poisoned(): boolean {
    return this.poisonedBy !== null;
  }

  private withLock<T>(critical: () => T): T {
    if (this.poisonedBy) {
      throw new RegistryPoisonedError(this.poisonedBy);
    }
    if (this.locked) {
      throw this.poison(new InvariantViolationError('expectation registry lock re-entered'));
    }

    this.locked = true;
    try {
      return critical();
    } catch (e) {
      throw this.poison(e instanceof Error ? e : new Error(String(e)));
    } finally {
      this.locked = false;
    }
  }

  private poison(error: Error): Error {
    this.poisonedBy ??= error;
    return error;
  }
}
