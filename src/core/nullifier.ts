/**
 * Party Registry -- Nullifier Store
 *
 * A personhood proof carries a nullifier derived from the prover's secret
 * and the external nullifier (scope).  The same person proving twice for
 * the same scope yields the same nullifier, so recording consumed
 * nullifiers is what makes each proof single-use.
 *
 * Proof verification is asynchronous.  Between the pre-flight check and
 * the final consume the nullifier is held as a *reservation* so that two
 * in-flight submissions of the same proof cannot both succeed.
 *
 * @module nullifier
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Types
// ============================================================

/** Record of a consumed nullifier */
export interface NullifierRecord {
  nullifierHash: string;
  /** The scope (external nullifier) the nullifier was consumed under */
  scope: string;
  /** ISO 8601 timestamp of when the nullifier was recorded */
  recordedAt: string;
}

/** Result of a nullifier check */
export interface NullifierCheckResult {
  /** Whether the nullifier is fresh (neither consumed nor reserved) */
  isFresh: boolean;
  /** If consumed, the record of the previous use */
  existingRecord?: NullifierRecord;
}

/** Aggregated statistics for nullifier usage */
export interface NullifierStats {
  totalConsumed: number;
  pendingReservations: number;
  perScope: Map<string, number>;
}

// ============================================================
// NullifierStore
// ============================================================

/**
 * Tracks consumed and reserved nullifiers per scope.
 *
 * @example
 * ```ts
 * const store = new NullifierStore();
 *
 * if (store.reserve("party-registry", proof.nullifierHash)) {
 *   const accepted = await oracle.verify(proof);
 *   if (accepted) store.consume("party-registry", proof.nullifierHash);
 *   else store.release("party-registry", proof.nullifierHash);
 * }
 * ```
 */
export class NullifierStore {
  /** scope -> nullifier -> record */
  private consumed: Map<string, Map<string, NullifierRecord>> = new Map();

  /** `${scope}:${nullifier}` keys currently held by an in-flight verification */
  private reserved: Set<string> = new Set();

  /**
   * Checks a nullifier without changing anything.
   */
  check(scope: string, nullifierHash: string): NullifierCheckResult {
    const existing = this.consumed.get(scope)?.get(nullifierHash);
    if (existing) {
      return { isFresh: false, existingRecord: existing };
    }
    return { isFresh: !this.reserved.has(reservationKey(scope, nullifierHash)) };
  }

  /**
   * Holds a fresh nullifier for an in-flight verification.
   *
   * @returns false when the nullifier is consumed or already reserved
   */
  reserve(scope: string, nullifierHash: string): boolean {
    if (!this.check(scope, nullifierHash).isFresh) {
      return false;
    }
    this.reserved.add(reservationKey(scope, nullifierHash));
    return true;
  }

  /**
   * Drops a reservation after a rejected verification.
   */
  release(scope: string, nullifierHash: string): void {
    this.reserved.delete(reservationKey(scope, nullifierHash));
  }

  /**
   * Marks a nullifier as permanently used, converting any reservation.
   *
   * @returns NullifierCheckResult indicating whether the nullifier was fresh
   */
  consume(scope: string, nullifierHash: string): NullifierCheckResult {
    let scopeMap = this.consumed.get(scope);

    if (scopeMap) {
      const existing = scopeMap.get(nullifierHash);
      if (existing) {
        return { isFresh: false, existingRecord: existing };
      }
    } else {
      scopeMap = new Map();
      this.consumed.set(scope, scopeMap);
    }

    scopeMap.set(nullifierHash, {
      nullifierHash,
      scope,
      recordedAt: new Date().toISOString(),
    });
    this.reserved.delete(reservationKey(scope, nullifierHash));

    return { isFresh: true };
  }

  countForScope(scope: string): number {
    return this.consumed.get(scope)?.size ?? 0;
  }

  /**
   * Returns all consumed nullifier records for a scope, in insertion order.
   */
  getRecordsForScope(scope: string): NullifierRecord[] {
    const scopeMap = this.consumed.get(scope);
    return scopeMap ? Array.from(scopeMap.values()) : [];
  }

  getStats(): NullifierStats {
    let totalConsumed = 0;
    const perScope = new Map<string, number>();

    for (const [scope, scopeMap] of this.consumed) {
      perScope.set(scope, scopeMap.size);
      totalConsumed += scopeMap.size;
    }

    return {
      totalConsumed,
      pendingReservations: this.reserved.size,
      perScope,
    };
  }

  /**
   * Resets the entire store.  Testing only.
   */
  reset(): void {
    this.consumed.clear();
    this.reserved.clear();
  }
}

function reservationKey(scope: string, nullifierHash: string): string {
  return `${scope}:${nullifierHash}`;
}

/**
 * Creates a new NullifierStore instance.
 */
export function createNullifierStore(): NullifierStore {
  return new NullifierStore();
}
