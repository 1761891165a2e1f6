/**
 * Party Registry -- Verification Collaborators
 *
 * The registry never verifies anyone itself.  It asks two collaborators:
 *
 *   IdentityVerifier  -- reports the orb tier of an identity (pure read)
 *   PersonhoodOracle  -- accepts or rejects a one-time personhood proof
 *
 * The oracle shipped here is backed by the Semaphore protocol: enrolled
 * identity commitments form a Semaphore group, and a proof is accepted
 * when it was made against one of that group's roots, for the configured
 * scope, and passes Groth16 verification.
 *
 * @module personhood
 * @license AGPL-3.0-or-later
 * @see https://semaphore.pse.dev/
 */

import { Identity } from "@semaphore-protocol/identity";
import { Group } from "@semaphore-protocol/group";
import { verifyProof, type SemaphoreProof } from "@semaphore-protocol/proof";
import type { Identity as IdentityId, PersonhoodProof, VerificationTier } from "../types";

// ============================================================
// Collaborator Contracts
// ============================================================

export interface IdentityVerifier {
  verificationTier(identity: IdentityId): VerificationTier;
}

export interface PersonhoodOracle {
  /** Resolves true when the proof is accepted.  Never rejects. */
  verify(proof: PersonhoodProof): Promise<boolean>;
}

/** Verifier whose tiers an operator can set */
export interface ManagedIdentityVerifier extends IdentityVerifier {
  setTier(identity: IdentityId, tier: VerificationTier): void;
}

/** Oracle whose personhood group an operator can extend */
export interface EnrollingPersonhoodOracle extends PersonhoodOracle {
  /** @returns The new group root (decimal string) */
  enroll(commitment: bigint): string;
  isEnrolled(commitment: bigint): boolean;
  readonly size: number;
}

export function isManagedVerifier(
  verifier: IdentityVerifier
): verifier is ManagedIdentityVerifier {
  return "setTier" in verifier && typeof verifier.setTier === "function";
}

export function isEnrollingOracle(oracle: PersonhoodOracle): oracle is EnrollingPersonhoodOracle {
  return (
    "enroll" in oracle &&
    typeof oracle.enroll === "function" &&
    "isEnrolled" in oracle &&
    typeof oracle.isEnrolled === "function" &&
    "size" in oracle &&
    typeof oracle.size === "number"
  );
}

// ============================================================
// In-memory Identity Verifier
// ============================================================

/**
 * Identity verifier backed by a plain map.  Operators (or tests) set the
 * tier; every lookup is live, so a change shows up on the next call.
 */
export class InMemoryIdentityVerifier implements ManagedIdentityVerifier {
  private tiers: Map<IdentityId, VerificationTier> = new Map();

  constructor(orbVerified: Iterable<IdentityId> = []) {
    for (const identity of orbVerified) {
      this.tiers.set(identity, "orb");
    }
  }

  setTier(identity: IdentityId, tier: VerificationTier): void {
    if (tier === "none") {
      this.tiers.delete(identity);
    } else {
      this.tiers.set(identity, tier);
    }
  }

  verificationTier(identity: IdentityId): VerificationTier {
    return this.tiers.get(identity) ?? "none";
  }
}

// ============================================================
// Semaphore Personhood Oracle
// ============================================================

type PackedPoints = SemaphoreProof["points"];

export interface SemaphoreOracleOptions {
  /** Group identifier proofs must name */
  groupId: string;
  /** External nullifier (scope) proofs must be bound to */
  scope: string;
}

/**
 * Personhood oracle over a single Semaphore group.
 *
 * @example
 * ```typescript
 * const oracle = new SemaphorePersonhoodOracle({ groupId: "1", scope: "42" });
 * const person = createPersonhoodIdentity();
 * oracle.enroll(person.commitment);
 * // ... the person generates a proof off-platform against oracle.root ...
 * const accepted = await oracle.verify(proof);
 * ```
 */
export class SemaphorePersonhoodOracle implements EnrollingPersonhoodOracle {
  private readonly group = new Group();

  /** Every root the group has had; proofs against a past root stay valid */
  private readonly knownRoots: Set<string> = new Set();

  constructor(private readonly options: SemaphoreOracleOptions) {}

  /**
   * Adds an identity commitment to the personhood group.
   *
   * @returns The new group root (decimal string)
   */
  enroll(commitment: bigint): string {
    this.group.addMember(commitment);
    const root = this.group.root.toString();
    this.knownRoots.add(root);
    return root;
  }

  isEnrolled(commitment: bigint): boolean {
    return this.group.indexOf(commitment) !== -1;
  }

  get size(): number {
    return this.group.size;
  }

  /** Current group root, undefined while the group is empty */
  get root(): string | undefined {
    return this.group.size > 0 ? this.group.root.toString() : undefined;
  }

  /**
   * Verifies a personhood proof.
   *
   * Structural checks (group, scope, root, tree depth, point count) run
   * first; the Groth16 verification only runs for proofs that pass them.
   * The verification key is chosen by the depth the proof declares, so a
   * proof against an earlier root still verifies after the group grows.
   * A verifier exception counts as a rejection.
   */
  async verify(proof: PersonhoodProof): Promise<boolean> {
    if (proof.groupId !== this.options.groupId) return false;
    if (proof.externalNullifier !== this.options.scope) return false;
    if (!this.knownRoots.has(proof.root)) return false;
    if (!isSupportedDepth(proof.merkleTreeDepth)) return false;

    const points = toPackedPoints(proof.proof);
    if (!points) return false;

    const semaphoreProof: SemaphoreProof = {
      merkleTreeDepth: proof.merkleTreeDepth,
      merkleTreeRoot: proof.root,
      message: proof.signalHash,
      nullifier: proof.nullifierHash,
      scope: proof.externalNullifier,
      points,
    };

    try {
      return await verifyProof(semaphoreProof);
    } catch {
      return false;
    }
  }
}

/** Semaphore ships verification keys for tree depths 1 to 32 */
export const MIN_TREE_DEPTH = 1;
export const MAX_TREE_DEPTH = 32;

function isSupportedDepth(depth: number): boolean {
  return Number.isInteger(depth) && depth >= MIN_TREE_DEPTH && depth <= MAX_TREE_DEPTH;
}

function toPackedPoints(points: readonly string[]): PackedPoints | null {
  if (points.length !== 8) return null;
  const [a, b, c, d, e, f, g, h] = points;
  const packed: PackedPoints = [a, b, c, d, e, f, g, h];
  return packed;
}

// ============================================================
// Identities
// ============================================================

/** A person's Semaphore identity and its public commitment */
export interface PersonhoodIdentity {
  identity: Identity;
  /** Public commitment enrolled in the personhood group */
  commitment: bigint;
}

/**
 * Creates a new personhood identity.  The private key stays with the
 * person; only the commitment is ever enrolled.
 */
export function createPersonhoodIdentity(): PersonhoodIdentity {
  const identity = new Identity();
  return { identity, commitment: identity.commitment };
}

/**
 * Restores a personhood identity from its exported private key
 * (the base64 string `Identity#export` returns).
 */
export function restorePersonhoodIdentity(secret: string): PersonhoodIdentity {
  const identity = Identity.import(secret);
  return { identity, commitment: identity.commitment };
}
