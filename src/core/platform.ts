/**
 * Party Registry -- Platform Orchestrator
 *
 * Wires every sub-system into one object from a PlatformConfig:
 *
 *   AccessControl     -- owner + global pause, shared by all components
 *   EventBus          -- domain events
 *   PartyRegistry     -- lifecycle, membership, leadership
 *   SnapshotLedger    -- membership count history
 *   ElectionTally     -- one live vote per identity per cycle
 *   SnapshotScheduler -- periodic capture passes
 *
 * Collaborators (identity verifier, personhood oracle, clock) can be
 * swapped, which is how the tests run offline and deterministically.
 * Orb tiers and personhood commitments listed in the config are seeded
 * into whichever collaborators end up in use; the owner can add more later.
 *
 * @module platform
 * @license AGPL-3.0-or-later
 */

import { AccessControl, isZeroIdentity } from "./access-control";
import { ElectionTally } from "./election-tally";
import { RegistryError } from "./errors";
import { EventBus } from "./events";
import { NullifierStore } from "./nullifier";
import {
  InMemoryIdentityVerifier,
  SemaphorePersonhoodOracle,
  isEnrollingOracle,
  isManagedVerifier,
  type EnrollingPersonhoodOracle,
  type IdentityVerifier,
  type ManagedIdentityVerifier,
  type PersonhoodOracle,
} from "./personhood";
import { PartyRegistry } from "./registry";
import { SnapshotLedger } from "./snapshot-ledger";
import { SnapshotScheduler } from "./snapshot-scheduler";
import {
  DEFAULT_CONFIG,
  type Identity,
  type PlatformConfig,
  type VerificationTier,
} from "../types";

export interface PlatformCollaborators {
  verifier?: IdentityVerifier;
  oracle?: PersonhoodOracle;
  clock?: () => number;
}

export class Platform {
  readonly events = new EventBus();
  readonly access: AccessControl;
  readonly nullifiers = new NullifierStore();
  readonly verifier: IdentityVerifier;
  readonly oracle?: PersonhoodOracle;
  readonly registry: PartyRegistry;
  readonly snapshots: SnapshotLedger;
  readonly elections: ElectionTally;
  readonly scheduler: SnapshotScheduler;

  constructor(
    readonly config: PlatformConfig = DEFAULT_CONFIG,
    collaborators: PlatformCollaborators = {}
  ) {
    this.access = new AccessControl(config.owner, this.events);
    this.verifier = collaborators.verifier ?? new InMemoryIdentityVerifier();
    this.oracle =
      collaborators.oracle ??
      (config.policy.documentVerification
        ? new SemaphorePersonhoodOracle(config.personhood)
        : undefined);

    this.registry = new PartyRegistry({
      policy: config.policy,
      access: this.access,
      events: this.events,
      verifier: this.verifier,
      oracle: this.oracle,
      nullifiers: this.nullifiers,
      clock: collaborators.clock,
    });

    for (const identity of config.orbVerified) {
      this.managedVerifier().setTier(identity, "orb");
    }
    for (const commitment of config.personhood.commitments) {
      this.enrollingOracle().enroll(parseCommitment(commitment));
    }

    this.snapshots = new SnapshotLedger({
      source: this.registry,
      access: this.access,
      events: this.events,
      retention: config.snapshotRetention,
      clock: collaborators.clock,
    });

    this.elections = new ElectionTally({
      access: this.access,
      events: this.events,
      verifier: this.verifier,
    });

    this.scheduler = new SnapshotScheduler(this.snapshots, {
      operator: () => this.access.owner,
      batchSize: config.snapshotBatchSize,
      intervalMs: config.snapshotIntervalMs,
    });
  }

  // --------------------------------------------------------
  // Verification administration (owner)
  // --------------------------------------------------------

  /**
   * Sets the orb tier of an identity.  Counts of parties the identity
   * already belongs to are not touched; they follow on the next join or
   * leave.
   */
  setVerificationTier(caller: Identity, identity: Identity, tier: VerificationTier): void {
    this.access.requireOwner(caller);
    if (isZeroIdentity(identity)) {
      throw new RegistryError("Identity cannot be the zero identity", "ZeroIdentity");
    }
    this.managedVerifier().setTier(identity, tier);
    this.events.publish({ type: "VerificationTierSet", identity, tier });
  }

  /**
   * Enrolls an identity commitment in the personhood group.
   *
   * @returns The new group root and size
   */
  enrollPersonhood(caller: Identity, commitment: string): { root: string; size: number } {
    this.access.requireOwner(caller);
    const oracle = this.enrollingOracle();
    const value = parseCommitment(commitment);
    if (oracle.isEnrolled(value)) {
      throw new RegistryError("Commitment is already enrolled", "AlreadyEnrolled");
    }
    const root = oracle.enroll(value);
    this.events.publish({ type: "PersonhoodEnrolled", commitment: value.toString(), root });
    return { root, size: oracle.size };
  }

  private managedVerifier(): ManagedIdentityVerifier {
    if (!isManagedVerifier(this.verifier)) {
      throw new RegistryError("The identity verifier is read-only", "UnsupportedOperation");
    }
    return this.verifier;
  }

  private enrollingOracle(): EnrollingPersonhoodOracle {
    if (!this.oracle || !isEnrollingOracle(this.oracle)) {
      throw new RegistryError("The personhood oracle takes no enrollments", "UnsupportedOperation");
    }
    return this.oracle;
  }
}

function parseCommitment(commitment: string): bigint {
  if (!/^[1-9][0-9]*$/.test(commitment)) {
    throw new RegistryError("Commitment must be a positive decimal integer", "InvalidCommitment");
  }
  return BigInt(commitment);
}

/**
 * Creates a new Platform instance.
 */
export function createPlatform(
  config: PlatformConfig = DEFAULT_CONFIG,
  collaborators: PlatformCollaborators = {}
): Platform {
  return new Platform(config, collaborators);
}
