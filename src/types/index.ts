/**
 * Party Registry -- Core Type Definitions
 *
 * Centralised TypeScript interfaces used across the registry, the snapshot
 * ledger, the election tally and the HTTP API.  Every module imports its
 * types from here so the shapes returned by queries stay identical across
 * API boundaries.
 *
 * @module types
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Identities & Sentinels
// ============================================================

/** An opaque caller identity (account address, user handle, ...). */
export type Identity = string;

/** The zero identity.  Never a valid operation target. */
export const ZERO_IDENTITY: Identity = "0x0000000000000000000000000000000000000000";

/** Party ID sentinel meaning "no party" (and "no vote" in the tally). */
export const NO_PARTY = 0;

/** The first party ID handed out by the registry. */
export const FIRST_PARTY_ID = 1;

/** Verification tier reported by the identity verifier. */
export type VerificationTier = "none" | "orb";

// ============================================================
// Parties
// ============================================================

/** The lifecycle state of a party. */
export type PartyStatus = "pending" | "active" | "inactive";

/** The editable text fields of a party. */
export type PartyField = "name" | "shortName" | "description" | "link";

/** Text fields supplied when founding a party. */
export interface PartyProfile {
  name: string;
  shortName: string;
  description: string;
  link: string;
}

/**
 * Public view of a party: metadata plus membership counts.
 */
export interface PartyDetails extends PartyProfile {
  id: number;
  /** Founding identity (immutable) */
  founder: Identity;
  currentLeader: Identity;
  /** Milliseconds since epoch */
  createdAt: number;
  status: PartyStatus;
  memberCount: number;
  /** Members holding the orb tier */
  verifiedMemberCount: number;
  /** Members holding a document (personhood proof) verification */
  documentVerifiedMemberCount: number;
}

/** Activity counters kept per party. */
export interface PartyStats {
  leadershipChanges: number;
  memberJoins: number;
  memberLeaves: number;
  /** Milliseconds since epoch of the last mutating operation */
  lastActivityAt: number;
}

/** One entry of a party's append-only leadership history. */
export interface LeadershipChange {
  previousLeader: Identity;
  newLeader: Identity;
  timestamp: number;
  /** True when an administrator forced the change */
  forced: boolean;
}

/** Registry-wide party counters. */
export interface PartyCounters {
  total: number;
  pending: number;
  active: number;
}

/** Current counts the snapshot ledger reads for one party. */
export interface PartyCounts {
  status: PartyStatus;
  memberCount: number;
  verifiedMemberCount: number;
  documentVerifiedMemberCount: number;
}

/**
 * Read-side contract the snapshot ledger depends on.  Implemented by the
 * registry; tests may supply their own.
 */
export interface PartyCountSource {
  /** Number of party IDs ever allocated */
  totalPartyCount(): number;
  /** Counts for an existing party, undefined for an unknown ID */
  getPartyCounts(partyId: number): PartyCounts | undefined;
  /** Registry commit sequence (block-number equivalent) */
  currentSequence(): number;
}

// ============================================================
// Snapshots
// ============================================================

/**
 * Immutable point-in-time record of a party's membership counts.
 */
export interface MembershipSnapshot {
  /** Milliseconds since epoch */
  timestamp: number;
  /** Registry commit sequence at capture time */
  sequence: number;
  memberCount: number;
  verifiedMemberCount: number;
  documentVerifiedMemberCount: number;
}

/** Global snapshot ledger status. */
export interface SnapshotStatus {
  /** Completion time of the last full pass (0 = never) */
  lastSnapshotTime: number;
  totalParties: number;
  /** Snapshots kept per party (0 = unbounded) */
  retentionPolicy: number;
}

/** Outcome of one `captureBatch` call. */
export interface CaptureBatchResult {
  /** First unscanned party ID, or 0 when the pass completed */
  nextPartyId: number;
  /** Number of snapshots written */
  processed: number;
  completed: boolean;
}

// ============================================================
// Elections
// ============================================================

/** Tally for one party in one election. */
export interface PartyTally {
  partyId: number;
  votes: number;
}

/** Aggregated result of one election cycle. */
export interface ElectionResults {
  electionId: number;
  /** Sorted by votes descending, then party ID ascending */
  tallies: PartyTally[];
  totalVotes: number;
}

// ============================================================
// Personhood Proofs
// ============================================================

/**
 * Serialisable proof of personhood.  All numeric values are strings to
 * avoid JSON precision loss.
 */
export interface PersonhoodProof {
  /** Merkle root of the personhood group the proof was made against */
  root: string;
  /** Depth of the Merkle tree the proof was generated for (1-32) */
  merkleTreeDepth: number;
  /** Group the proof claims membership of */
  groupId: string;
  /** Hash of the signal (message) bound into the proof */
  signalHash: string;
  /** One-time nullifier derived from identity and external nullifier */
  nullifierHash: string;
  /** Scope the nullifier is bound to */
  externalNullifier: string;
  /** The eight packed Groth16 proof points */
  proof: string[];
}

// ============================================================
// Configuration
// ============================================================

/** Membership cardinality per identity. */
export type MembershipMode = "single" | "multiple";

/** Variant switches for the registry. */
export interface RegistryPolicy {
  membership: MembershipMode;
  /** Enables joining / upgrading with a personhood proof */
  documentVerification: boolean;
  /** Enables banning members */
  bans: boolean;
  /** Maximum length of name, description and link */
  maxFieldLength: number;
  /** Maximum length of the short name */
  maxShortNameLength: number;
}

/**
 * Runtime configuration for the platform.
 */
export interface PlatformConfig {
  /** Initial owner (administrator) identity */
  owner: Identity;
  policy: RegistryPolicy;
  /** Snapshots kept per party (0 = unbounded) */
  snapshotRetention: number;
  /** Parties scanned per captureBatch call */
  snapshotBatchSize: number;
  /** Interval between scheduled capture passes (0 = disabled) */
  snapshotIntervalMs: number;
  /** Identities seeded as orb-verified at startup */
  orbVerified: Identity[];
  personhood: {
    groupId: string;
    /** External nullifier every accepted proof must be scoped to */
    scope: string;
    /** Identity commitments (decimal strings) enrolled at startup */
    commitments: string[];
  };
  port: number;
}

/**
 * Sensible defaults for local development and testing.
 */
export const DEFAULT_CONFIG: PlatformConfig = {
  owner: "admin",
  policy: {
    membership: "single",
    documentVerification: true,
    bans: true,
    maxFieldLength: 256,
    maxShortNameLength: 16,
  },
  snapshotRetention: 30,
  snapshotBatchSize: 50,
  snapshotIntervalMs: 0,
  orbVerified: [],
  personhood: {
    groupId: "1",
    scope: "party-registry",
    commitments: [],
  },
  port: 3001,
};
