/**
 * Party Registry
 *
 * Political party lifecycle, membership, leadership, membership
 * snapshots and election tallies, with optional personhood proofs.
 *
 * @packageDocumentation
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Platform (main orchestrator)
// ============================================================

export { Platform, createPlatform } from "./core/platform";
export type { PlatformCollaborators } from "./core/platform";

// ============================================================
// Party registry
// ============================================================

export { PartyRegistry } from "./core/registry";
export type { RegistryDependencies, ListPartiesFilters } from "./core/registry";

// ============================================================
// Snapshots & elections
// ============================================================

export { SnapshotLedger } from "./core/snapshot-ledger";
export type { SnapshotLedgerDependencies } from "./core/snapshot-ledger";

export { SnapshotScheduler } from "./core/snapshot-scheduler";
export type { SchedulerOptions, PassSummary } from "./core/snapshot-scheduler";

export { ElectionTally } from "./core/election-tally";
export type { ElectionTallyDependencies } from "./core/election-tally";

// ============================================================
// Access control, errors & events
// ============================================================

export { AccessControl, isZeroIdentity } from "./core/access-control";
export { RegistryError, isRegistryError } from "./core/errors";
export type { ErrorCategory, RegistryErrorCode } from "./core/errors";
export { EventBus } from "./core/events";
export type { PlatformEvent, PlatformEventType } from "./core/events";

// ============================================================
// Personhood (Semaphore) & nullifiers
// ============================================================

export {
  InMemoryIdentityVerifier,
  SemaphorePersonhoodOracle,
  createPersonhoodIdentity,
  restorePersonhoodIdentity,
  isManagedVerifier,
  isEnrollingOracle,
} from "./core/personhood";
export type {
  IdentityVerifier,
  PersonhoodOracle,
  ManagedIdentityVerifier,
  EnrollingPersonhoodOracle,
  SemaphoreOracleOptions,
  PersonhoodIdentity,
} from "./core/personhood";

export { NullifierStore, createNullifierStore } from "./core/nullifier";
export type { NullifierRecord, NullifierCheckResult, NullifierStats } from "./core/nullifier";

// ============================================================
// Configuration & logging
// ============================================================

export { loadConfig } from "./config";
export { createLogger, log } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

// ============================================================
// Shared type definitions
// ============================================================

export type {
  Identity,
  VerificationTier,
  PartyStatus,
  PartyField,
  PartyProfile,
  PartyDetails,
  PartyStats,
  LeadershipChange,
  PartyCounters,
  PartyCounts,
  PartyCountSource,
  MembershipSnapshot,
  SnapshotStatus,
  CaptureBatchResult,
  PartyTally,
  ElectionResults,
  PersonhoodProof,
  MembershipMode,
  RegistryPolicy,
  PlatformConfig,
} from "./types";

export { DEFAULT_CONFIG, ZERO_IDENTITY, NO_PARTY, FIRST_PARTY_ID } from "./types";
