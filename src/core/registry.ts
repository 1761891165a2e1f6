/**
 * Party Registry -- Party Lifecycle, Membership & Leadership
 *
 * The PartyRegistry owns every party record and the per-identity indices
 * that span parties:
 *
 *   userParties      -- identity -> parties it is a member of
 *   userLeaderships  -- identity -> parties it currently leads
 *   documentVerified -- identities holding a personhood proof (permanent)
 *
 * Lifecycle:
 *
 *   createParty -> pending --approveParty--> active
 *                     ^                        |
 *                     |                  deactivateParty
 *              reactivateParty                 v
 *                     +------------------- inactive <-- (pending also deactivatable)
 *
 * Rules enforced here:
 * - The current leader is always a member and can never leave, be removed
 *   or be banned.  Leadership must be transferred first.
 * - An identity leads at most one active party.  Checked when a party is
 *   approved and when leadership moves to an identity.
 * - Tier counters never exceed the member count.
 *
 * Every mutating method validates all preconditions before its first
 * write, bumps the commit sequence, then publishes its events.
 *
 * @module registry
 * @license AGPL-3.0-or-later
 */

import { AccessControl, isZeroIdentity } from "./access-control";
import { RegistryError } from "./errors";
import { EventBus } from "./events";
import type { PlatformEvent } from "./events";
import { NullifierStore } from "./nullifier";
import type { IdentityVerifier, PersonhoodOracle } from "./personhood";
import type {
  Identity,
  LeadershipChange,
  PartyCounters,
  PartyCounts,
  PartyCountSource,
  PartyDetails,
  PartyField,
  PartyProfile,
  PartyStats,
  PartyStatus,
  PersonhoodProof,
  RegistryPolicy,
} from "../types";
import { FIRST_PARTY_ID } from "../types";

// ============================================================
// Types
// ============================================================

/** Internal party record.  Never handed out; queries return copies. */
interface PartyRecord extends PartyProfile {
  id: number;
  founder: Identity;
  currentLeader: Identity;
  createdAt: number;
  status: PartyStatus;
  memberCount: number;
  verifiedMemberCount: number;
  documentVerifiedMemberCount: number;
  members: Set<Identity>;
  banned: Set<Identity>;
  stats: PartyStats;
  leadershipHistory: LeadershipChange[];
}

export interface RegistryDependencies {
  policy: RegistryPolicy;
  access: AccessControl;
  events: EventBus;
  verifier: IdentityVerifier;
  /** Required when `policy.documentVerification` is on */
  oracle?: PersonhoodOracle;
  nullifiers?: NullifierStore;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
}

export interface ListPartiesFilters {
  status?: PartyStatus;
  /** 1-based page number */
  page?: number;
  /** Page size, capped at 100 */
  limit?: number;
}

const FIELD_LABELS: Record<PartyField, string> = {
  name: "Name",
  shortName: "Short name",
  description: "Description",
  link: "Link",
};

// ============================================================
// PartyRegistry
// ============================================================

/**
 * The party registry state machine.
 *
 * @example
 * ```ts
 * const party = registry.createParty("alice", {
 *   name: "Green Future",
 *   shortName: "GRN",
 *   description: "Renewables first",
 *   link: "https://example.org/green",
 * });
 *
 * registry.approveParty("admin", party.id);
 * registry.joinParty("bob", party.id);
 * registry.transferLeadership("alice", party.id, "bob");
 * registry.leaveParty("alice", party.id);
 * ```
 */
export class PartyRegistry implements PartyCountSource {
  private parties: Map<number, PartyRecord> = new Map();
  private nextPartyId = FIRST_PARTY_ID;
  private pendingCount = 0;
  private activeCount = 0;

  private userParties: Map<Identity, Set<number>> = new Map();
  private userLeaderships: Map<Identity, Set<number>> = new Map();
  private documentVerified: Set<Identity> = new Set();

  /** Incremented on every committed mutation */
  private sequence = 0;

  private readonly policy: RegistryPolicy;
  private readonly access: AccessControl;
  private readonly events: EventBus;
  private readonly verifier: IdentityVerifier;
  private readonly oracle?: PersonhoodOracle;
  private readonly nullifiers: NullifierStore;
  private readonly now: () => number;

  constructor(deps: RegistryDependencies) {
    if (deps.policy.documentVerification && !deps.oracle) {
      throw new Error("Document verification requires a personhood oracle");
    }
    this.policy = deps.policy;
    this.access = deps.access;
    this.events = deps.events;
    this.verifier = deps.verifier;
    this.oracle = deps.oracle;
    this.nullifiers = deps.nullifiers ?? new NullifierStore();
    this.now = deps.clock ?? Date.now;
  }

  // --------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------

  /**
   * Founds a new party in pending status.  The founder becomes its sole
   * member and its leader.
   */
  createParty(founder: Identity, profile: PartyProfile): PartyDetails {
    this.access.requireNotPaused();
    this.requireNonZero(founder, "Founder");
    this.validateField("name", profile.name);
    this.validateField("shortName", profile.shortName);
    this.validateField("description", profile.description);
    this.validateField("link", profile.link);
    if (this.policy.membership === "single" && this.partyCountOf(founder) > 0) {
      throw new RegistryError(
        "Founder already belongs to a party",
        "AlreadyMemberOfElsewhere"
      );
    }

    const id = this.nextPartyId++;
    const timestamp = this.now();
    const party: PartyRecord = {
      id,
      name: profile.name,
      shortName: profile.shortName,
      description: profile.description,
      link: profile.link,
      founder,
      currentLeader: founder,
      createdAt: timestamp,
      status: "pending",
      memberCount: 0,
      verifiedMemberCount: 0,
      documentVerifiedMemberCount: 0,
      members: new Set(),
      banned: new Set(),
      stats: {
        leadershipChanges: 0,
        memberJoins: 0,
        memberLeaves: 0,
        lastActivityAt: timestamp,
      },
      leadershipHistory: [],
    };

    this.parties.set(id, party);
    this.pendingCount++;
    this.addMember(party, founder);
    indexAdd(this.userLeaderships, founder, id);

    this.commit({ type: "PartyCreated", partyId: id, founder });
    return toDetails(party);
  }

  approveParty(caller: Identity, partyId: number): void {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);
    const party = this.requireParty(partyId);
    if (party.status !== "pending") {
      throw new RegistryError(`Party ${partyId} is not pending`, "PartyNotPending", partyId);
    }
    if (this.leadsOtherActiveParty(party.currentLeader, partyId)) {
      throw new RegistryError(
        "The party leader already leads an active party",
        "LeaderHasActiveParty",
        partyId
      );
    }

    party.status = "active";
    this.pendingCount--;
    this.activeCount++;
    this.touch(party);
    this.commit({ type: "PartyApproved", partyId });
  }

  deactivateParty(caller: Identity, partyId: number): void {
    this.access.requireNotPaused();
    const party = this.requireParty(partyId);
    if (!this.access.isOwner(caller) && caller !== party.currentLeader) {
      throw new RegistryError(
        "Only the owner or the party leader may deactivate",
        "NotOwnerOrLeader",
        partyId
      );
    }
    if (party.status === "inactive") {
      throw new RegistryError(`Party ${partyId} is already inactive`, "AlreadyInactive", partyId);
    }

    if (party.status === "active") {
      this.activeCount--;
    } else {
      this.pendingCount--;
    }
    party.status = "inactive";
    this.touch(party);
    this.commit({ type: "PartyDeactivated", partyId, by: caller });
  }

  /**
   * Moves an inactive party back to pending.  It must be approved again.
   */
  reactivateParty(caller: Identity, partyId: number): void {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);
    const party = this.requireParty(partyId);
    if (party.status !== "inactive") {
      throw new RegistryError(`Party ${partyId} is not inactive`, "PartyNotInactive", partyId);
    }

    party.status = "pending";
    this.pendingCount++;
    this.touch(party);
    this.commit({ type: "PartyReactivated", partyId });
  }

  // --------------------------------------------------------
  // Membership
  // --------------------------------------------------------

  joinParty(identity: Identity, partyId: number): void {
    const party = this.validateJoin(identity, partyId);

    this.addMember(party, identity);
    this.touch(party);
    this.commit({ type: "MemberJoined", partyId, member: identity, withProof: false });
  }

  /**
   * Joins a party and marks the identity as document-verified.
   *
   * The nullifier stays reserved while the oracle runs; join preconditions
   * are checked again once it answers.
   */
  async joinPartyWithProof(
    identity: Identity,
    partyId: number,
    proof: PersonhoodProof
  ): Promise<void> {
    const oracle = this.requireProofSupport();
    this.validateJoin(identity, partyId);

    await this.withVerifiedProof(oracle, proof, () => {
      const party = this.validateJoin(identity, partyId);
      const events = this.markDocumentVerified(identity);
      this.addMember(party, identity);
      this.touch(party);
      this.commit(...events, { type: "MemberJoined", partyId, member: identity, withProof: true });
    });
  }

  /**
   * Upgrades an identity to document-verified without joining a party.
   * Every party the identity already belongs to gains a verified member.
   */
  async verifyDocument(identity: Identity, proof: PersonhoodProof): Promise<void> {
    const oracle = this.requireProofSupport();
    this.validateDocumentUpgrade(identity);

    await this.withVerifiedProof(oracle, proof, () => {
      this.validateDocumentUpgrade(identity);
      this.commit(...this.markDocumentVerified(identity));
    });
  }

  leaveParty(identity: Identity, partyId: number): void {
    this.access.requireNotPaused();
    const party = this.requireParty(partyId);
    if (!party.members.has(identity)) {
      throw new RegistryError("Caller is not a member of this party", "NotMember", partyId);
    }
    if (identity === party.currentLeader) {
      throw new RegistryError(
        "The leader must transfer leadership before leaving",
        "LeaderCannotLeave",
        partyId
      );
    }

    this.dropMember(party, identity);
    this.touch(party);
    this.commit({ type: "MemberLeft", partyId, member: identity });
  }

  removeMember(caller: Identity, partyId: number, target: Identity): void {
    this.access.requireNotPaused();
    const party = this.requireLeader(caller, partyId);
    if (target === party.currentLeader) {
      throw new RegistryError("The leader cannot be removed", "CannotRemoveLeader", partyId);
    }
    if (!party.members.has(target)) {
      throw new RegistryError("Target is not a member of this party", "NotMember", partyId);
    }

    this.dropMember(party, target);
    this.touch(party);
    this.commit({ type: "MemberRemoved", partyId, member: target, by: caller });
  }

  /**
   * Bans an identity from a party, removing it first if it is a member.
   * The ban holds until `unbanMember`, whether or not the target was a
   * member when banned.
   */
  banMember(caller: Identity, partyId: number, target: Identity): void {
    this.access.requireNotPaused();
    this.requireBanSupport();
    const party = this.requireLeader(caller, partyId);
    this.requireNonZero(target, "Ban target");
    if (target === party.currentLeader) {
      throw new RegistryError("The leader cannot be banned", "CannotRemoveLeader", partyId);
    }
    if (party.banned.has(target)) {
      throw new RegistryError("Target is already banned", "AlreadyBanned", partyId);
    }

    const wasMember = party.members.has(target);
    if (wasMember) {
      this.dropMember(party, target);
    }
    party.banned.add(target);
    this.touch(party);
    this.commit({ type: "MemberBanned", partyId, member: target, by: caller, wasMember });
  }

  unbanMember(caller: Identity, partyId: number, target: Identity): void {
    this.access.requireNotPaused();
    this.requireBanSupport();
    const party = this.requireLeader(caller, partyId);
    if (!party.banned.has(target)) {
      throw new RegistryError("Target is not banned", "NotBanned", partyId);
    }

    party.banned.delete(target);
    this.touch(party);
    this.commit({ type: "MemberUnbanned", partyId, member: target, by: caller });
  }

  // --------------------------------------------------------
  // Leadership
  // --------------------------------------------------------

  transferLeadership(caller: Identity, partyId: number, newLeader: Identity): void {
    this.access.requireNotPaused();
    const party = this.requireLeader(caller, partyId);
    this.validateNewLeader(party, newLeader);
    this.changeLeader(party, newLeader, false);
  }

  /**
   * Administrative leadership change.  Skips the current-leader check but
   * keeps every other rule of `transferLeadership`.
   */
  forceLeadershipChange(caller: Identity, partyId: number, newLeader: Identity): void {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);
    const party = this.requireParty(partyId);
    this.validateNewLeader(party, newLeader);
    this.changeLeader(party, newLeader, true);
  }

  // --------------------------------------------------------
  // Profile Updates
  // --------------------------------------------------------

  updateName(caller: Identity, partyId: number, value: string): void {
    this.updateField(caller, partyId, "name", value);
  }

  updateShortName(caller: Identity, partyId: number, value: string): void {
    this.updateField(caller, partyId, "shortName", value);
  }

  updateDescription(caller: Identity, partyId: number, value: string): void {
    this.updateField(caller, partyId, "description", value);
  }

  updateLink(caller: Identity, partyId: number, value: string): void {
    this.updateField(caller, partyId, "link", value);
  }

  // --------------------------------------------------------
  // Administration
  // --------------------------------------------------------

  togglePause(caller: Identity): boolean {
    return this.access.togglePause(caller);
  }

  get paused(): boolean {
    return this.access.isPaused;
  }

  // --------------------------------------------------------
  // Queries
  // --------------------------------------------------------

  getPartyDetails(partyId: number): PartyDetails {
    return toDetails(this.requireParty(partyId));
  }

  getPartyStats(partyId: number): PartyStats {
    return { ...this.requireParty(partyId).stats };
  }

  getLeadershipHistoryLength(partyId: number): number {
    return this.requireParty(partyId).leadershipHistory.length;
  }

  getLeadershipHistoryEntry(partyId: number, index: number): LeadershipChange {
    const history = this.requireParty(partyId).leadershipHistory;
    if (!Number.isInteger(index) || index < 0 || index >= history.length) {
      throw new RegistryError(
        `History index ${index} is out of range (length ${history.length})`,
        "HistoryIndexOutOfRange",
        partyId
      );
    }
    return { ...history[index] };
  }

  getLeadershipHistory(partyId: number): LeadershipChange[] {
    return this.requireParty(partyId).leadershipHistory.map((entry) => ({ ...entry }));
  }

  /** Party IDs the identity is a member of, ascending */
  getUserParties(identity: Identity): number[] {
    return sortedIds(this.userParties.get(identity));
  }

  /** Party IDs the identity currently leads, ascending */
  getUserLeaderships(identity: Identity): number[] {
    return sortedIds(this.userLeaderships.get(identity));
  }

  getMembers(partyId: number): Identity[] {
    return Array.from(this.requireParty(partyId).members);
  }

  isMember(partyId: number, identity: Identity): boolean {
    return this.requireParty(partyId).members.has(identity);
  }

  isBanned(partyId: number, identity: Identity): boolean {
    return this.requireParty(partyId).banned.has(identity);
  }

  isDocumentVerified(identity: Identity): boolean {
    return this.documentVerified.has(identity);
  }

  getPartyCounters(): PartyCounters {
    return {
      total: this.totalPartyCount(),
      pending: this.pendingCount,
      active: this.activeCount,
    };
  }

  listParties(filters: ListPartiesFilters = {}): { parties: PartyDetails[]; total: number } {
    let parties = Array.from(this.parties.values());
    if (filters.status) {
      parties = parties.filter((p) => p.status === filters.status);
    }

    const total = parties.length;
    const page = Math.max(filters.page ?? 1, 1);
    const limit = Math.min(Math.max(filters.limit ?? 20, 1), 100);
    const start = (page - 1) * limit;

    return {
      parties: parties.slice(start, start + limit).map(toDetails),
      total,
    };
  }

  // --------------------------------------------------------
  // PartyCountSource
  // --------------------------------------------------------

  totalPartyCount(): number {
    return this.nextPartyId - FIRST_PARTY_ID;
  }

  getPartyCounts(partyId: number): PartyCounts | undefined {
    const party = this.parties.get(partyId);
    if (!party) return undefined;
    return {
      status: party.status,
      memberCount: party.memberCount,
      verifiedMemberCount: party.verifiedMemberCount,
      documentVerifiedMemberCount: party.documentVerifiedMemberCount,
    };
  }

  currentSequence(): number {
    return this.sequence;
  }

  // --------------------------------------------------------
  // Validation
  // --------------------------------------------------------

  private requireParty(partyId: number): PartyRecord {
    const party = this.parties.get(partyId);
    if (!party) {
      throw new RegistryError(`Party ${partyId} does not exist`, "InvalidPartyId", partyId);
    }
    return party;
  }

  private requireLeader(caller: Identity, partyId: number): PartyRecord {
    const party = this.requireParty(partyId);
    if (caller !== party.currentLeader) {
      throw new RegistryError("Caller is not the party leader", "NotLeader", partyId);
    }
    return party;
  }

  private requireNonZero(identity: Identity, label: string): void {
    if (isZeroIdentity(identity)) {
      throw new RegistryError(`${label} cannot be the zero identity`, "ZeroIdentity");
    }
  }

  private requireBanSupport(): void {
    if (!this.policy.bans) {
      throw new RegistryError("Banning is disabled", "UnsupportedOperation");
    }
  }

  private requireProofSupport(): PersonhoodOracle {
    if (!this.policy.documentVerification || !this.oracle) {
      throw new RegistryError("Document verification is disabled", "UnsupportedOperation");
    }
    return this.oracle;
  }

  private validateField(field: PartyField, value: string): void {
    const label = FIELD_LABELS[field];
    if (value.length === 0) {
      throw new RegistryError(`${label} cannot be empty`, "StringEmpty");
    }
    const max =
      field === "shortName" ? this.policy.maxShortNameLength : this.policy.maxFieldLength;
    if (value.length > max) {
      throw new RegistryError(`${label} exceeds ${max} characters`, "StringTooLong");
    }
  }

  private validateJoin(identity: Identity, partyId: number): PartyRecord {
    this.access.requireNotPaused();
    const party = this.requireParty(partyId);
    this.requireNonZero(identity, "Member");
    if (party.members.has(identity)) {
      throw new RegistryError("Already a member of this party", "AlreadyMember", partyId);
    }
    if (this.policy.membership === "single" && this.partyCountOf(identity) > 0) {
      throw new RegistryError(
        "Already a member of another party",
        "AlreadyMemberOfElsewhere",
        partyId
      );
    }
    if (party.banned.has(identity)) {
      throw new RegistryError("Banned from this party", "BannedFromParty", partyId);
    }
    return party;
  }

  private validateDocumentUpgrade(identity: Identity): void {
    this.access.requireNotPaused();
    this.requireNonZero(identity, "Identity");
    if (this.documentVerified.has(identity)) {
      throw new RegistryError("Identity is already document-verified", "AlreadyDocumentVerified");
    }
  }

  private validateNewLeader(party: PartyRecord, newLeader: Identity): void {
    this.requireNonZero(newLeader, "New leader");
    if (newLeader === party.currentLeader) {
      throw new RegistryError("Identity already leads this party", "AlreadyLeader", party.id);
    }
    if (!party.members.has(newLeader)) {
      throw new RegistryError("New leader must be a member", "NotMember", party.id);
    }
    if (party.status === "active" && this.leadsOtherActiveParty(newLeader, party.id)) {
      throw new RegistryError(
        "New leader already leads an active party",
        "NewLeaderAlreadyLeadsActiveParty",
        party.id
      );
    }
  }

  private leadsOtherActiveParty(identity: Identity, excludePartyId: number): boolean {
    for (const id of this.userLeaderships.get(identity) ?? []) {
      if (id !== excludePartyId && this.parties.get(id)?.status === "active") {
        return true;
      }
    }
    return false;
  }

  private partyCountOf(identity: Identity): number {
    return this.userParties.get(identity)?.size ?? 0;
  }

  // --------------------------------------------------------
  // Mutation helpers (callers have validated)
  // --------------------------------------------------------

  private addMember(party: PartyRecord, identity: Identity): void {
    const orb = this.verifier.verificationTier(identity) === "orb";

    party.members.add(identity);
    party.memberCount++;
    if (orb) party.verifiedMemberCount++;
    if (this.documentVerified.has(identity)) party.documentVerifiedMemberCount++;
    clampTierCounts(party);
    party.stats.memberJoins++;
    indexAdd(this.userParties, identity, party.id);
  }

  /** Tiers are read before the membership goes away. */
  private dropMember(party: PartyRecord, identity: Identity): void {
    const orb = this.verifier.verificationTier(identity) === "orb";
    const document = this.documentVerified.has(identity);

    party.members.delete(identity);
    party.memberCount--;
    if (orb) party.verifiedMemberCount = Math.max(party.verifiedMemberCount - 1, 0);
    if (document) {
      party.documentVerifiedMemberCount = Math.max(party.documentVerifiedMemberCount - 1, 0);
    }
    clampTierCounts(party);
    party.stats.memberLeaves++;
    indexRemove(this.userParties, identity, party.id);
  }

  /**
   * Sets the global document flag and credits the identity's current
   * parties.  Returns the events to publish.
   */
  private markDocumentVerified(identity: Identity): PlatformEvent[] {
    if (this.documentVerified.has(identity)) return [];

    this.documentVerified.add(identity);
    for (const id of this.userParties.get(identity) ?? []) {
      const party = this.requireParty(id);
      party.documentVerifiedMemberCount++;
      clampTierCounts(party);
      this.touch(party);
    }
    return [{ type: "DocumentVerified", identity }];
  }

  private changeLeader(party: PartyRecord, newLeader: Identity, forced: boolean): void {
    const previousLeader = party.currentLeader;
    const timestamp = this.now();

    indexRemove(this.userLeaderships, previousLeader, party.id);
    indexAdd(this.userLeaderships, newLeader, party.id);
    party.currentLeader = newLeader;
    party.leadershipHistory.push({ previousLeader, newLeader, timestamp, forced });
    party.stats.leadershipChanges++;
    party.stats.lastActivityAt = timestamp;

    this.commit({
      type: "LeadershipTransferred",
      partyId: party.id,
      previousLeader,
      newLeader,
      forced,
    });
  }

  private updateField(caller: Identity, partyId: number, field: PartyField, value: string): void {
    this.access.requireNotPaused();
    const party = this.requireLeader(caller, partyId);
    this.validateField(field, value);

    party[field] = value;
    this.touch(party);
    this.commit({ type: "PartyFieldUpdated", partyId, field, value });
  }

  /**
   * Runs `apply` once the oracle accepted the proof.  The nullifier is
   * held for the whole verification and consumed only if `apply` returns.
   */
  private async withVerifiedProof(
    oracle: PersonhoodOracle,
    proof: PersonhoodProof,
    apply: () => void
  ): Promise<void> {
    const scope = proof.externalNullifier;
    if (!this.nullifiers.reserve(scope, proof.nullifierHash)) {
      throw new RegistryError("This proof has already been used", "NullifierReused");
    }

    try {
      const accepted = await oracle.verify(proof);
      if (!accepted) {
        throw new RegistryError("Personhood proof was rejected", "ProofInvalid");
      }
      apply();
      this.nullifiers.consume(scope, proof.nullifierHash);
    } finally {
      this.nullifiers.release(scope, proof.nullifierHash);
    }
  }

  private touch(party: PartyRecord): void {
    party.stats.lastActivityAt = this.now();
  }

  private commit(...events: PlatformEvent[]): void {
    this.sequence++;
    for (const event of events) {
      this.events.publish(event);
    }
  }
}

// ============================================================
// Helpers
// ============================================================

function toDetails(party: PartyRecord): PartyDetails {
  return {
    id: party.id,
    name: party.name,
    shortName: party.shortName,
    description: party.description,
    link: party.link,
    founder: party.founder,
    currentLeader: party.currentLeader,
    createdAt: party.createdAt,
    status: party.status,
    memberCount: party.memberCount,
    verifiedMemberCount: party.verifiedMemberCount,
    documentVerifiedMemberCount: party.documentVerifiedMemberCount,
  };
}

/** Live tier lookups can drift from what was counted at join time. */
function clampTierCounts(party: PartyRecord): void {
  party.verifiedMemberCount = Math.min(party.verifiedMemberCount, party.memberCount);
  party.documentVerifiedMemberCount = Math.min(
    party.documentVerifiedMemberCount,
    party.memberCount
  );
}

function indexAdd(index: Map<Identity, Set<number>>, identity: Identity, partyId: number): void {
  let ids = index.get(identity);
  if (!ids) {
    ids = new Set();
    index.set(identity, ids);
  }
  ids.add(partyId);
}

function indexRemove(index: Map<Identity, Set<number>>, identity: Identity, partyId: number): void {
  const ids = index.get(identity);
  if (!ids) return;
  ids.delete(partyId);
  if (ids.size === 0) index.delete(identity);
}

function sortedIds(ids: Set<number> | undefined): number[] {
  return ids ? Array.from(ids).sort((a, b) => a - b) : [];
}
