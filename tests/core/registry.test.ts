/**
 * Party Registry -- Unit Tests for the PartyRegistry
 *
 * Covers:
 * - Party lifecycle (create, approve, deactivate, reactivate)
 * - Membership (join, leave, remove, ban, unban) and tier counters
 * - Leadership transfer, forced changes and the one-active-party rule
 * - Profile updates and field validation
 * - Personhood proofs: nullifier reuse, rejection, concurrent submissions
 * - Pause switch, commit sequence, events and query copies
 *
 * @license AGPL-3.0-or-later
 */

import { PartyRegistry } from "../../src/core/registry";
import { RegistryError } from "../../src/core/errors";
import type { PlatformEvent } from "../../src/core/events";
import { InMemoryIdentityVerifier } from "../../src/core/personhood";
import { ZERO_IDENTITY } from "../../src/types";
import {
  OWNER,
  SCOPE,
  START_TIME,
  FakeOracle,
  ManualClock,
  expectCode,
  makePlatform,
  makeProfile,
  makeProof,
} from "../helpers";

describe("PartyRegistry", () => {
  let registry: PartyRegistry;
  let verifier: InMemoryIdentityVerifier;
  let oracle: FakeOracle;
  let clock: ManualClock;
  let events: PlatformEvent[];

  function setup(...args: Parameters<typeof makePlatform>): void {
    const test = makePlatform(...args);
    registry = test.platform.registry;
    verifier = test.verifier;
    oracle = test.oracle;
    clock = test.clock;
    events = [];
    test.platform.events.subscribe((event) => events.push(event));
  }

  beforeEach(() => setup());

  // ============================================================
  // Creation
  // ============================================================

  describe("createParty", () => {
    it("should create a pending party led by its founder", () => {
      const party = registry.createParty("alice", makeProfile());

      expect(party).toEqual({
        id: 1,
        name: "Green Future",
        shortName: "GRN",
        description: "Renewables first",
        link: "https://example.org/green",
        founder: "alice",
        currentLeader: "alice",
        createdAt: START_TIME,
        status: "pending",
        memberCount: 1,
        verifiedMemberCount: 0,
        documentVerifiedMemberCount: 0,
      });
    });

    it("should hand out sequential IDs starting at 1", () => {
      const first = registry.createParty("alice", makeProfile());
      const second = registry.createParty("bob", makeProfile("Blue Wave", "BLU"));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(registry.getPartyCounters()).toEqual({ total: 2, pending: 2, active: 0 });
    });

    it("should seed the verified count from the founder's tier", () => {
      verifier.setTier("alice", "orb");
      const party = registry.createParty("alice", makeProfile());
      expect(party.verifiedMemberCount).toBe(1);
    });

    it("should index the founder as member and leader", () => {
      registry.createParty("alice", makeProfile());

      expect(registry.getUserParties("alice")).toEqual([1]);
      expect(registry.getUserLeaderships("alice")).toEqual([1]);
      expect(registry.getMembers(1)).toEqual(["alice"]);
      expect(registry.getPartyStats(1)).toEqual({
        leadershipChanges: 0,
        memberJoins: 1,
        memberLeaves: 0,
        lastActivityAt: START_TIME,
      });
      expect(registry.getLeadershipHistoryLength(1)).toBe(0);
    });

    it("should publish PartyCreated", () => {
      registry.createParty("alice", makeProfile());
      expect(events).toEqual([{ type: "PartyCreated", partyId: 1, founder: "alice" }]);
    });

    it("should reject empty fields", () => {
      expectCode(() => registry.createParty("alice", makeProfile("")), "StringEmpty");
      expectCode(
        () => registry.createParty("alice", { ...makeProfile(), link: "" }),
        "StringEmpty"
      );
    });

    it("should accept whitespace-only text as non-empty", () => {
      const party = registry.createParty("alice", makeProfile(" ", " "));
      expect(party.name).toBe(" ");
      expect(party.shortName).toBe(" ");
    });

    it("should enforce the field length limits", () => {
      expectCode(() => registry.createParty("alice", makeProfile("n".repeat(257))), "StringTooLong");
      expectCode(
        () => registry.createParty("alice", makeProfile("Green", "S".repeat(17))),
        "StringTooLong"
      );

      const party = registry.createParty("alice", makeProfile("n".repeat(256), "S".repeat(16)));
      expect(party.name).toHaveLength(256);
    });

    it("should reject the zero identity as founder", () => {
      expectCode(() => registry.createParty(ZERO_IDENTITY, makeProfile()), "ZeroIdentity");
      expectCode(() => registry.createParty("", makeProfile()), "ZeroIdentity");
    });

    it("should reject a founder who already belongs to a party in single mode", () => {
      registry.createParty("alice", makeProfile());
      expectCode(
        () => registry.createParty("alice", makeProfile("Blue Wave", "BLU")),
        "AlreadyMemberOfElsewhere"
      );
      expect(registry.totalPartyCount()).toBe(1);
    });

    it("should allow a founder several parties in multiple mode", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("alice", makeProfile("Blue Wave", "BLU"));

      expect(registry.getUserParties("alice")).toEqual([1, 2]);
      expect(registry.getUserLeaderships("alice")).toEqual([1, 2]);
    });

    it("should leave no trace when validation fails", () => {
      expect(() => registry.createParty("alice", makeProfile(""))).toThrow(RegistryError);

      expect(registry.totalPartyCount()).toBe(0);
      expect(registry.getUserParties("alice")).toEqual([]);
      expect(registry.currentSequence()).toBe(0);
      expect(events).toHaveLength(0);
    });
  });

  // ============================================================
  // Lifecycle
  // ============================================================

  describe("approveParty", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
    });

    it("should activate a pending party", () => {
      registry.approveParty(OWNER, 1);

      expect(registry.getPartyDetails(1).status).toBe("active");
      expect(registry.getPartyCounters()).toEqual({ total: 1, pending: 0, active: 1 });
    });

    it("should only accept the owner", () => {
      expectCode(() => registry.approveParty("alice", 1), "NotOwner");
    });

    it("should reject unknown parties", () => {
      expectCode(() => registry.approveParty(OWNER, 99), "InvalidPartyId");
      expectCode(() => registry.approveParty(OWNER, 0), "InvalidPartyId");
    });

    it("should reject a party that is not pending", () => {
      registry.approveParty(OWNER, 1);
      expectCode(() => registry.approveParty(OWNER, 1), "PartyNotPending");
    });

    it("should reject a leader who already leads an active party", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("alice", makeProfile("Blue Wave", "BLU"));
      registry.approveParty(OWNER, 1);

      expectCode(() => registry.approveParty(OWNER, 2), "LeaderHasActiveParty");
      expect(registry.getPartyDetails(2).status).toBe("pending");
    });
  });

  describe("deactivateParty / reactivateParty", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
    });

    it("should let the leader deactivate a pending party", () => {
      registry.deactivateParty("alice", 1);

      expect(registry.getPartyDetails(1).status).toBe("inactive");
      expect(registry.getPartyCounters()).toEqual({ total: 1, pending: 0, active: 0 });
      expect(events[events.length - 1]).toEqual({
        type: "PartyDeactivated",
        partyId: 1,
        by: "alice",
      });
    });

    it("should let the owner deactivate an active party", () => {
      registry.approveParty(OWNER, 1);
      registry.deactivateParty(OWNER, 1);

      expect(registry.getPartyCounters()).toEqual({ total: 1, pending: 0, active: 0 });
    });

    it("should reject anyone else", () => {
      expectCode(() => registry.deactivateParty("mallory", 1), "NotOwnerOrLeader");
    });

    it("should reject a party that is already inactive", () => {
      registry.deactivateParty("alice", 1);
      expectCode(() => registry.deactivateParty("alice", 1), "AlreadyInactive");
    });

    it("should move an inactive party back to pending", () => {
      registry.approveParty(OWNER, 1);
      registry.deactivateParty(OWNER, 1);
      registry.reactivateParty(OWNER, 1);

      expect(registry.getPartyDetails(1).status).toBe("pending");
      expect(registry.getPartyCounters()).toEqual({ total: 1, pending: 1, active: 0 });
    });

    it("should only reactivate inactive parties, and only for the owner", () => {
      expectCode(() => registry.reactivateParty(OWNER, 1), "PartyNotInactive");
      registry.deactivateParty("alice", 1);
      expectCode(() => registry.reactivateParty("alice", 1), "NotOwner");
    });
  });

  // ============================================================
  // Membership
  // ============================================================

  describe("joinParty / leaveParty", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.approveParty(OWNER, 1);
    });

    it("should add a member", () => {
      clock.advance(1000);
      registry.joinParty("bob", 1);

      const party = registry.getPartyDetails(1);
      expect(party.memberCount).toBe(2);
      expect(registry.isMember(1, "bob")).toBe(true);
      expect(registry.getUserParties("bob")).toEqual([1]);
      expect(registry.getPartyStats(1).memberJoins).toBe(2);
      expect(registry.getPartyStats(1).lastActivityAt).toBe(START_TIME + 1000);
    });

    it("should count orb-verified members", () => {
      verifier.setTier("bob", "orb");
      registry.joinParty("bob", 1);
      expect(registry.getPartyDetails(1).verifiedMemberCount).toBe(1);
    });

    it("should reject double joins", () => {
      registry.joinParty("bob", 1);
      expectCode(() => registry.joinParty("bob", 1), "AlreadyMember");
    });

    it("should reject joining a second party in single mode", () => {
      registry.createParty("carol", makeProfile("Blue Wave", "BLU"));
      registry.joinParty("bob", 1);
      expectCode(() => registry.joinParty("bob", 2), "AlreadyMemberOfElsewhere");
    });

    it("should allow several parties in multiple mode", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("carol", makeProfile("Blue Wave", "BLU"));
      registry.joinParty("bob", 2);
      registry.joinParty("bob", 1);

      expect(registry.getUserParties("bob")).toEqual([1, 2]);
    });

    it("should reject unknown parties and the zero identity", () => {
      expectCode(() => registry.joinParty("bob", 42), "InvalidPartyId");
      expectCode(() => registry.joinParty(ZERO_IDENTITY, 1), "ZeroIdentity");
    });

    it("should return member count and indices to their pre-join values on leave", () => {
      const before = registry.getPartyDetails(1).memberCount;
      registry.joinParty("bob", 1);
      registry.leaveParty("bob", 1);

      expect(registry.getPartyDetails(1).memberCount).toBe(before);
      expect(registry.isMember(1, "bob")).toBe(false);
      expect(registry.getUserParties("bob")).toEqual([]);
      expect(registry.getPartyStats(1).memberLeaves).toBe(1);
    });

    it("should reject leaving by non-members and by the leader", () => {
      expectCode(() => registry.leaveParty("bob", 1), "NotMember");
      expectCode(() => registry.leaveParty("alice", 1), "LeaderCannotLeave");
      expect(registry.isMember(1, "alice")).toBe(true);
    });

    it("should floor the verified count when a tier appears after joining", () => {
      registry.joinParty("bob", 1);
      verifier.setTier("bob", "orb");
      registry.leaveParty("bob", 1);

      expect(registry.getPartyDetails(1).verifiedMemberCount).toBe(0);
    });

    it("should keep the verified count within the member count when a tier is revoked", () => {
      verifier.setTier("bob", "orb");
      registry.joinParty("bob", 1);
      verifier.setTier("bob", "none");
      registry.leaveParty("bob", 1);

      const party = registry.getPartyDetails(1);
      expect(party.memberCount).toBe(1);
      expect(party.verifiedMemberCount).toBe(1);
      expect(party.verifiedMemberCount).toBeLessThanOrEqual(party.memberCount);
    });
  });

  describe("removeMember", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.joinParty("bob", 1);
    });

    it("should let the leader remove a member", () => {
      registry.removeMember("alice", 1, "bob");

      expect(registry.isMember(1, "bob")).toBe(false);
      expect(registry.getPartyDetails(1).memberCount).toBe(1);
      expect(events[events.length - 1]).toEqual({
        type: "MemberRemoved",
        partyId: 1,
        member: "bob",
        by: "alice",
      });
    });

    it("should reject non-leaders, the leader as target and non-members", () => {
      expectCode(() => registry.removeMember("bob", 1, "alice"), "NotLeader");
      expectCode(() => registry.removeMember("alice", 1, "alice"), "CannotRemoveLeader");
      expectCode(() => registry.removeMember("alice", 1, "carol"), "NotMember");
    });
  });

  describe("banMember / unbanMember", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.approveParty(OWNER, 1);
    });

    it("should remove, ban and later readmit a member", () => {
      verifier.setTier("bob", "orb");
      registry.joinParty("bob", 1);
      expect(registry.getPartyDetails(1).verifiedMemberCount).toBe(1);

      registry.banMember("alice", 1, "bob");
      expect(registry.isMember(1, "bob")).toBe(false);
      expect(registry.isBanned(1, "bob")).toBe(true);
      expect(registry.getPartyDetails(1).memberCount).toBe(1);
      expect(registry.getPartyDetails(1).verifiedMemberCount).toBe(0);
      expect(events[events.length - 1]).toEqual({
        type: "MemberBanned",
        partyId: 1,
        member: "bob",
        by: "alice",
        wasMember: true,
      });

      expectCode(() => registry.joinParty("bob", 1), "BannedFromParty");

      registry.unbanMember("alice", 1, "bob");
      registry.joinParty("bob", 1);
      expect(registry.isMember(1, "bob")).toBe(true);
    });

    it("should ban an identity that is not a member", () => {
      registry.banMember("alice", 1, "mallory");

      expect(registry.isBanned(1, "mallory")).toBe(true);
      expect(registry.getPartyStats(1).memberLeaves).toBe(0);
      expectCode(() => registry.joinParty("mallory", 1), "BannedFromParty");
    });

    it("should never ban the leader", () => {
      expectCode(() => registry.banMember("alice", 1, "alice"), "CannotRemoveLeader");
      expect(registry.isMember(1, "alice")).toBe(true);
    });

    it("should reject repeat bans, missing bans and the zero identity", () => {
      registry.banMember("alice", 1, "bob");
      expectCode(() => registry.banMember("alice", 1, "bob"), "AlreadyBanned");
      expectCode(() => registry.unbanMember("alice", 1, "carol"), "NotBanned");
      expectCode(() => registry.banMember("alice", 1, ZERO_IDENTITY), "ZeroIdentity");
    });

    it("should only let the leader moderate", () => {
      registry.joinParty("bob", 1);
      expectCode(() => registry.banMember("bob", 1, "carol"), "NotLeader");
      expectCode(() => registry.banMember(OWNER, 1, "bob"), "NotLeader");
    });

    it("should reject bans when the policy disables them", () => {
      setup({ bans: false });
      registry.createParty("alice", makeProfile());
      expectCode(() => registry.banMember("alice", 1, "bob"), "UnsupportedOperation");
      expectCode(() => registry.unbanMember("alice", 1, "bob"), "UnsupportedOperation");
    });
  });

  // ============================================================
  // Leadership
  // ============================================================

  describe("transferLeadership", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.approveParty(OWNER, 1);
      registry.joinParty("bob", 1);
    });

    it("should hand leadership to a member and record it", () => {
      clock.advance(5000);
      registry.transferLeadership("alice", 1, "bob");

      expect(registry.getPartyDetails(1).currentLeader).toBe("bob");
      expect(registry.getLeadershipHistoryLength(1)).toBe(1);
      expect(registry.getLeadershipHistoryEntry(1, 0)).toEqual({
        previousLeader: "alice",
        newLeader: "bob",
        timestamp: START_TIME + 5000,
        forced: false,
      });
      expect(registry.getUserLeaderships("alice")).toEqual([]);
      expect(registry.getUserLeaderships("bob")).toEqual([1]);
      expect(registry.getPartyStats(1).leadershipChanges).toBe(1);
      expect(registry.isMember(1, "alice")).toBe(true);
    });

    it("should let the former leader leave afterwards", () => {
      registry.transferLeadership("alice", 1, "bob");
      registry.leaveParty("alice", 1);

      expect(registry.getPartyDetails(1).memberCount).toBe(1);
    });

    it("should reject invalid targets", () => {
      expectCode(() => registry.transferLeadership("bob", 1, "bob"), "NotLeader");
      expectCode(() => registry.transferLeadership("alice", 1, ZERO_IDENTITY), "ZeroIdentity");
      expectCode(() => registry.transferLeadership("alice", 1, "alice"), "AlreadyLeader");
      expectCode(() => registry.transferLeadership("alice", 1, "carol"), "NotMember");
    });

    it("should reject a new leader who leads another active party", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("bob", makeProfile("Blue Wave", "BLU"));
      registry.approveParty(OWNER, 1);
      registry.approveParty(OWNER, 2);
      registry.joinParty("bob", 1);

      expectCode(
        () => registry.transferLeadership("alice", 1, "bob"),
        "NewLeaderAlreadyLeadsActiveParty"
      );
    });

    it("should allow the same move while the party is still pending", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("bob", makeProfile("Blue Wave", "BLU"));
      registry.approveParty(OWNER, 2);
      registry.joinParty("bob", 1);

      registry.transferLeadership("alice", 1, "bob");
      expect(registry.getUserLeaderships("bob")).toEqual([1, 2]);
    });

    it("should reject out-of-range history indices", () => {
      expectCode(() => registry.getLeadershipHistoryEntry(1, 0), "HistoryIndexOutOfRange");
    });
  });

  describe("forceLeadershipChange", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.joinParty("bob", 1);
    });

    it("should let the owner replace the leader", () => {
      registry.forceLeadershipChange(OWNER, 1, "bob");

      expect(registry.getPartyDetails(1).currentLeader).toBe("bob");
      expect(registry.getLeadershipHistoryEntry(1, 0).forced).toBe(true);
      expect(events[events.length - 1]).toEqual({
        type: "LeadershipTransferred",
        partyId: 1,
        previousLeader: "alice",
        newLeader: "bob",
        forced: true,
      });
    });

    it("should only accept the owner and keep the membership rule", () => {
      expectCode(() => registry.forceLeadershipChange("alice", 1, "bob"), "NotOwner");
      expectCode(() => registry.forceLeadershipChange(OWNER, 1, "carol"), "NotMember");
    });
  });

  // ============================================================
  // Profile updates
  // ============================================================

  describe("profile updates", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
    });

    it("should update each field for the leader", () => {
      registry.updateName("alice", 1, "Greener Future");
      registry.updateShortName("alice", 1, "GRF");
      registry.updateDescription("alice", 1, "Solar and wind");
      registry.updateLink("alice", 1, "https://example.org/greener");

      const party = registry.getPartyDetails(1);
      expect(party.name).toBe("Greener Future");
      expect(party.shortName).toBe("GRF");
      expect(party.description).toBe("Solar and wind");
      expect(party.link).toBe("https://example.org/greener");
      expect(events[events.length - 1]).toEqual({
        type: "PartyFieldUpdated",
        partyId: 1,
        field: "link",
        value: "https://example.org/greener",
      });
    });

    it("should apply the creation rules", () => {
      expectCode(() => registry.updateName("bob", 1, "Other"), "NotLeader");
      expectCode(() => registry.updateName("alice", 1, ""), "StringEmpty");
      expectCode(() => registry.updateShortName("alice", 1, "TOO-LONG-SHORTNAME"), "StringTooLong");
      expect(registry.getPartyDetails(1).name).toBe("Green Future");
    });
  });

  // ============================================================
  // Personhood proofs
  // ============================================================

  describe("joinPartyWithProof", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.approveParty(OWNER, 1);
    });

    it("should join and mark the identity as document-verified", async () => {
      events.length = 0;
      await registry.joinPartyWithProof("bob", 1, makeProof("111"));

      expect(registry.isMember(1, "bob")).toBe(true);
      expect(registry.isDocumentVerified("bob")).toBe(true);
      expect(registry.getPartyDetails(1).documentVerifiedMemberCount).toBe(1);
      expect(events).toEqual([
        { type: "DocumentVerified", identity: "bob" },
        { type: "MemberJoined", partyId: 1, member: "bob", withProof: true },
      ]);
    });

    it("should consume the nullifier", async () => {
      await registry.joinPartyWithProof("bob", 1, makeProof("111"));
      registry.createParty("carol", makeProfile("Blue Wave", "BLU"));

      await expect(registry.joinPartyWithProof("dave", 2, makeProof("111"))).rejects.toMatchObject({
        code: "NullifierReused",
      });
      expect(registry.isMember(2, "dave")).toBe(false);
    });

    it("should reject a proof the oracle refuses and keep its nullifier fresh", async () => {
      oracle.verdict = false;

      await expect(registry.joinPartyWithProof("bob", 1, makeProof("222"))).rejects.toMatchObject({
        code: "ProofInvalid",
      });
      expect(registry.isMember(1, "bob")).toBe(false);
      expect(registry.isDocumentVerified("bob")).toBe(false);

      oracle.verdict = true;
      await registry.joinPartyWithProof("bob", 1, makeProof("222"));
      expect(registry.isMember(1, "bob")).toBe(true);
    });

    it("should check join preconditions before calling the oracle", async () => {
      await expect(registry.joinPartyWithProof("alice", 1, makeProof("333"))).rejects.toMatchObject({
        code: "AlreadyMember",
      });
      expect(oracle.calls).toBe(0);
    });

    it("should reject a concurrent submission of the same nullifier", async () => {
      oracle.gated = true;
      const first = registry.joinPartyWithProof("bob", 1, makeProof("444"));
      expect(oracle.pending).toBe(1);

      await expect(registry.joinPartyWithProof("carol", 1, makeProof("444"))).rejects.toMatchObject({
        code: "NullifierReused",
      });

      oracle.releaseAll();
      await first;
      expect(registry.isMember(1, "bob")).toBe(true);
      expect(registry.isMember(1, "carol")).toBe(false);
    });

    it("should re-validate after the oracle answers", async () => {
      registry.createParty("carol", makeProfile("Blue Wave", "BLU"));
      oracle.gated = true;

      const pending = registry.joinPartyWithProof("bob", 1, makeProof("555"));
      registry.joinParty("bob", 2);
      oracle.releaseAll();

      await expect(pending).rejects.toMatchObject({ code: "AlreadyMemberOfElsewhere" });
      expect(registry.isMember(1, "bob")).toBe(false);
      expect(registry.isDocumentVerified("bob")).toBe(false);
    });

    it("should release the nullifier when re-validation fails", async () => {
      const test = makePlatform();
      const { registry: reg, events: bus } = test.platform;
      const seen: PlatformEvent[] = [];
      bus.subscribe((event) => seen.push(event));

      reg.createParty("alice", makeProfile());
      reg.createParty("carol", makeProfile("Blue Wave", "BLU"));
      test.oracle.gated = true;

      const pending = reg.joinPartyWithProof("bob", 1, makeProof("556"));
      reg.joinParty("bob", 2);
      test.oracle.releaseAll();
      await expect(pending).rejects.toMatchObject({ code: "AlreadyMemberOfElsewhere" });

      expect(test.platform.nullifiers.check(SCOPE, "556").isFresh).toBe(true);
      expect(seen.some((event) => event.type === "DocumentVerified")).toBe(false);
    });

    it("should reject proofs when document verification is disabled", async () => {
      setup({ documentVerification: false });
      registry.createParty("alice", makeProfile());

      await expect(registry.joinPartyWithProof("bob", 1, makeProof("666"))).rejects.toMatchObject({
        code: "UnsupportedOperation",
      });
      await expect(registry.verifyDocument("bob", makeProof("667"))).rejects.toMatchObject({
        code: "UnsupportedOperation",
      });
    });
  });

  describe("verifyDocument", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
      registry.joinParty("bob", 1);
    });

    it("should credit every party the identity belongs to", async () => {
      await registry.verifyDocument("bob", makeProof("777"));

      expect(registry.isDocumentVerified("bob")).toBe(true);
      expect(registry.getPartyDetails(1).documentVerifiedMemberCount).toBe(1);
    });

    it("should reject a second upgrade", async () => {
      await registry.verifyDocument("bob", makeProof("777"));
      await expect(registry.verifyDocument("bob", makeProof("778"))).rejects.toMatchObject({
        code: "AlreadyDocumentVerified",
      });
    });

    it("should carry the flag into later joins and out on leave", async () => {
      await registry.verifyDocument("carol", makeProof("779"));
      registry.joinParty("carol", 1);
      expect(registry.getPartyDetails(1).documentVerifiedMemberCount).toBe(1);

      registry.leaveParty("carol", 1);
      expect(registry.getPartyDetails(1).documentVerifiedMemberCount).toBe(0);
    });

    it("should reject the zero identity", async () => {
      await expect(registry.verifyDocument(ZERO_IDENTITY, makeProof("780"))).rejects.toMatchObject({
        code: "ZeroIdentity",
      });
    });
  });

  // ============================================================
  // Pause, sequence, queries
  // ============================================================

  describe("pause switch", () => {
    beforeEach(() => {
      registry.createParty("alice", makeProfile());
    });

    it("should block every mutation while paused", async () => {
      expect(registry.togglePause(OWNER)).toBe(true);
      expect(registry.paused).toBe(true);

      expectCode(() => registry.createParty("bob", makeProfile("Blue Wave", "BLU")), "Paused");
      expectCode(() => registry.approveParty(OWNER, 1), "Paused");
      expectCode(() => registry.joinParty("bob", 1), "Paused");
      expectCode(() => registry.updateName("alice", 1, "Paused Party"), "Paused");
      await expect(registry.joinPartyWithProof("bob", 1, makeProof("888"))).rejects.toMatchObject({
        code: "Paused",
      });

      expect(registry.getPartyDetails(1).memberCount).toBe(1);

      expect(registry.togglePause(OWNER)).toBe(false);
      registry.joinParty("bob", 1);
      expect(registry.isMember(1, "bob")).toBe(true);
    });

    it("should only let the owner toggle", () => {
      expectCode(() => registry.togglePause("alice"), "NotOwner");
    });
  });

  describe("queries", () => {
    it("should count committed mutations only", () => {
      registry.createParty("alice", makeProfile());
      registry.joinParty("bob", 1);
      expect(() => registry.joinParty("bob", 1)).toThrow(RegistryError);

      expect(registry.currentSequence()).toBe(2);
    });

    it("should return copies", () => {
      registry.createParty("alice", makeProfile());
      const details = registry.getPartyDetails(1);
      details.memberCount = 100;
      registry.getPartyStats(1).memberJoins = 100;
      registry.getMembers(1).push("mallory");

      expect(registry.getPartyDetails(1).memberCount).toBe(1);
      expect(registry.getPartyStats(1).memberJoins).toBe(1);
      expect(registry.isMember(1, "mallory")).toBe(false);
    });

    it("should filter and paginate the party list", () => {
      registry.createParty("alice", makeProfile("Alpha", "A"));
      registry.createParty("bob", makeProfile("Beta", "B"));
      registry.createParty("carol", makeProfile("Gamma", "G"));
      registry.approveParty(OWNER, 1);
      registry.approveParty(OWNER, 3);

      const active = registry.listParties({ status: "active" });
      expect(active.total).toBe(2);
      expect(active.parties.map((p) => p.id)).toEqual([1, 3]);

      const page = registry.listParties({ page: 2, limit: 2 });
      expect(page.total).toBe(3);
      expect(page.parties.map((p) => p.name)).toEqual(["Gamma"]);
    });

    it("should report counts for the snapshot ledger", () => {
      registry.createParty("alice", makeProfile());
      expect(registry.getPartyCounts(1)).toEqual({
        status: "pending",
        memberCount: 1,
        verifiedMemberCount: 0,
        documentVerifiedMemberCount: 0,
      });
      expect(registry.getPartyCounts(2)).toBeUndefined();
    });
  });

  // ============================================================
  // Properties
  // ============================================================

  describe("invariants", () => {
    it("should keep every identity at one active leadership", () => {
      setup({ membership: "multiple" });
      registry.createParty("alice", makeProfile());
      registry.createParty("bob", makeProfile("Blue Wave", "BLU"));
      registry.createParty("carol", makeProfile("Red Dawn", "RED"));
      registry.joinParty("bob", 1);
      registry.joinParty("bob", 3);
      registry.approveParty(OWNER, 1);
      registry.approveParty(OWNER, 2);
      registry.joinParty("carol", 1);

      registry.transferLeadership("alice", 1, "carol");
      expectCode(() => registry.approveParty(OWNER, 3), "LeaderHasActiveParty");
      expectCode(
        () => registry.forceLeadershipChange(OWNER, 1, "bob"),
        "NewLeaderAlreadyLeadsActiveParty"
      );

      for (const identity of ["alice", "bob", "carol"]) {
        const activeLeads = registry
          .getUserLeaderships(identity)
          .filter((id) => registry.getPartyDetails(id).status === "active");
        expect(activeLeads.length).toBeLessThanOrEqual(1);
      }
    });

    it("should keep the leader a member through every operation", () => {
      registry.createParty("alice", makeProfile());
      registry.joinParty("bob", 1);

      expectCode(() => registry.leaveParty("alice", 1), "LeaderCannotLeave");
      expectCode(() => registry.removeMember("alice", 1, "alice"), "CannotRemoveLeader");
      expectCode(() => registry.banMember("alice", 1, "alice"), "CannotRemoveLeader");

      registry.transferLeadership("alice", 1, "bob");
      const party = registry.getPartyDetails(1);
      expect(registry.isMember(1, party.currentLeader)).toBe(true);
    });
  });
});
