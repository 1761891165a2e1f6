/**
 * Party Registry -- Election Tally
 *
 * One live vote per identity per election cycle.  Per (election, voter)
 * there are two states, "no vote" and "voted for X":
 *
 *   no vote    --vote(Y)-->     voted Y
 *   voted X    --vote(Y≠X)-->   voted Y     (X loses one, Y gains one)
 *   voted X    --removeVote-->  no vote
 *
 * Voting again for the same party is rejected, not ignored.
 *
 * Starting a new election only bumps the cycle ID.  Earlier tallies stay
 * queryable under their own ID.  Party IDs are not checked against the
 * registry: any positive integer collects votes.
 *
 * @module election-tally
 * @license AGPL-3.0-or-later
 */

import { AccessControl } from "./access-control";
import { RegistryError } from "./errors";
import { EventBus } from "./events";
import type { IdentityVerifier } from "./personhood";
import type { ElectionResults, Identity, PartyTally } from "../types";
import { NO_PARTY } from "../types";

export interface ElectionTallyDependencies {
  access: AccessControl;
  events: EventBus;
  verifier: IdentityVerifier;
}

export class ElectionTally {
  private currentElectionId = 1;

  /** electionId -> partyId -> votes */
  private electionVotes: Map<number, Map<number, number>> = new Map();

  /** electionId -> voter -> partyId */
  private userVotes: Map<number, Map<Identity, number>> = new Map();

  private readonly access: AccessControl;
  private readonly events: EventBus;
  private readonly verifier: IdentityVerifier;

  constructor(deps: ElectionTallyDependencies) {
    this.access = deps.access;
    this.events = deps.events;
    this.verifier = deps.verifier;
  }

  /**
   * Opens the next election cycle.
   *
   * @returns The new election ID
   */
  startNewElection(caller: Identity): number {
    this.access.requireNotPaused();
    this.access.requireOwner(caller);

    this.currentElectionId++;
    this.events.publish({ type: "ElectionStarted", electionId: this.currentElectionId });
    return this.currentElectionId;
  }

  /**
   * Casts or moves the caller's vote in the current election.
   */
  vote(caller: Identity, partyId: number): void {
    this.access.requireNotPaused();
    if (this.verifier.verificationTier(caller) === "none") {
      throw new RegistryError("Only verified identities may vote", "NotVerified");
    }
    if (!Number.isInteger(partyId) || partyId <= NO_PARTY) {
      throw new RegistryError(`Party ${partyId} is not a valid party ID`, "InvalidPartyId", partyId);
    }

    const electionId = this.currentElectionId;
    const previousPartyId = this.getUserVote(electionId, caller);
    if (previousPartyId === partyId) {
      throw new RegistryError(
        "Already voted for this party in the current election",
        "CannotVoteForSameParty",
        partyId
      );
    }

    const tallies = this.talliesFor(electionId);
    if (previousPartyId !== NO_PARTY) {
      decrement(tallies, previousPartyId);
    }
    tallies.set(partyId, (tallies.get(partyId) ?? 0) + 1);
    this.votesFor(electionId).set(caller, partyId);

    this.events.publish({ type: "VoteCast", electionId, voter: caller, partyId, previousPartyId });
  }

  removeVote(caller: Identity): void {
    this.access.requireNotPaused();

    const electionId = this.currentElectionId;
    const partyId = this.getUserVote(electionId, caller);
    if (partyId === NO_PARTY) {
      throw new RegistryError("No vote to remove in the current election", "NoVoteToRemove");
    }

    decrement(this.talliesFor(electionId), partyId);
    this.votesFor(electionId).delete(caller);

    this.events.publish({ type: "VoteRemoved", electionId, voter: caller, partyId });
  }

  // --------------------------------------------------------
  // Queries
  // --------------------------------------------------------

  getCurrentElectionId(): number {
    return this.currentElectionId;
  }

  getVotes(electionId: number, partyId: number): number {
    return this.electionVotes.get(electionId)?.get(partyId) ?? 0;
  }

  /** The party the identity voted for, or 0 for no vote */
  getUserVote(electionId: number, identity: Identity): number {
    return this.userVotes.get(electionId)?.get(identity) ?? NO_PARTY;
  }

  getElectionResults(electionId: number): ElectionResults {
    const votesByParty = this.electionVotes.get(electionId) ?? new Map<number, number>();
    const tallies: PartyTally[] = Array.from(votesByParty)
      .filter(([, votes]) => votes > 0)
      .map(([partyId, votes]) => ({ partyId, votes }))
      .sort((a, b) => b.votes - a.votes || a.partyId - b.partyId);

    return {
      electionId,
      tallies,
      totalVotes: tallies.reduce((sum, t) => sum + t.votes, 0),
    };
  }

  /** Number of identities holding a live vote in an election */
  getVoterCount(electionId: number): number {
    return this.userVotes.get(electionId)?.size ?? 0;
  }

  private talliesFor(electionId: number): Map<number, number> {
    let tallies = this.electionVotes.get(electionId);
    if (!tallies) {
      tallies = new Map();
      this.electionVotes.set(electionId, tallies);
    }
    return tallies;
  }

  private votesFor(electionId: number): Map<Identity, number> {
    let votes = this.userVotes.get(electionId);
    if (!votes) {
      votes = new Map();
      this.userVotes.set(electionId, votes);
    }
    return votes;
  }
}

function decrement(tallies: Map<number, number>, partyId: number): void {
  tallies.set(partyId, (tallies.get(partyId) ?? 0) - 1);
}
