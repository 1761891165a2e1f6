/**
 * Party Registry -- Domain Events
 *
 * Committed mutations publish their events on the bus.  The HTTP server
 * subscribes to log them; tests subscribe to assert on them.
 *
 * @module events
 * @license AGPL-3.0-or-later
 */

import { createLogger } from "../utils/logger";
import type { Identity, PartyField, VerificationTier } from "../types";

const logger = createLogger("events");

export type PlatformEvent =
  | { type: "PartyCreated"; partyId: number; founder: Identity }
  | { type: "PartyApproved"; partyId: number }
  | { type: "PartyDeactivated"; partyId: number; by: Identity }
  | { type: "PartyReactivated"; partyId: number }
  | { type: "PartyFieldUpdated"; partyId: number; field: PartyField; value: string }
  | { type: "MemberJoined"; partyId: number; member: Identity; withProof: boolean }
  | { type: "MemberLeft"; partyId: number; member: Identity }
  | { type: "MemberRemoved"; partyId: number; member: Identity; by: Identity }
  | { type: "MemberBanned"; partyId: number; member: Identity; by: Identity; wasMember: boolean }
  | { type: "MemberUnbanned"; partyId: number; member: Identity; by: Identity }
  | {
      type: "LeadershipTransferred";
      partyId: number;
      previousLeader: Identity;
      newLeader: Identity;
      forced: boolean;
    }
  | { type: "DocumentVerified"; identity: Identity }
  | { type: "VerificationTierSet"; identity: Identity; tier: VerificationTier }
  | { type: "PersonhoodEnrolled"; commitment: string; root: string }
  | { type: "PauseToggled"; paused: boolean }
  | { type: "OwnershipTransferred"; previousOwner: Identity; newOwner: Identity }
  | { type: "SnapshotBatchCaptured"; startPartyId: number; nextPartyId: number; processed: number }
  | { type: "SnapshotPassCompleted"; timestamp: number }
  | { type: "RetentionUpdated"; retention: number }
  | { type: "ElectionStarted"; electionId: number }
  | { type: "VoteCast"; electionId: number; voter: Identity; partyId: number; previousPartyId: number }
  | { type: "VoteRemoved"; electionId: number; voter: Identity; partyId: number };

export type PlatformEventType = PlatformEvent["type"];

type Listener = (event: PlatformEvent) => void;

/**
 * Synchronous in-process fan-out.  Listeners run in subscription order
 * after the mutation has been committed; a listener that throws is logged
 * and does not reach the publisher or the remaining listeners.
 */
export class EventBus {
  private readonly listeners = new Set<Listener>();

  /**
   * Registers a listener.
   *
   * @returns A function that removes the listener again
   */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: PlatformEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error("Event listener failed", {
          event: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
